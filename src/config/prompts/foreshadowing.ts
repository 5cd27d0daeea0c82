// LLM Prompt: Foreshadowing Detection
// Setup/payoff pairs across several chapter samples

export const foreshadowingPrompt = {
  system: `You are a literary analyst specializing in narrative structure. Analyze the following chapters for foreshadowing elements.`,

  userTemplate: `Analyze these chapters for foreshadowing elements:

{{chapters}}

Identify foreshadowing elements where:
1. Setup elements: hints, symbolic objects, ominous statements, recurring motifs that suggest future events
2. Payoff elements: when the setup is revealed, resolved, or gains meaning later

Return ONLY valid JSON in this exact format:
{
  "foreshadowing": [
    {
      "setup_chapter": 1,
      "setup_text": "Brief quote or description of the setup",
      "payoff_chapter": 5,
      "payoff_text": "Brief quote or description of the payoff",
      "theme": "one or two word theme like 'death' or 'betrayal'",
      "confidence": 0.8
    }
  ]
}

If no foreshadowing is found, return: {"foreshadowing": []}`,
};
