// LLM Prompt: Plot Point Extraction
// Story structure across several chapter samples

export const plotPointsPrompt = {
  system: `You are a literary analyst specializing in narrative structure. Analyze the following chapters to identify the major plot points.`,

  userTemplate: `Analyze these chapters and identify the major plot points:

{{chapters}}

Identify where these story elements occur:
1. Exposition - introduction of setting, characters, and initial situation
2. Inciting Incident - the event that sets the main conflict in motion
3. Rising Action - events building tension toward the climax
4. Midpoint - a turning point that changes the story's direction
5. Climax - the peak of conflict and tension
6. Falling Action - events after the climax
7. Resolution - final outcome and closure

Return JSON array:
[
  {"type": "Exposition", "chapter": 1, "description": "Brief description", "confidence": 0.9},
  {"type": "Inciting Incident", "chapter": 2, "description": "Brief description", "confidence": 0.85}
]

Only include plot points you can identify with confidence. Return ONLY the JSON array.`,
};
