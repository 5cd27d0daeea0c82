// LLM Prompt: Key Moments

export const keyMomentsPrompt = {
  system: `You are an extraction engine. Your only job is to output valid JSON. Do not add commentary.`,

  userTemplate: `Extract 2-3 key moments for "{{name}}" in this chapter. Key moments are significant events, decisions, revelations, or emotional scenes involving this character.
Return ONLY valid JSON:
{"moments": [{"chapter": "{{chapterTitle}}", "moment": "brief description", "significance": "why it matters"}]}

<TEXT>
{{text}}
</TEXT>
Ensure the JSON is valid and contains no trailing commas.`,
};
