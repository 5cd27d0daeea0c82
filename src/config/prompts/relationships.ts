// LLM Prompt: Relationships

export const relationshipsPrompt = {
  system: `You are an extraction engine. Your only job is to output valid JSON. Do not add commentary.`,

  userTemplate: `Extract relationships between "{{name}}" and other characters: {{others}}
Relationship types: family, friend, enemy, romantic, professional, other.
Return ONLY valid JSON:
{"relationships": [{"character": "other character name", "relationship": "type", "nature": "brief description"}]}

<TEXT>
{{text}}
</TEXT>
Ensure the JSON is valid and contains no trailing commas.`,
};
