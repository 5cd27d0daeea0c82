// LLM Prompt: Character Name Extraction
// Cheapest pass: names only, tiny output budget

export const characterNamesPrompt = {
  system: `You are a character name extraction engine. Extract ONLY character names that appear in the provided story text.`,

  userTemplate: `OUTPUT FORMAT (valid JSON only):
{"characters": ["Name1", "Name2", "Name3"]}

TEXT:
{{text}}`,
};
