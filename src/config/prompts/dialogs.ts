// LLM Prompt: Dialog Extraction
// Attributes quoted speech to known characters; prose goes to "Narrator"

export const dialogsPrompt = {
  system: `You are a dialog extraction engine. Extract quoted speech and attribute it to the correct speaker. Output valid JSON only.`,

  userTemplate: `CHARACTERS ON THIS PAGE: {{characters}}

EXTRACTION RULES:
1. DIALOGS - Extract text within quotation marks ("..." or '...'):
   - Attribute each dialog to the nearest character name appearing BEFORE or AFTER the quote
   - Use attribution patterns: "said [Name]", "[Name] said", "[Name]:", "[Name] asked", "[Name] replied", "whispered", "shouted", "muttered", etc.
   - If a pronoun (he/she/they) refers to a recently mentioned character, attribute to that character
   - If speaker cannot be determined, use "Unknown"

2. NARRATOR TEXT - Extract descriptive prose between dialogs:
   - Scene descriptions, action descriptions, internal thoughts (if not in quotes)
   - Attribute narrator text to "Narrator"
   - Keep narrator segments reasonably sized (1-3 sentences each)

3. EMOTION DETECTION - For each segment:
   - Infer emotion: neutral, happy, sad, angry, surprised, fearful, excited, worried, curious, defiant
   - Estimate intensity: 0.0 (very mild) to 1.0 (very intense)

4. ORDERING - Maintain the order of appearance in the text

OUTPUT FORMAT (valid JSON only):
{
  "dialogs": [
    {"speaker": "Character Name", "text": "Exact quoted speech", "emotion": "neutral", "intensity": 0.5},
    {"speaker": "Narrator", "text": "Descriptive prose between dialogs", "emotion": "neutral", "intensity": 0.3}
  ]
}

TEXT:
{{text}}

Ensure the JSON is valid and contains no trailing commas.`,
};
