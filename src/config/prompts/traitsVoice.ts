// LLM Prompt: Traits and Voice Profile
// Per-character pass over that character's own context

export const traitsVoicePrompt = {
  system: `You are a character analyst for TTS voice casting. Extract observable traits and suggest voice profile. JSON only.`,

  userTemplate: `CHARACTER: "{{name}}"

TEXT:
{{context}}

EXTRACT CONCISE TRAITS (1-2 words only):
- Examples: "gravelly voice", "nervous fidgeting", "dry humor", "rambling", "high-pitched", "slow pacing"
- DO NOT write verbose descriptions like "Voice Traits: Pitch: Low..."

TRAIT → VOICE MAPPING:
- "gravelly/deep/commanding" → pitch: 0.8-0.9
- "bright/light/young" → pitch: 1.1-1.2
- "fast-paced/rambling/excited" → speed: 1.1-1.2
- "slow/deliberate/monotone" → speed: 0.8-0.9

OUTPUT FORMAT (valid JSON only):
{
  "character": "{{name}}",
  "traits": ["trait1", "trait2", "trait3"],
  "voice_profile": {"pitch": 1.0, "speed": 1.0, "gender": "male|female", "age": "child|young|young-adult|middle-aged|elderly", "accent": "neutral|british|american|..."}
}

Ensure the JSON is valid and contains no trailing commas.`,
};
