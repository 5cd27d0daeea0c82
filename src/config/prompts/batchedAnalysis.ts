// LLM Prompt: Batched Chapter Analysis
// Characters, dialogs, traits and a compact voice tuple in one call per batch

export const batchedAnalysisPrompt = {
  system: `You are a JSON extraction engine. Extract ONLY characters who SPEAK dialog. Ignore locations, objects, creatures, and non-speaking entities.`,

  userTemplate: `Extract Character names, their Dialogs(D), their Traits(T) and their inferred Voice/Speaking Profile(V) from the story text below.
RULES:
1. ONLY include characters who have quoted dialogs
2. DO NOT include locations, objects, creatures or entities that don't speak
3. In the output json, each discovered character must appear EXACTLY ONCE
4. Read the ENTIRE text before outputting

FORMAT: {"<Character-Name>":{"D":["dialog1","dialog2", ...],"T":["trait1", "trait2", ...],"V":"Gender,Age,Accent,Pitch,Speed"}, ... }

KEYS:
- D = Array of ALL quoted dialogs spoken by the keyed Character
- T = Array of Character's physical traits and personality
- V = Their [Gender,Age,Accent,Pitch,Speed]. Options: (male|female, child|young|young-adult|middle-aged|elderly, neutral|british|american|asian..., 0.5-1.5, 0.5-2.0)

TEXT:
{{text}}

JSON:`,
};
