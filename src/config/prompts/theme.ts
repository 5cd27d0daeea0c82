// LLM Prompt: Theme Analysis
// Whole-book mood, genre, era and tone from a first-chapter sample

export const themePrompt = {
  system: `You are a literary analyst specializing in genre and mood classification. Analyze the book content to determine its mood, genre, and atmosphere.`,

  userTemplate: `Analyze this book content and determine its mood and atmosphere:

Title: {{title}}
First Chapter Sample:
{{text}}

Determine:
1. Primary mood (dark_gothic, romantic, adventure, mystery, fantasy, scifi, classic)
2. Genre (classic_literature, modern_fiction, fantasy, scifi, romance, thriller)
3. Era setting (historical, contemporary, futuristic)
4. Emotional tone (somber, uplifting, tense, whimsical)

Return JSON:
{
  "mood": "dark_gothic",
  "genre": "thriller",
  "era": "contemporary",
  "emotional_tone": "tense",
  "suggested_ambient_sound": "rain"
}`,
};
