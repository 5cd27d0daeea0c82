// LLM Prompt: Chapter Summary
// Short summary, themes, genre, mood and key events of one chapter

export const chapterSummaryPrompt = {
  system: `You are a literary analysis engine. Analyze chapters and extract summaries, themes, and genre indicators. Output valid JSON only.`,

  userTemplate: `Analyze this chapter and extract:
1. summary: 2-3 sentence plot summary
2. themes: List of main themes (e.g., "redemption", "love", "betrayal")
3. genre: Primary genre (fantasy, romance, mystery, thriller, etc.)
4. mood: Overall mood (dark, lighthearted, tense, melancholic, etc.)
5. key_events: List of 3-5 significant plot events

Output: Valid JSON, No commentary
{"summary":"...","themes":["..."],"genre":"...","mood":"...","key_events":["event1","event2"]}

Chapter Title: {{title}}

Chapter Text:
{{text}}`,
};
