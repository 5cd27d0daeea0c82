// Theme Analysis Prompt
// Book-level mood, genre, era and tone from a sample of the first chapter

import { LLM_PROMPTS } from '@/config/prompts';
import type { ThemeAnalysis } from '@/state/types';
import { recoverJson } from '../ResponseRecovery';
import { ThemeSchema } from '../schemas';
import { truncateAtSentenceBoundary } from '../TextTruncation';
import { TOKEN_BUDGETS } from '../TokenBudget';
import { BasePromptDefinition, fillTemplate } from './PromptDefinition';

export interface ThemeAnalysisInput {
  bookId: string;
  title: string;
  firstChapterText: string;
  maxSampleChars?: number;
}

export const DEFAULT_THEME_SAMPLE_CHARS = 3000;

export class ThemeAnalysisPrompt extends BasePromptDefinition<ThemeAnalysisInput, ThemeAnalysis> {
  readonly promptId = 'theme_analysis_v1';
  readonly displayName = 'Theme Analysis';
  readonly purpose = 'Classify the mood, genre, era and emotional tone of a book';
  readonly tokenBudget = TOKEN_BUDGETS.theme;
  readonly systemPrompt = LLM_PROMPTS.theme.system;
  readonly temperature: number = 0.2;

  buildUserPrompt(input: ThemeAnalysisInput): string {
    return fillTemplate(LLM_PROMPTS.theme.userTemplate, {
      title: input.title,
      text: input.firstChapterText,
    });
  }

  prepareInput(input: ThemeAnalysisInput): ThemeAnalysisInput {
    const limit = Math.min(input.maxSampleChars ?? DEFAULT_THEME_SAMPLE_CHARS, this.tokenBudget.maxInputChars);
    return { ...input, firstChapterText: truncateAtSentenceBoundary(input.firstChapterText, limit) };
  }

  emptyOutput(input?: ThemeAnalysisInput): ThemeAnalysis {
    return {
      bookId: input?.bookId ?? '',
      mood: 'classic',
      genre: 'modern_fiction',
      era: 'contemporary',
      emotionalTone: 'neutral',
      ambientSound: null,
    };
  }

  protected parse(raw: string, input?: ThemeAnalysisInput): ThemeAnalysis {
    const parsed = ThemeSchema.safeParse(recoverJson(raw));
    if (!parsed.success) return this.emptyOutput(input);

    const theme = parsed.data;
    return {
      bookId: input?.bookId ?? '',
      mood: theme.mood.toLowerCase(),
      genre: theme.genre.toLowerCase(),
      era: theme.era.toLowerCase(),
      emotionalTone: theme.emotional_tone.toLowerCase(),
      ambientSound: theme.suggested_ambient_sound,
    };
  }
}
