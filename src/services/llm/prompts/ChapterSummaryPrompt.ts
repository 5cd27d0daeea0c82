// Chapter Summary Prompt
// A few sentences of summary plus themes, genre, mood and key events

import { LLM_PROMPTS } from '@/config/prompts';
import type { ChapterSummary } from '@/state/types';
import { recoverJson } from '../ResponseRecovery';
import { ChapterSummarySchema } from '../schemas';
import { TOKEN_BUDGETS } from '../TokenBudget';
import { BasePromptDefinition, fillTemplate } from './PromptDefinition';

export interface ChapterSummaryInput {
  chapterTitle: string;
  chapterText: string;
}

export const OMITTED_MIDDLE_MARKER = '\n\n[...middle section omitted...]\n\n';

export class ChapterSummaryPrompt extends BasePromptDefinition<ChapterSummaryInput, ChapterSummary> {
  readonly promptId = 'chapter_summary_v1';
  readonly displayName = 'Chapter Summary';
  readonly purpose = 'Extract chapter summary, themes, and genre';
  readonly tokenBudget = TOKEN_BUDGETS.chapterSummary;
  readonly systemPrompt = LLM_PROMPTS.chapterSummary.system;
  readonly temperature: number = 0.2;

  buildUserPrompt(input: ChapterSummaryInput): string {
    return fillTemplate(LLM_PROMPTS.chapterSummary.userTemplate, {
      title: input.chapterTitle,
      text: input.chapterText,
    });
  }

  /**
   * An oversized chapter keeps its opening and its ending; the middle
   * is replaced by a marker.
   */
  prepareInput(input: ChapterSummaryInput): ChapterSummaryInput {
    const maxChars = this.tokenBudget.maxInputChars;
    const text = input.chapterText;
    if (text.length <= maxChars) return input;

    const half = Math.floor((maxChars - OMITTED_MIDDLE_MARKER.length) / 2);
    return { ...input, chapterText: `${text.slice(0, half)}${OMITTED_MIDDLE_MARKER}${text.slice(-half)}` };
  }

  emptyOutput(): ChapterSummary {
    return { summary: '', themes: [], genre: '', mood: '', keyEvents: [] };
  }

  protected parse(raw: string): ChapterSummary {
    const parsed = ChapterSummarySchema.safeParse(recoverJson(raw));
    if (!parsed.success) return this.emptyOutput();

    const { summary, themes, genre, mood, key_events } = parsed.data;
    return { summary, themes, genre, mood, keyEvents: key_events };
  }
}
