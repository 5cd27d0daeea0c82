// Foreshadowing Prompt
// Setups and their payoffs across sampled chapters

import { LLM_PROMPTS } from '@/config/prompts';
import type { Foreshadowing } from '@/state/types';
import { recoverJson } from '../ResponseRecovery';
import { ForeshadowingItemSchema } from '../schemas';
import { truncateAtSentenceBoundary } from '../TextTruncation';
import { TOKEN_BUDGETS } from '../TokenBudget';
import { BasePromptDefinition, fillTemplate } from './PromptDefinition';

export interface ForeshadowingInput {
  bookId: string;
  /** [0-based chapter index, chapter text] */
  chapters: Array<[number, string]>;
  maxSampleChars?: number;
}

export interface ForeshadowingOutput {
  bookId: string;
  foreshadowings: Foreshadowing[];
  chapterCount: number;
}

export const DEFAULT_FORESHADOWING_SAMPLE_CHARS = 1500;

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

/** 1-based chapter number from the model to a 0-based index */
const toChapterIndex = (chapter: number): number => Math.max(0, Math.round(chapter) - 1);

export class ForeshadowingPrompt extends BasePromptDefinition<ForeshadowingInput, ForeshadowingOutput> {
  readonly promptId = 'foreshadowing_detection_v1';
  readonly displayName = 'Foreshadowing Detection';
  readonly purpose = 'Detect foreshadowing elements and their payoffs across chapters';
  readonly tokenBudget = TOKEN_BUDGETS.foreshadowing;
  readonly systemPrompt = LLM_PROMPTS.foreshadowing.system;
  readonly temperature: number = 0.2;

  buildUserPrompt(input: ForeshadowingInput): string {
    const chapters = input.chapters
      .map(([index, text]) => `CHAPTER ${index + 1}:\n${text}`)
      .join('\n\n---\n\n');
    return fillTemplate(LLM_PROMPTS.foreshadowing.userTemplate, { chapters });
  }

  prepareInput(input: ForeshadowingInput): ForeshadowingInput {
    if (input.chapters.length === 0) return input;
    const perChapter = Math.min(
      input.maxSampleChars ?? DEFAULT_FORESHADOWING_SAMPLE_CHARS,
      Math.floor(this.tokenBudget.maxInputChars / input.chapters.length),
    );
    return {
      ...input,
      chapters: input.chapters.map(([index, text]) => [index, truncateAtSentenceBoundary(text, perChapter)]),
    };
  }

  emptyOutput(input?: ForeshadowingInput): ForeshadowingOutput {
    return { bookId: input?.bookId ?? '', foreshadowings: [], chapterCount: input?.chapters.length ?? 0 };
  }

  protected parse(raw: string, input?: ForeshadowingInput): ForeshadowingOutput {
    const items = recoverJson(raw)?.foreshadowing;
    if (!Array.isArray(items)) return this.emptyOutput(input);

    const foreshadowings: Foreshadowing[] = [];
    for (const item of items) {
      // Items without both chapter numbers are dropped
      const parsed = ForeshadowingItemSchema.safeParse(item);
      if (!parsed.success) continue;
      foreshadowings.push({
        setupChapter: toChapterIndex(parsed.data.setup_chapter),
        setupText: parsed.data.setup_text,
        payoffChapter: toChapterIndex(parsed.data.payoff_chapter),
        payoffText: parsed.data.payoff_text,
        theme: parsed.data.theme,
        confidence: clamp01(parsed.data.confidence),
      });
    }

    return { ...this.emptyOutput(input), foreshadowings };
  }
}
