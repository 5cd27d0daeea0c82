// Plot Point Prompt
// Freytag-style structure across sampled chapters

import { LLM_PROMPTS } from '@/config/prompts';
import type { PlotPoint, PlotPointType } from '@/state/types';
import { recoverJsonArray } from '../ResponseRecovery';
import { PlotPointItemSchema } from '../schemas';
import { truncateAtSentenceBoundary } from '../TextTruncation';
import { TOKEN_BUDGETS } from '../TokenBudget';
import { BasePromptDefinition, fillTemplate } from './PromptDefinition';

export interface PlotPointInput {
  bookId: string;
  /** [0-based chapter index, chapter text] */
  chapters: Array<[number, string]>;
  maxSampleChars?: number;
}

export interface PlotPointOutput {
  bookId: string;
  plotPoints: PlotPoint[];
  chapterCount: number;
}

export const DEFAULT_PLOT_SAMPLE_CHARS = 1500;

/** Display names in arc order */
export const PLOT_POINT_TYPES: Readonly<Record<PlotPointType, { displayName: string; order: number }>> = {
  EXPOSITION: { displayName: 'Exposition', order: 0 },
  INCITING_INCIDENT: { displayName: 'Inciting Incident', order: 1 },
  RISING_ACTION: { displayName: 'Rising Action', order: 2 },
  MIDPOINT: { displayName: 'Midpoint', order: 3 },
  CLIMAX: { displayName: 'Climax', order: 4 },
  FALLING_ACTION: { displayName: 'Falling Action', order: 5 },
  RESOLUTION: { displayName: 'Resolution', order: 6 },
};

function isPlotPointType(value: string): value is PlotPointType {
  return Object.hasOwn(PLOT_POINT_TYPES, value);
}

/**
 * Accepts "Inciting Incident", "inciting-incident" or "INCITING_INCIDENT"
 */
export function parsePlotPointType(value: string): PlotPointType | undefined {
  const key = value.trim().toUpperCase().replace(/[\s-]+/g, '_');
  return isPlotPointType(key) ? key : undefined;
}

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

export class PlotPointPrompt extends BasePromptDefinition<PlotPointInput, PlotPointOutput> {
  readonly promptId = 'plot_point_extraction_v1';
  readonly displayName = 'Plot Points';
  readonly purpose = 'Locate the major plot points of a book across its chapters';
  readonly tokenBudget = TOKEN_BUDGETS.plotPoints;
  readonly systemPrompt = LLM_PROMPTS.plotPoints.system;
  readonly temperature: number = 0.2;

  buildUserPrompt(input: PlotPointInput): string {
    const chapters = input.chapters
      .map(([index, text]) => `CHAPTER ${index + 1}:\n${text}`)
      .join('\n\n---\n\n');
    return fillTemplate(LLM_PROMPTS.plotPoints.userTemplate, { chapters });
  }

  prepareInput(input: PlotPointInput): PlotPointInput {
    if (input.chapters.length === 0) return input;
    const perChapter = Math.min(
      input.maxSampleChars ?? DEFAULT_PLOT_SAMPLE_CHARS,
      Math.floor(this.tokenBudget.maxInputChars / input.chapters.length),
    );
    return {
      ...input,
      chapters: input.chapters.map(([index, text]) => [index, truncateAtSentenceBoundary(text, perChapter)]),
    };
  }

  emptyOutput(input?: PlotPointInput): PlotPointOutput {
    return { bookId: input?.bookId ?? '', plotPoints: [], chapterCount: input?.chapters.length ?? 0 };
  }

  protected parse(raw: string, input?: PlotPointInput): PlotPointOutput {
    // Also finds the array inside a wrapper object such as {"plot_points": [...]}
    const items = recoverJsonArray(raw) ?? [];

    const plotPoints: PlotPoint[] = [];
    for (const item of items) {
      const parsed = PlotPointItemSchema.safeParse(item);
      if (!parsed.success) continue;
      const type = parsePlotPointType(parsed.data.type);
      if (!type) {
        this.logger?.debug?.(`[${this.promptId}] Unknown plot point type "${parsed.data.type}"`);
        continue;
      }
      plotPoints.push({
        type,
        chapterIndex: Math.max(0, Math.round(parsed.data.chapter) - 1),
        description: parsed.data.description,
        confidence: clamp01(parsed.data.confidence),
      });
    }
    plotPoints.sort((a, b) => PLOT_POINT_TYPES[a.type].order - PLOT_POINT_TYPES[b.type].order);

    return { ...this.emptyOutput(input), plotPoints };
  }
}
