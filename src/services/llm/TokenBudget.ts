// Token Budget
// Splits a model context window between prompt template, input text and output

import { defaultConfig } from '@/config';
import { TokenBudgetError } from '@/errors';

export const CHARS_PER_TOKEN = defaultConfig.llm.charsPerToken;
export const DEFAULT_CONTEXT_WINDOW = defaultConfig.llm.contextWindow;

/** Input never shrinks below this when scaling to a smaller context */
export const MIN_INPUT_TOKENS = 500;

export interface TokenAllocation {
  promptTokens: number;
  inputTokens: number;
  outputTokens: number;
}

/**
 * Immutable token allocation. Construction fails when the allocation
 * does not fit the context window.
 */
export class TokenBudget implements TokenAllocation {
  readonly promptTokens: number;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly contextWindow: number;

  constructor(allocation: TokenAllocation, contextWindow: number = DEFAULT_CONTEXT_WINDOW) {
    const { promptTokens, inputTokens, outputTokens } = allocation;
    for (const [field, value] of Object.entries({ promptTokens, inputTokens, outputTokens, contextWindow })) {
      if (!Number.isInteger(value) || value < 0) {
        throw new TokenBudgetError('INVALID_BUDGET', `${field} must be a non-negative integer, got ${value}`);
      }
    }

    const total = promptTokens + inputTokens + outputTokens;
    if (total > contextWindow) {
      throw new TokenBudgetError('BUDGET_EXCEEDED', `Total tokens (${total}) exceeds budget (${contextWindow})`);
    }

    this.promptTokens = promptTokens;
    this.inputTokens = inputTokens;
    this.outputTokens = outputTokens;
    this.contextWindow = contextWindow;
    Object.freeze(this);
  }

  get totalTokens(): number {
    return this.promptTokens + this.inputTokens + this.outputTokens;
  }

  get maxInputChars(): number {
    return this.inputTokens * CHARS_PER_TOKEN;
  }

  get maxOutputChars(): number {
    return this.outputTokens * CHARS_PER_TOKEN;
  }

  toString(): string {
    return `TokenBudget(prompt=${this.promptTokens}, input=${this.inputTokens}, output=${this.outputTokens}, total=${this.totalTokens}/${this.contextWindow})`;
  }
}

function budget(promptTokens: number, inputTokens: number, outputTokens: number, contextWindow?: number): TokenBudget {
  return new TokenBudget({ promptTokens, inputTokens, outputTokens }, contextWindow);
}

/**
 * Budgets per extraction task
 */
export const TOKEN_BUDGETS = {
  characterExtraction: budget(200, 3300, 100),
  dialogExtraction: budget(300, 1500, 2200),
  voiceProfile: budget(400, 2100, 1500),
  traits: budget(200, 2500, 384),
  keyMoments: budget(200, 2500, 512),
  relationships: budget(200, 2500, 512),
  storyGeneration: budget(300, 500, 3200),
  storyRemix: budget(300, 1800, 1900),
  theme: budget(250, 3000, 200),
  plotPoints: budget(350, 2700, 900),
  foreshadowing: budget(300, 2800, 900),
  // Whole chapters; needs an 8K context model
  chapterSummary: budget(200, 6000, 500, 8192),
  // One call per batch for everything; needs an 8K context model
  batchedAnalysis: budget(300, 3700, 1000, 8192),
} as const satisfies Record<string, TokenBudget>;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export function fitsWithinTokens(text: string, maxTokens: number): boolean {
  return estimateTokens(text) <= maxTokens;
}

/**
 * Shrink the input allocation so the total fits a user-set cap.
 * Prompt and output allocations are kept as they are.
 */
export function scaleToContext(source: TokenBudget, maxTotalTokens: number): TokenBudget {
  if (source.totalTokens <= maxTotalTokens) return source;

  const available = maxTotalTokens - source.promptTokens - source.outputTokens;
  const inputTokens = Math.min(source.inputTokens, Math.max(MIN_INPUT_TOKENS, available));

  return new TokenBudget(
    { promptTokens: source.promptTokens, inputTokens, outputTokens: source.outputTokens },
    source.contextWindow,
  );
}
