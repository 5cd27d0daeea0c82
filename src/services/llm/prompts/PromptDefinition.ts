// Prompt Definitions
// One stateless descriptor per extraction task: budget, prompts, truncation and parsing

import type { ILogger } from '@/services/Logger';
import { getErrorMessage } from '@/errors';
import type { TokenBudget } from '../TokenBudget';

/**
 * Contract shared by every prompt.
 *
 * parseResponse never throws: blank, malformed or wrong-shaped output
 * yields emptyOutput(). The optional input lets outputs echo identifiers
 * (book id, character name) the response itself does not carry.
 */
export interface PromptDefinition<I, O> {
  readonly promptId: string;
  readonly displayName: string;
  readonly purpose: string;
  readonly tokenBudget: TokenBudget;
  readonly systemPrompt: string;
  readonly temperature: number;

  /** systemPrompt unless the input selects another mode */
  systemPromptFor(input: I): string;
  /** Pure template fill, no side effects */
  buildUserPrompt(input: I): string;
  /** Input whose text fits tokenBudget.maxInputChars */
  prepareInput(input: I): I;
  parseResponse(raw: string, input?: I): O;
  emptyOutput(input?: I): O;
}

export interface PromptOptions {
  logger?: ILogger;
}

export const DEFAULT_PROMPT_TEMPERATURE = 0.15;

/**
 * Fill {{placeholders}}; unknown placeholders are left as they are
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) =>
    Object.hasOwn(values, key) ? values[key] : match,
  );
}

/**
 * Base class holding the never-throw parse wrapper
 */
export abstract class BasePromptDefinition<I, O> implements PromptDefinition<I, O> {
  abstract readonly promptId: string;
  abstract readonly displayName: string;
  abstract readonly purpose: string;
  abstract readonly tokenBudget: TokenBudget;
  abstract readonly systemPrompt: string;
  readonly temperature: number = DEFAULT_PROMPT_TEMPERATURE;

  protected readonly logger?: ILogger;

  constructor(options: PromptOptions = {}) {
    this.logger = options.logger;
  }

  systemPromptFor(_input: I): string {
    return this.systemPrompt;
  }

  abstract buildUserPrompt(input: I): string;
  abstract prepareInput(input: I): I;
  abstract emptyOutput(input?: I): O;

  /** Parse a non-blank response; may throw, the caller degrades */
  protected abstract parse(raw: string, input?: I): O;

  parseResponse(raw: string, input?: I): O {
    if (raw.trim() === '') {
      this.logger?.warn(`[${this.promptId}] Empty response`);
      return this.emptyOutput(input);
    }
    try {
      return this.parse(raw, input);
    } catch (error) {
      this.logger?.warn(`[${this.promptId}] Failed to parse response`, {
        error: getErrorMessage(error),
        response: raw.substring(0, 300),
      });
      return this.emptyOutput(input);
    }
  }
}
