// Prompt Pass
// Runs one PromptDefinition against a model: retries, a per-call timeout, and an empty result on failure

import { defaultConfig } from '@/config';
import { cancelledError, getErrorMessage, isCancellation, modelTimeoutError, toError } from '@/errors';
import type { ILogger } from '@/services/Logger';
import type { GenerateRequest, LanguageModel } from '@/services/llm/LanguageModel';
import type { PromptDefinition } from '@/services/llm/prompts/PromptDefinition';
import { withRetry } from '@/utils/retry';
import type { AnalysisPass, PassConfig } from './types';

export interface PromptPassOptions {
  logger?: ILogger;
}

/**
 * Output token allocation for a 1-based attempt
 */
export function tokensForAttempt(config: PassConfig, attempt: number): number {
  const reduced = config.maxTokens - config.tokenReductionOnRetry * (attempt - 1);
  return Math.max(reduced, Math.min(config.maxTokens, defaultConfig.llm.minOutputTokens));
}

export class PromptPass<I, O> implements AnalysisPass<I, O> {
  private readonly logger?: ILogger;

  constructor(
    private readonly prompt: PromptDefinition<I, O>,
    options: PromptPassOptions = {},
  ) {
    this.logger = options.logger;
  }

  get passId(): string {
    return this.prompt.promptId;
  }

  get displayName(): string {
    return this.prompt.displayName;
  }

  async execute(model: LanguageModel, input: I, config: PassConfig, signal?: AbortSignal): Promise<O> {
    if (signal?.aborted) throw cancelledError();

    const prepared = this.prompt.prepareInput(input);
    const systemPrompt = this.prompt.systemPromptFor(prepared);
    const userPrompt = this.prompt.buildUserPrompt(prepared);
    this.logger?.debug?.(`[${this.passId}] Executing: ${userPrompt.length} chars prompt`);

    let raw: string;
    try {
      raw = await withRetry(
        (attempt) =>
          this.generateOnce(
            model,
            {
              systemPrompt,
              userPrompt,
              maxTokens: tokensForAttempt(config, attempt),
              temperature: config.temperature,
              promptId: this.passId,
            },
            config.timeoutMs,
            signal,
          ),
        {
          maxRetries: Math.max(0, config.maxRetries - 1),
          baseDelay: config.retryDelayMs,
          maxDelay: defaultConfig.retry.maxDelayMs,
          shouldRetry: (error) => !isCancellation(error),
          signal,
          onRetry: ({ attempt, error, nextDelay, retriesLeft }) => {
            this.logger?.warn(`[${this.passId}] Attempt ${attempt} failed, retrying`, {
              error: getErrorMessage(error),
              nextDelay,
              retriesLeft,
            });
          },
        },
      );
    } catch (error) {
      if (signal?.aborted || isCancellation(error)) throw cancelledError();
      this.logger?.error(`[${this.passId}] All attempts failed, returning empty output`, toError(error), {
        attempts: config.maxRetries,
      });
      return this.prompt.emptyOutput(prepared);
    }

    return this.prompt.parseResponse(raw, prepared);
  }

  /**
   * One model call bounded by timeoutMs; the caller's signal aborts it too
   */
  private async generateOnce(
    model: LanguageModel,
    request: GenerateRequest,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<string> {
    const controller = new AbortController();
    const guard = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });
    const forwardAbort = () => controller.abort(cancelledError());
    signal?.addEventListener('abort', forwardAbort, { once: true });
    const timer = setTimeout(() => controller.abort(modelTimeoutError(timeoutMs)), timeoutMs);

    try {
      return await Promise.race([model.generate({ ...request, signal: controller.signal }), guard]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
