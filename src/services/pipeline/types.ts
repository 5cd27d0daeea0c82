// Pipeline Types
// Passes, their per-call tuning, and progress reporting for the analysis workflows

import { cancelledError, isCancellation, toError } from '@/errors';
import { defaultConfig } from '@/config';
import type { LanguageModel } from '@/services/llm/LanguageModel';

// ========== Passes ==========

/**
 * One model call driven by a prompt: truncate, build, generate, parse.
 * Resolves to a degraded output instead of rejecting; only cancellation rejects.
 */
export interface AnalysisPass<I, O> {
  readonly passId: string;
  readonly displayName: string;

  execute(model: LanguageModel, input: I, config: PassConfig, signal?: AbortSignal): Promise<O>;
}

/**
 * Model-specific tuning for a single pass
 */
export interface PassConfig {
  maxTokens: number;
  temperature: number;
  /** Upper bound on the text one call may carry */
  maxSegmentChars: number;
  /** Total attempts, including the first */
  maxRetries: number;
  /** Output tokens dropped on every retry */
  tokenReductionOnRetry: number;
  timeoutMs: number;
  /** Base delay before the first retry; later ones back off */
  retryDelayMs: number;
}

export const DEFAULT_PASS_CONFIG: Readonly<PassConfig> = Object.freeze({
  maxTokens: 1024,
  temperature: defaultConfig.llm.defaultTemperature,
  maxSegmentChars: 10_000,
  maxRetries: defaultConfig.llm.maxRetries,
  tokenReductionOnRetry: defaultConfig.llm.tokenReductionOnRetry,
  timeoutMs: defaultConfig.llm.requestTimeoutMs,
  retryDelayMs: defaultConfig.retry.baseDelayMs,
});

export function passConfig(overrides: Partial<PassConfig> = {}): PassConfig {
  return { ...DEFAULT_PASS_CONFIG, ...overrides };
}

export const PASS_CONFIGS = {
  characterExtraction: passConfig({ maxTokens: 256, temperature: 0.1, maxSegmentChars: 12_000 }),
  dialogExtraction: passConfig({ maxTokens: 1024, temperature: 0.15, maxSegmentChars: 6_000 }),
  traitsExtraction: passConfig({ maxTokens: 384, temperature: 0.1 }),
  batchedAnalysis: passConfig({
    maxTokens: 1000,
    temperature: defaultConfig.llm.batchedTemperature,
    maxSegmentChars: 14_800,
    maxRetries: 2,
    tokenReductionOnRetry: 200,
  }),
  themeAnalysis: passConfig({ maxTokens: 200, temperature: 0.2, maxSegmentChars: 3_000 }),
  plotPoints: passConfig({ maxTokens: 900, temperature: 0.2 }),
  foreshadowing: passConfig({ maxTokens: 900, temperature: 0.2 }),
  chapterSummary: passConfig({ maxTokens: 500, temperature: 0.2, maxSegmentChars: 24_000 }),
  keyMoments: passConfig({ maxTokens: 512, temperature: 0.2 }),
  relationships: passConfig({ maxTokens: 512, temperature: 0.2 }),
  voiceProfile: passConfig({ maxTokens: 512, temperature: 0.2 }),
  storyGeneration: passConfig({ maxTokens: 2048, temperature: 0.7 }),
  storyRemix: passConfig({ maxTokens: 2048, temperature: 0.7, maxSegmentChars: 5_000 }),
} as const;

/**
 * Run one stage of a workflow; anything but a cancellation yields the fallback
 */
export async function isolate<T>(run: () => Promise<T>, fallback: T, onError: (error: Error) => void): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (isCancellation(error)) throw error;
    onError(toError(error));
    return fallback;
  }
}

// ========== Progress ==========

/**
 * Progress information from a workflow step
 */
export interface PipelineProgress {
  /** Name of the current step */
  step: string;
  /** Current item being processed */
  current: number;
  /** Total items to process */
  total: number;
  /** Human-readable message */
  message: string;
}

/**
 * Callback for progress updates
 */
export type ProgressCallback = (progress: PipelineProgress) => void;

/**
 * Base class for workflows with common functionality
 */
export abstract class BasePipelineStep {
  abstract readonly name: string;
  protected progressCallback?: ProgressCallback;

  setProgressCallback(callback: ProgressCallback): void {
    this.progressCallback = callback;
  }

  /**
   * Report progress
   */
  protected reportProgress(current: number, total: number, message: string): void {
    this.progressCallback?.({
      step: this.name,
      current,
      total,
      message,
    });
  }

  /**
   * Check if cancelled and throw if so
   */
  protected checkCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw cancelledError();
    }
  }
}
