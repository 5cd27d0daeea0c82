// Retry with exponential backoff for model calls

import pRetry, { AbortError } from 'p-retry';
import { isRetriableError } from '@/errors';

export { AbortError };

/** What a retry callback learns about the attempt that just failed */
export interface RetryNotice {
  /** 1-based number of the failed attempt */
  attempt: number;
  error: unknown;
  /** Approximate wait before the next attempt (ms) */
  nextDelay: number;
  retriesLeft: number;
}

export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries?: number;
  baseDelay?: number;
  maxDelay?: number;
  /** Called before each retry; never after the last attempt */
  onRetry?: (notice: RetryNotice) => void;
  shouldRetry?: (error: unknown) => boolean;
  signal?: AbortSignal;
}

/**
 * Backoff for a 1-based failed attempt, before jitter
 */
export function backoffDelay(attempt: number, baseDelay: number, maxDelay: number): number {
  return Math.min(baseDelay * 2 ** (attempt - 1), maxDelay);
}

/**
 * Run an operation with exponential backoff.
 * The operation receives the 1-based attempt number so it can adapt
 * (e.g. ask for fewer tokens) on later attempts.
 */
export async function withRetry<T>(
  operation: (attemptNumber: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelay = 1000,
    maxDelay = 30000,
    onRetry,
    shouldRetry = isRetriableError,
    signal,
  } = options;

  return pRetry(
    async (attemptNumber) => {
      if (signal?.aborted) {
        throw new AbortError('Operation cancelled');
      }
      return operation(attemptNumber);
    },
    {
      retries: maxRetries,
      minTimeout: baseDelay,
      maxTimeout: maxDelay,
      factor: 2,
      randomize: true,
      signal,
      onFailedAttempt: ({ error, attemptNumber, retriesLeft }) => {
        // Throwing here ends the retry loop with this error
        if (!shouldRetry(error)) throw error;
        if (retriesLeft === 0) return;

        onRetry?.({
          attempt: attemptNumber,
          error,
          nextDelay: backoffDelay(attemptNumber, baseDelay, maxDelay),
          retriesLeft,
        });
      },
    },
  );
}
