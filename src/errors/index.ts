// Application Errors
// Typed error codes for the extraction pipeline

export type ErrorCode =
  | 'BUDGET_EXCEEDED'
  | 'INVALID_BUDGET'
  | 'MODEL_UNAVAILABLE'
  | 'MODEL_TIMEOUT'
  | 'OPERATION_CANCELLED'
  | 'INVALID_CONFIG'
  | 'UNKNOWN';

/**
 * Base error carrying a machine-readable code
 */
export class AppError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
  }

  isCancellation(): boolean {
    return this.code === 'OPERATION_CANCELLED';
  }

  /**
   * Wrap anything thrown into an AppError, keeping the original as cause
   */
  static fromUnknown(error: unknown, fallbackCode: ErrorCode = 'UNKNOWN'): AppError {
    if (error instanceof AppError) return error;
    if (isAbortError(error)) {
      return new AppError('OPERATION_CANCELLED', 'Operation cancelled', { cause: error });
    }
    return new AppError(fallbackCode, getErrorMessage(error), { cause: error });
  }
}

/**
 * Token budget that does not fit its context window, or has invalid allocations
 */
export class TokenBudgetError extends AppError {
  constructor(code: 'BUDGET_EXCEEDED' | 'INVALID_BUDGET', message: string) {
    super(code, message);
    this.name = 'TokenBudgetError';
  }
}

// ========== Factories ==========

export function cancelledError(): AppError {
  return new AppError('OPERATION_CANCELLED', 'Operation cancelled');
}

export function modelTimeoutError(timeoutMs: number): AppError {
  return new AppError('MODEL_TIMEOUT', `Model call timed out after ${timeoutMs}ms`);
}

export function modelUnavailableError(message: string, cause?: unknown): AppError {
  return new AppError('MODEL_UNAVAILABLE', message, { cause });
}

// ========== Helpers ==========

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * True when the error means the caller gave up, not that the model failed
 */
export function isCancellation(error: unknown): boolean {
  if (error instanceof AppError) return error.isCancellation();
  return isAbortError(error);
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

/**
 * Normalize a thrown value for ILogger.error, which takes an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}

const RETRIABLE_CODES: ReadonlySet<ErrorCode> = new Set([
  'MODEL_UNAVAILABLE',
  'MODEL_TIMEOUT',
]);

const RETRIABLE_STATUS = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

function readStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined;
  return typeof error.status === 'number' ? error.status : undefined;
}

/**
 * Transient model/network failures; cancellations and programming errors are not retriable
 */
export function isRetriableError(error: unknown): boolean {
  if (isCancellation(error)) return false;
  if (error instanceof AppError) return RETRIABLE_CODES.has(error.code);
  const status = readStatus(error);
  if (status !== undefined) return RETRIABLE_STATUS.has(status);
  if (error instanceof TypeError && error.message.toLowerCase().includes('fetch')) return true;
  return error instanceof Error && /timeout|timed out|ECONNRESET|ECONNREFUSED|socket hang up/i.test(error.message);
}
