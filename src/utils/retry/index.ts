// Retry utilities

export { AbortError, type RetryNotice, type RetryOptions, backoffDelay, withRetry } from './network';
