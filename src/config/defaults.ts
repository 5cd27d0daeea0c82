// Configuration defaults

export const defaultConfig = {
  llm: {
    // Context window assumed for every budget unless a budget names its own
    contextWindow: 4096,
    // Crude chars-per-token ratio used instead of a tokenizer
    charsPerToken: 4,
    defaultTemperature: 0.15,
    batchedTemperature: 0.01,
    // Per-call timeout for a single model generation (ms)
    requestTimeoutMs: 180_000,
    maxRetries: 3,
    tokenReductionOnRetry: 500,
    // Retries never shrink the output allocation below this
    minOutputTokens: 64,
  },
  retry: {
    // First backoff; each further retry doubles it up to maxDelayMs
    baseDelayMs: 1000,
    maxDelayMs: 30000,
  },
  debug: {
    logsFolder: 'logs',
  },
  logging: {
    maxEntries: 2000,
  },
} as const;

export type AppConfig = typeof defaultConfig;

