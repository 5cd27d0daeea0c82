// LLM Module
// Model client, prompt definitions, response recovery and the character merger

export { LLMApiClient, createLLMApiClient, detectProvider, formatApiError } from './LLMApiClient';
export type { LLMApiClientOptions, ConnectionTestResult } from './LLMApiClient';
export type { GenerateRequest, LanguageModel } from './LanguageModel';
export { DebugLogger } from './DebugLogger';

export {
  TokenBudget,
  TOKEN_BUDGETS,
  CHARS_PER_TOKEN,
  DEFAULT_CONTEXT_WINDOW,
  MIN_INPUT_TOKENS,
  estimateTokens,
  fitsWithinTokens,
  scaleToContext,
} from './TokenBudget';
export type { TokenAllocation } from './TokenBudget';
export {
  splitParagraphs,
  truncateAtSentenceBoundary,
  truncateAtParagraphBoundary,
  prepareInputText,
} from './TextTruncation';

export {
  EMPTY_JSON_OBJECT,
  cleanResponse,
  extractJsonObject,
  recoverJson,
  recoverJsonArray,
  detectJsonShape,
} from './ResponseRecovery';

export { IncrementalMerger } from './IncrementalMerger';
export type { IncrementalMergerOptions } from './IncrementalMerger';
export { FuzzyNameMatcher, StrictNameMatcher, levenshtein } from './NameMatcher';
export type { NameMatcher } from './NameMatcher';
export {
  PreferDetailedVoiceProfileMerger,
  PreferNewVoiceProfileMerger,
  PreferExistingVoiceProfileMerger,
} from './VoiceProfileMerger';
export type { VoiceProfileMerger } from './VoiceProfileMerger';
export { DEFAULT_VOICE_PROFILE, normalizeAge, normalizeGender, isDefaultProfile } from './VoiceProfile';

export * from './prompts';
