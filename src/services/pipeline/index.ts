// Pipeline Module
// Passes, workflow presets and the orchestrators built on them

export type { AnalysisPass, PassConfig, PipelineProgress, ProgressCallback } from './types';
export { BasePipelineStep, DEFAULT_PASS_CONFIG, PASS_CONFIGS, passConfig, isolate } from './types';
export { PromptPass, tokensForAttempt } from './PromptPass';
export type { PromptPassOptions } from './PromptPass';

export {
  TWO_PASS,
  THREE_PASS,
  CHARACTER_ONLY,
  WorkflowConfigBuilder,
  forFastModel,
  forRichModel,
  passCount,
} from './WorkflowConfig';
export type { WorkflowConfig } from './WorkflowConfig';

export { batchParagraphs, createBatches, estimateBatchCount } from './ParagraphBatcher';
export type { ParagraphBatch } from './ParagraphBatcher';
export { InMemoryCharacterRepository } from './CharacterRepository';
export type { CharacterRepository } from './CharacterRepository';

export { ChapterAnalysisWorkflow, createChapterAnalysisWorkflow, segmentText } from './ChapterAnalysisWorkflow';
export type { ChapterAnalysisWorkflowOptions, ChapterAnalysisResult } from './ChapterAnalysisWorkflow';
export { BatchedChapterAnalysis, createBatchedChapterAnalysis } from './BatchedChapterAnalysis';
export type {
  BatchedChapterAnalysisOptions,
  BatchedAnalysisRequest,
  BatchedAnalysisResult,
  BatchedRunOptions,
  BatchCompleteData,
} from './BatchedChapterAnalysis';
export { BookInsightsService, createBookInsightsService } from './BookInsightsService';
export type {
  BookInsightsServiceOptions,
  BookInsightsRequest,
  BookInsights,
  ChapterText,
  InsightPassConfigs,
} from './BookInsightsService';
export { StoryService } from './StoryService';
export type { StoryServiceOptions } from './StoryService';
