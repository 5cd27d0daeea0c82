// Service Singletons and Factories
// ES Modules handle singletons naturally - no DI container needed

import type { ModelSettings } from '@/config';
import { createLLMApiClient, type LLMApiClient } from './llm/LLMApiClient';
import { createLogger, type Logger, type LoggerStore } from './Logger';
import { BatchedChapterAnalysis } from './pipeline/BatchedChapterAnalysis';
import { BookInsightsService } from './pipeline/BookInsightsService';
import { ChapterAnalysisWorkflow } from './pipeline/ChapterAnalysisWorkflow';
import type { CharacterRepository } from './pipeline/CharacterRepository';
import { StoryService } from './pipeline/StoryService';
import type { WorkflowConfig } from './pipeline/WorkflowConfig';

// ============================================================================
// Core Singletons (initialized once)
// ============================================================================

let loggerInstance: Logger | null = null;

/**
 * Get or create the logger singleton
 */
export function getLogger(store?: LoggerStore): Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger({ store });
  }
  return loggerInstance;
}

/**
 * Reset the logger singleton (for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}

// ============================================================================
// Analysis Services Bundle
// ============================================================================

export interface AnalysisServicesOptions {
  workflow?: WorkflowConfig;
  repository?: CharacterRepository;
  logger?: Logger;
}

export interface AnalysisServices {
  client: LLMApiClient;
  chapterAnalysis: ChapterAnalysisWorkflow;
  batchedAnalysis: BatchedChapterAnalysis;
  insights: BookInsightsService;
  story: StoryService;
}

/**
 * Create every analysis service against one model client
 */
export function createAnalysisServices(
  settings: ModelSettings,
  options: AnalysisServicesOptions = {},
): AnalysisServices {
  const logger = options.logger ?? getLogger();
  const model = createLLMApiClient(settings, logger.child('llm'));

  return {
    client: model,
    chapterAnalysis: new ChapterAnalysisWorkflow({ model, config: options.workflow, logger }),
    batchedAnalysis: new BatchedChapterAnalysis({ model, repository: options.repository, logger }),
    insights: new BookInsightsService({ model, logger }),
    story: new StoryService({ model, logger }),
  };
}

// ============================================================================
// Re-exports for convenience
// ============================================================================

export { createLogger, createLoggerStore, Logger, LoggerStore } from './Logger';
export type { ILogger, LogEntry, LogLevel, LoggerOptions } from './Logger';
