// Batched Chapter Analysis
// One model call per paragraph batch, merged incrementally; resumable from any paragraph

import type { ILogger } from '@/services/Logger';
import { IncrementalMerger } from '@/services/llm/IncrementalMerger';
import type { LanguageModel } from '@/services/llm/LanguageModel';
import { splitParagraphs } from '@/services/llm/TextTruncation';
import {
  BatchedAnalysisPrompt,
  type BatchedAnalysisInput,
  type BatchedAnalysisOutput,
} from '@/services/llm/prompts/BatchedAnalysisPrompt';
import type { MergeState, MergedCharacter } from '@/state/types';
import type { CharacterRepository } from './CharacterRepository';
import { createBatches, type ParagraphBatch } from './ParagraphBatcher';
import { PromptPass } from './PromptPass';
import { BasePipelineStep, PASS_CONFIGS, type PassConfig, type ProgressCallback } from './types';

export interface BatchedChapterAnalysisOptions {
  model: LanguageModel;
  repository?: CharacterRepository;
  merger?: IncrementalMerger;
  passConfig?: PassConfig;
  logger?: ILogger;
}

export interface BatchedAnalysisRequest {
  bookId: string;
  chapterId: string;
  chapterText: string;
  /** Resume point; paragraphs before it are assumed already merged into initialState */
  startParagraphIndex?: number;
  initialState?: MergeState;
}

export interface BatchCompleteData {
  batch: ParagraphBatch;
  totalBatches: number;
  /** Cast so far, including this batch */
  characters: MergedCharacter[];
  /** Where a later run should resume */
  nextParagraphIndex: number;
  isFinalBatch: boolean;
}

export interface BatchedRunOptions {
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
  onBatchComplete?: (data: BatchCompleteData) => void | Promise<void>;
}

export interface BatchedAnalysisResult {
  characters: MergedCharacter[];
  batchCount: number;
  paragraphCount: number;
  dialogCount: number;
  resumed: boolean;
}

export class BatchedChapterAnalysis extends BasePipelineStep {
  readonly name = 'batched-analysis';

  private readonly model: LanguageModel;
  private readonly repository?: CharacterRepository;
  private readonly merger: IncrementalMerger;
  private readonly passConfig: PassConfig;
  private readonly logger?: ILogger;
  private readonly prompt: BatchedAnalysisPrompt;
  private readonly pass: PromptPass<BatchedAnalysisInput, BatchedAnalysisOutput>;

  constructor(options: BatchedChapterAnalysisOptions) {
    super();
    this.model = options.model;
    this.repository = options.repository;
    this.merger = options.merger ?? new IncrementalMerger({ logger: options.logger });
    this.passConfig = options.passConfig ?? PASS_CONFIGS.batchedAnalysis;
    this.logger = options.logger;
    this.prompt = new BatchedAnalysisPrompt({ logger: options.logger });
    this.pass = new PromptPass(this.prompt, { logger: options.logger });
  }

  async run(request: BatchedAnalysisRequest, options: BatchedRunOptions = {}): Promise<BatchedAnalysisResult> {
    const { signal, onBatchComplete } = options;
    if (options.onProgress) this.setProgressCallback(options.onProgress);
    this.checkCancelled(signal);

    const paragraphs = splitParagraphs(request.chapterText);
    const startParagraphIndex = request.startParagraphIndex ?? 0;
    const resumed = startParagraphIndex > 0 || (request.initialState?.size ?? 0) > 0;
    const state = request.initialState ?? this.merger.createState();
    if (resumed) {
      this.logger?.info(
        `[BatchedAnalysis] Resuming at paragraph ${startParagraphIndex}/${paragraphs.length} with ${state.size} characters`,
      );
    }

    const batches = createBatches(paragraphs, this.prompt.tokenBudget.inputTokens, startParagraphIndex, this.logger);

    for (const [index, batch] of batches.entries()) {
      this.checkCancelled(signal);
      this.reportProgress(index, batches.length, `Processing batch ${index + 1}/${batches.length}`);
      this.logger?.debug?.(
        `[BatchedAnalysis] Batch ${batch.batchIndex}: paragraphs ${batch.startParagraphIndex}-${batch.endParagraphIndex}`,
      );

      const output = await this.pass.execute(
        this.model,
        { text: batch.text, batchIndex: batch.batchIndex, totalBatches: batches.length },
        this.passConfig,
        signal,
      );
      this.merger.merge(state, output);

      await onBatchComplete?.({
        batch,
        totalBatches: batches.length,
        characters: this.merger.toList(state),
        nextParagraphIndex: batch.endParagraphIndex + 1,
        isFinalBatch: index === batches.length - 1,
      });
      this.logger?.info(`[BatchedAnalysis] Batch ${index + 1}/${batches.length} complete: ${state.size} characters`);
    }

    const characters = this.merger.toList(state);
    const dialogCount = characters.reduce((sum, character) => sum + character.dialogs.length, 0);

    if (this.repository) {
      await this.repository.saveCharacters(request.bookId, request.chapterId, characters);
    }

    this.reportProgress(batches.length, batches.length, 'Analysis complete');
    this.logger?.info(
      `[BatchedAnalysis] Complete: ${characters.length} characters, ${dialogCount} dialogs in ${batches.length} batches`,
    );

    return {
      characters,
      batchCount: batches.length,
      paragraphCount: paragraphs.length,
      dialogCount,
      resumed,
    };
  }
}

export function createBatchedChapterAnalysis(options: BatchedChapterAnalysisOptions): BatchedChapterAnalysis {
  return new BatchedChapterAnalysis(options);
}
