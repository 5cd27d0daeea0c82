// Paragraph Batcher
// Groups whole paragraphs into batches that fit an input budget

import { defaultConfig } from '@/config';
import type { ILogger } from '@/services/Logger';

const SEPARATOR = '\n\n';

export interface ParagraphBatch {
  /** 0-based */
  batchIndex: number;
  /** Global index of the first paragraph */
  startParagraphIndex: number;
  /** Global index of the last paragraph, inclusive */
  endParagraphIndex: number;
  text: string;
  paragraphCount: number;
  estimatedTokens: number;
}

/**
 * Batch paragraphs so each batch's text stays within maxChars.
 * A paragraph is never split; one longer than maxChars gets a batch of its own.
 * Indices are global, offset by startParagraphIndex, so a run can resume mid-chapter.
 */
export function batchParagraphs(
  paragraphs: readonly string[],
  maxChars: number,
  startParagraphIndex = 0,
  logger?: ILogger,
): ParagraphBatch[] {
  const start = Math.max(0, startParagraphIndex);
  if (start >= paragraphs.length) {
    logger?.debug?.(`[ParagraphBatcher] Nothing to batch from paragraph ${start} of ${paragraphs.length}`);
    return [];
  }

  const batches: ParagraphBatch[] = [];
  let current: string[] = [];
  let currentLength = 0;
  let currentStart = start;

  const flush = (endIndex: number) => {
    const text = current.join(SEPARATOR);
    batches.push({
      batchIndex: batches.length,
      startParagraphIndex: currentStart,
      endParagraphIndex: endIndex,
      text,
      paragraphCount: current.length,
      estimatedTokens: Math.floor(text.length / defaultConfig.llm.charsPerToken),
    });
  };

  for (let index = start; index < paragraphs.length; index++) {
    const paragraph = paragraphs[index];
    const separator = current.length > 0 ? SEPARATOR.length : 0;
    if (current.length > 0 && currentLength + separator + paragraph.length > maxChars) {
      flush(index - 1);
      current = [];
      currentLength = 0;
      currentStart = index;
    }
    currentLength += (current.length > 0 ? SEPARATOR.length : 0) + paragraph.length;
    current.push(paragraph);
  }
  flush(paragraphs.length - 1);

  logger?.info(
    `[ParagraphBatcher] Created ${batches.length} batches from ${paragraphs.length - start} paragraphs (maxChars=${maxChars})`,
  );
  return batches;
}

/**
 * Token-denominated entry point: maxInputTokens excludes the prompt template
 */
export function createBatches(
  paragraphs: readonly string[],
  maxInputTokens: number,
  startParagraphIndex = 0,
  logger?: ILogger,
): ParagraphBatch[] {
  return batchParagraphs(paragraphs, maxInputTokens * defaultConfig.llm.charsPerToken, startParagraphIndex, logger);
}

export function estimateBatchCount(paragraphs: readonly string[], maxInputTokens: number): number {
  return createBatches(paragraphs, maxInputTokens).length;
}
