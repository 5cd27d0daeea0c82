import { describe, it, expect } from 'vitest';
import { createParagraphs } from '@/test/factories';
import { createMockLogger } from '@/test/mocks/MockLogger';
import { batchParagraphs, createBatches, estimateBatchCount } from './ParagraphBatcher';

describe('batchParagraphs', () => {
  it('returns nothing for no paragraphs', () => {
    expect(batchParagraphs([], 100)).toEqual([]);
  });

  it('packs whole paragraphs up to the limit', () => {
    // 3 x 30 chars + 2 separators = 94 fits in 100; the fourth does not
    const paragraphs = createParagraphs(5, 30);
    const batches = batchParagraphs(paragraphs, 100);

    expect(batches.map((b) => [b.startParagraphIndex, b.endParagraphIndex])).toEqual([
      [0, 2],
      [3, 4],
    ]);
    expect(batches[0].text).toBe(paragraphs.slice(0, 3).join('\n\n'));
    expect(batches[0].text.length).toBe(94);
    expect(batches[0].paragraphCount).toBe(3);
    expect(batches[0].estimatedTokens).toBe(23);
    expect(batches[1].batchIndex).toBe(1);
  });

  it('never exceeds the limit unless one paragraph does', () => {
    const paragraphs = [...createParagraphs(2, 40), 'y'.repeat(250), ...createParagraphs(3, 40)];
    const batches = batchParagraphs(paragraphs, 100);

    for (const batch of batches) {
      if (batch.paragraphCount > 1) expect(batch.text.length).toBeLessThanOrEqual(100);
    }
    const oversized = batches.find((b) => b.text.length > 100);
    expect(oversized).toMatchObject({ startParagraphIndex: 2, endParagraphIndex: 2, paragraphCount: 1 });
    expect(batches.reduce((sum, b) => sum + b.paragraphCount, 0)).toBe(paragraphs.length);
  });

  it('resumes from a paragraph index with global indices', () => {
    const paragraphs = createParagraphs(6, 30);
    const batches = batchParagraphs(paragraphs, 100, 4);

    expect(batches).toHaveLength(1);
    expect(batches[0]).toMatchObject({ batchIndex: 0, startParagraphIndex: 4, endParagraphIndex: 5, paragraphCount: 2 });
  });

  it('returns nothing when resuming past the end', () => {
    const logger = createMockLogger();
    expect(batchParagraphs(createParagraphs(2, 10), 100, 2, logger)).toEqual([]);
    expect(logger.messagesAt('debug')).toEqual(['[ParagraphBatcher] Nothing to batch from paragraph 2 of 2']);
  });
});

describe('createBatches', () => {
  it('converts the token budget to characters', () => {
    // 25 tokens = 100 chars
    const paragraphs = createParagraphs(5, 30);
    expect(createBatches(paragraphs, 25)).toEqual(batchParagraphs(paragraphs, 100));
    expect(estimateBatchCount(paragraphs, 25)).toBe(2);
  });
});
