import { describe, it, expect, vi } from 'vitest';
import type { GenerateRequest } from '@/services/llm/LanguageModel';
import { createMockLanguageModel, hangUntilAborted, type MockReply } from '@/test/mocks/MockLanguageModel';
import { createMockLogger } from '@/test/mocks/MockLogger';
import { ChapterAnalysisWorkflow, segmentText } from './ChapterAnalysisWorkflow';
import { CHARACTER_ONLY, TWO_PASS, WorkflowConfigBuilder } from './WorkflowConfig';
import { PASS_CONFIGS, type PipelineProgress } from './types';

const CHAPTER = ['Alice walked in.', '"Hello, Bob," said Alice.', '"Hi," Bob replied.'].join('\n\n');

/** Replies per prompt id, in call order */
function scripted(replies: Record<string, Array<string | Error>>): MockReply {
  return (request: GenerateRequest) => {
    const next = replies[request.promptId ?? '']?.shift() ?? '';
    if (next instanceof Error) throw next;
    return next;
  };
}

const fastThreePass = new WorkflowConfigBuilder()
  .name('Fast test workflow')
  .withTraitsExtraction()
  .pass1Config({ ...PASS_CONFIGS.characterExtraction, maxRetries: 1, retryDelayMs: 0 })
  .pass2Config({ ...PASS_CONFIGS.dialogExtraction, maxRetries: 1, retryDelayMs: 0 })
  .pass3Config({ ...PASS_CONFIGS.traitsExtraction, maxRetries: 1, retryDelayMs: 0 })
  .build();

const ALICE_TRAITS =
  '{"character": "Alice", "traits": ["curious", "brave"], "voice_profile": {"gender": "female", "age": "young", "accent": "British", "pitch": 1.2, "speed": 1.0}}';

describe('segmentText', () => {
  it('keeps paragraphs whole', () => {
    expect(segmentText(CHAPTER, 30)).toEqual(['Alice walked in.', '"Hello, Bob," said Alice.', '"Hi," Bob replied.']);
    expect(segmentText(CHAPTER, 1000)).toEqual([CHAPTER]);
  });
});

describe('ChapterAnalysisWorkflow', () => {
  it('runs all three passes and merges the result', async () => {
    const model = createMockLanguageModel().setDefault(
      scripted({
        character_extraction_v1: ['{"characters": ["Alice", "Bob"]}'],
        dialog_extraction_v1: [
          '{"dialogs": [' +
            '{"speaker": "Alice", "text": "Hello, Bob", "emotion": "Happy", "intensity": 0.7},' +
            '{"speaker": "Bob", "text": "Hi", "emotion": "neutral", "intensity": 0.4},' +
            '{"speaker": "Narrator", "text": "Alice walked in.", "emotion": "neutral", "intensity": 0.5}]}',
        ],
        traits_extraction_v1: [ALICE_TRAITS, '{"traits": ["gruff"]}'],
      }),
    );
    const workflow = new ChapterAnalysisWorkflow({ model, config: fastThreePass });

    const result = await workflow.run(CHAPTER);

    expect(model.requests.map((r) => r.promptId)).toEqual([
      'character_extraction_v1',
      'dialog_extraction_v1',
      'traits_extraction_v1',
      'traits_extraction_v1',
    ]);
    expect(result.dialogs).toHaveLength(3);
    expect(result.dialogs[0]).toEqual({ speaker: 'Alice', text: 'Hello, Bob', emotion: 'happy', intensity: 0.7 });

    expect(result.characters.map((c) => c.name)).toEqual(['Alice', 'Bob']);
    const [alice, bob] = result.characters;
    expect(alice.dialogs).toEqual(['Hello, Bob']);
    expect(alice.traits).toEqual(['curious', 'brave']);
    expect(alice.voiceProfile).toEqual({ gender: 'female', age: 'young', accent: 'british', pitch: 1.2, speed: 1.0 });
    expect(bob.traits).toEqual(['gruff']);
    expect(bob.voiceProfile).toBeUndefined();
  });

  it('gives the traits pass the segments the character appeared in', async () => {
    const model = createMockLanguageModel().setDefault(
      scripted({
        character_extraction_v1: ['{"characters": ["Alice"]}'],
        traits_extraction_v1: [ALICE_TRAITS],
      }),
    );
    const workflow = new ChapterAnalysisWorkflow({ model, config: fastThreePass });

    await workflow.run(CHAPTER);

    const traitsRequest = model.requests.find((r) => r.promptId === 'traits_extraction_v1');
    expect(traitsRequest?.userPrompt).toContain('"Hello, Bob," said Alice.');
  });

  it('keeps running later passes when one pass fails', async () => {
    const model = createMockLanguageModel().setDefault(
      scripted({
        character_extraction_v1: ['{"characters": ["Alice", "Bob"]}'],
        dialog_extraction_v1: [new Error('engine down')],
        traits_extraction_v1: [ALICE_TRAITS, '{"traits": ["gruff"]}'],
      }),
    );
    const logger = createMockLogger();
    const workflow = new ChapterAnalysisWorkflow({ model, config: fastThreePass, logger });

    const result = await workflow.run(CHAPTER);

    expect(result.dialogs).toEqual([]);
    expect(result.characters.map((c) => [c.name, c.dialogs.length, c.traits])).toEqual([
      ['Alice', 0, ['curious', 'brave']],
      ['Bob', 0, ['gruff']],
    ]);
    expect(logger.messagesAt('error')).toEqual(['[dialog_extraction_v1] All attempts failed, returning empty output']);
  });

  it('skips dialog extraction when no names were found', async () => {
    const model = createMockLanguageModel().setDefault(scripted({ character_extraction_v1: ['{"characters": []}'] }));
    const logger = createMockLogger();
    const workflow = new ChapterAnalysisWorkflow({ model, config: TWO_PASS, logger });

    const result = await workflow.run(CHAPTER);

    expect(result).toEqual({ characters: [], dialogs: [] });
    expect(model.generate).toHaveBeenCalledTimes(1);
    expect(logger.hasMessage('Skipping Pass 2')).toBe(true);
  });

  it('adds named speakers Pass 1 missed but never the narrator', async () => {
    const model = createMockLanguageModel().setDefault(
      scripted({
        character_extraction_v1: ['{"characters": ["Alice"]}'],
        dialog_extraction_v1: [
          '[{"Alice": "Hello, Bob"}, {"Guard": "Halt!"}, {"Guard": "Who goes there?"}, {"Narrator": "Alice walked in."}]',
        ],
      }),
    );
    const workflow = new ChapterAnalysisWorkflow({ model, config: TWO_PASS });

    const result = await workflow.run(CHAPTER);

    expect(result.characters.map((c) => [c.name, c.dialogs])).toEqual([
      ['Guard', ['Halt!', 'Who goes there?']],
      ['Alice', ['Hello, Bob']],
    ]);
  });

  it('dedupes names across segments and reports progress per segment', async () => {
    const model = createMockLanguageModel().setDefault(
      scripted({
        character_extraction_v1: ['{"characters": ["Alice"]}', '{"characters": ["alice", "Bob"]}', '{"characters": ["Bob"]}'],
      }),
    );
    const config = { ...CHARACTER_ONLY, segmentSizePass1: 30 };
    const workflow = new ChapterAnalysisWorkflow({ model, config });
    const progress: PipelineProgress[] = [];
    workflow.setProgressCallback((p) => progress.push(p));

    const result = await workflow.run(CHAPTER);

    expect(result.characters.map((c) => c.name)).toEqual(['Alice', 'Bob']);
    expect(model.generate).toHaveBeenCalledTimes(3);
    expect(progress.map((p) => p.message)).toEqual([
      'Pass 1: Segment 1/3',
      'Pass 1: Segment 2/3',
      'Pass 1: Segment 3/3',
      'Analyzed 2 character(s)',
    ]);
    expect(progress[3]).toEqual({ step: 'chapter-analysis', current: 1, total: 1, message: 'Analyzed 2 character(s)' });
  });

  it('rejects with a cancellation when aborted before starting', async () => {
    const model = createMockLanguageModel();
    const controller = new AbortController();
    controller.abort();
    const workflow = new ChapterAnalysisWorkflow({ model });

    await expect(workflow.run(CHAPTER, controller.signal)).rejects.toMatchObject({ code: 'OPERATION_CANCELLED' });
    expect(model.generate).not.toHaveBeenCalled();
  });

  it('propagates cancellation from inside a pass', async () => {
    const model = createMockLanguageModel(hangUntilAborted);
    const controller = new AbortController();
    const workflow = new ChapterAnalysisWorkflow({ model, config: fastThreePass });

    const pending = workflow.run(CHAPTER, controller.signal);
    await vi.waitFor(() => expect(model.generate).toHaveBeenCalled());
    controller.abort();

    await expect(pending).rejects.toMatchObject({ code: 'OPERATION_CANCELLED' });
    expect(model.generate).toHaveBeenCalledTimes(1);
  });
});
