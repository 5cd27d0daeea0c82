import { describe, it, expect, vi } from 'vitest';
import { CharacterNamesPrompt } from '@/services/llm/prompts/CharacterNamesPrompt';
import { LLM_PROMPTS } from '@/config/prompts';
import { createMockLanguageModel, hangUntilAborted } from '@/test/mocks/MockLanguageModel';
import { createMockLogger } from '@/test/mocks/MockLogger';
import { PromptPass, tokensForAttempt } from './PromptPass';
import { passConfig } from './types';

const fastConfig = passConfig({ maxTokens: 256, temperature: 0.1, retryDelayMs: 0 });

describe('tokensForAttempt', () => {
  it('keeps the full allocation on the first attempt', () => {
    expect(tokensForAttempt(passConfig({ maxTokens: 1024, tokenReductionOnRetry: 500 }), 1)).toBe(1024);
  });

  it('reduces per retry and stops at the floor', () => {
    const config = passConfig({ maxTokens: 1024, tokenReductionOnRetry: 500 });
    expect(tokensForAttempt(config, 2)).toBe(524);
    expect(tokensForAttempt(config, 3)).toBe(64);
  });

  it('never raises an allocation that starts below the floor', () => {
    expect(tokensForAttempt(passConfig({ maxTokens: 32, tokenReductionOnRetry: 10 }), 3)).toBe(32);
  });
});

describe('PromptPass', () => {
  it('sends the prepared prompts with the pass config and parses the reply', async () => {
    const model = createMockLanguageModel('{"characters": ["Alice", "Bob"]}');
    const pass = new PromptPass(new CharacterNamesPrompt());

    const output = await pass.execute(model, { text: 'Alice met Bob.' }, fastConfig);

    expect(output).toEqual({ characterNames: ['Alice', 'Bob'] });
    expect(model.requests).toHaveLength(1);
    const [request] = model.requests;
    expect(request.systemPrompt).toBe(LLM_PROMPTS.characterNames.system);
    expect(request.userPrompt).toContain('Alice met Bob.');
    expect(request.maxTokens).toBe(256);
    expect(request.temperature).toBe(0.1);
    expect(request.promptId).toBe('character_extraction_v1');
    expect(pass.passId).toBe('character_extraction_v1');
  });

  it('retries model failures with fewer tokens each time', async () => {
    const model = createMockLanguageModel(new Error('engine busy'), new Error('engine busy'), '{"characters": ["Alice"]}');
    const pass = new PromptPass(new CharacterNamesPrompt());

    const output = await pass.execute(model, { text: 'Alice.' }, { ...fastConfig, tokenReductionOnRetry: 100 });

    expect(output).toEqual({ characterNames: ['Alice'] });
    expect(model.requests.map((r) => r.maxTokens)).toEqual([256, 156, 64]);
  });

  it('returns the empty output once every attempt has failed', async () => {
    const model = createMockLanguageModel().setDefault(new Error('engine down'));
    const logger = createMockLogger();
    const pass = new PromptPass(new CharacterNamesPrompt(), { logger });

    const output = await pass.execute(model, { text: 'Alice.' }, { ...fastConfig, maxRetries: 2 });

    expect(output).toEqual({ characterNames: [] });
    expect(model.generate).toHaveBeenCalledTimes(2);
    const [failure] = logger.callsAt('error');
    expect(failure.message).toBe('[character_extraction_v1] All attempts failed, returning empty output');
    expect(failure.error?.message).toBe('engine down');
    expect(logger.messagesAt('warn').filter((m) => m.includes('Attempt'))).toEqual([
      '[character_extraction_v1] Attempt 1 failed, retrying',
    ]);
  });

  it('does not retry a reply that fails to parse', async () => {
    const model = createMockLanguageModel('no json here at all');
    const pass = new PromptPass(new CharacterNamesPrompt());

    const output = await pass.execute(model, { text: 'Alice.' }, fastConfig);

    expect(output).toEqual({ characterNames: [] });
    expect(model.generate).toHaveBeenCalledTimes(1);
  });

  it('treats a call that outlives its timeout as a failure', async () => {
    const model = createMockLanguageModel(hangUntilAborted);
    const logger = createMockLogger();
    const pass = new PromptPass(new CharacterNamesPrompt(), { logger });

    const output = await pass.execute(model, { text: 'Alice.' }, { ...fastConfig, maxRetries: 1, timeoutMs: 20 });

    expect(output).toEqual({ characterNames: [] });
    expect(logger.callsAt('error')[0].error?.message).toBe('Model call timed out after 20ms');
    expect(model.requests[0].signal?.aborted).toBe(true);
  });

  it('propagates cancellation during a call', async () => {
    const model = createMockLanguageModel(hangUntilAborted);
    const controller = new AbortController();
    const pass = new PromptPass(new CharacterNamesPrompt());

    const pending = pass.execute(model, { text: 'Alice.' }, fastConfig, controller.signal);
    await vi.waitFor(() => expect(model.generate).toHaveBeenCalled());
    controller.abort();

    await expect(pending).rejects.toMatchObject({ code: 'OPERATION_CANCELLED' });
    expect(model.generate).toHaveBeenCalledTimes(1);
  });

  it('does not call the model once already cancelled', async () => {
    const model = createMockLanguageModel('{"characters": ["Alice"]}');
    const controller = new AbortController();
    controller.abort();
    const pass = new PromptPass(new CharacterNamesPrompt());

    await expect(pass.execute(model, { text: 'Alice.' }, fastConfig, controller.signal)).rejects.toMatchObject({
      code: 'OPERATION_CANCELLED',
    });
    expect(model.generate).not.toHaveBeenCalled();
  });
});
