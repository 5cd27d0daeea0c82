import { describe, it, expect } from 'vitest';
import { defaultConfig, modelSettingsFromEnv, parseModelSettings } from '@/config';
import { AppError } from '@/errors';

describe('defaultConfig.llm', () => {
  it('contextWindow should be 4096', () => {
    expect(defaultConfig.llm.contextWindow).toBe(4096);
  });

  it('charsPerToken should be 4', () => {
    expect(defaultConfig.llm.charsPerToken).toBe(4);
  });

  it('batched temperature is near-greedy', () => {
    expect(defaultConfig.llm.batchedTemperature).toBe(0.01);
  });
});

describe('defaultConfig.retry', () => {
  it('backs off from one second up to thirty', () => {
    expect(defaultConfig.retry).toEqual({ baseDelayMs: 1000, maxDelayMs: 30000 });
  });
});

describe('parseModelSettings', () => {
  it('applies defaults', () => {
    const settings = parseModelSettings({ apiUrl: 'http://localhost:8080/v1', model: 'qwen' });
    expect(settings).toEqual({
      apiUrl: 'http://localhost:8080/v1',
      apiKey: 'not-needed',
      model: 'qwen',
      streaming: false,
      requestTimeoutMs: 180_000,
    });
  });

  it('throws INVALID_CONFIG for a missing model', () => {
    try {
      parseModelSettings({ apiUrl: 'http://localhost:8080/v1' });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(AppError);
      expect(e instanceof AppError && e.code).toBe('INVALID_CONFIG');
    }
  });

  it('rejects a malformed URL', () => {
    expect(() => parseModelSettings({ apiUrl: 'not a url', model: 'qwen' })).toThrow(AppError);
  });
});

describe('modelSettingsFromEnv', () => {
  it('reads LLM_* variables', () => {
    const settings = modelSettingsFromEnv({
      LLM_API_URL: 'http://127.0.0.1:11434/v1',
      LLM_API_KEY: 'test-key',
      LLM_MODEL: 'gemma',
      LLM_STREAMING: 'true',
      LLM_DEBUG_DIR: '/tmp/debug',
    });
    expect(settings.apiKey).toBe('test-key');
    expect(settings.model).toBe('gemma');
    expect(settings.streaming).toBe(true);
    expect(settings.debugDir).toBe('/tmp/debug');
  });

  it('treats empty key as unset', () => {
    const settings = modelSettingsFromEnv({ LLM_API_URL: 'http://localhost:1234/v1', LLM_MODEL: 'm', LLM_API_KEY: '' });
    expect(settings.apiKey).toBe('not-needed');
  });
});
