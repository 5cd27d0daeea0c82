import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import OpenAI from 'openai';
import { DebugLogger } from './DebugLogger';
import { LLMApiClient, applyProviderFixes, createLLMApiClient, detectProvider, formatApiError } from './LLMApiClient';
import { MockLogger } from '@/test/mocks/MockLogger';

const { mockCreate } = vi.hoisted(() => ({ mockCreate: vi.fn() }));

vi.mock('openai', () => ({
  default: vi.fn().mockImplementation(function () {
    return { chat: { completions: { create: mockCreate } } };
  }),
}));

function completion(content: string | null) {
  return { choices: [{ message: { content } }], model: 'test-model' };
}

async function* chunks(...parts: string[]) {
  for (const part of parts) {
    yield { model: 'test-model', choices: [{ delta: { content: part } }] };
  }
}

const baseOptions = { apiKey: 'test-key', apiUrl: 'http://localhost:8080/v1', model: 'test-model' };
const request = { systemPrompt: 'sys', userPrompt: 'user', maxTokens: 100, temperature: 0.2 };

describe('detectProvider / applyProviderFixes', () => {
  it('recognizes providers from URL or model', () => {
    expect(detectProvider('https://api.mistral.ai/v1', 'small')).toBe('mistral');
    expect(detectProvider('http://localhost', 'openai/gpt-oss')).toBe('openai');
    expect(detectProvider('http://localhost', 'qwen')).toBe('unknown');
  });

  it('drops top_p for mistral only', () => {
    const body = { model: 'm', messages: [], top_p: 0.9 };
    expect(applyProviderFixes(body, 'mistral')).toEqual({ model: 'm', messages: [] });
    expect(applyProviderFixes(body, 'openai')).toBe(body);
  });
});

describe('formatApiError', () => {
  it('maps SDK errors to readable text', () => {
    expect(formatApiError({ error: { message: 'model not loaded' } })).toBe('model not loaded');
    expect(formatApiError({ status: 401 })).toBe('Unauthorized - Invalid API key');
    expect(formatApiError({ status: 418, statusText: 'Teapot' })).toBe('HTTP 418: Teapot');
    expect(formatApiError(new Error('fetch failed'))).toBe('Network Error - Check API URL and server status');
    expect(formatApiError(new Error('Connection timeout'))).toBe('Request Timeout - Server took too long to respond');
    expect(formatApiError(new Error('boom'))).toBe('boom');
    expect(formatApiError('plain')).toBe('plain');
    expect(formatApiError(42)).toBe('Unknown error');
  });
});

describe('LLMApiClient', () => {
  beforeEach(() => {
    mockCreate.mockReset();
  });

  it('creates the SDK client without its own retries', () => {
    new LLMApiClient({ ...baseOptions, timeoutMs: 5000 });
    expect(OpenAI).toHaveBeenCalledWith({
      apiKey: 'test-key',
      baseURL: 'http://localhost:8080/v1',
      maxRetries: 0,
      timeout: 5000,
    });
  });

  it('sends both prompts and returns cleaned content', async () => {
    mockCreate.mockResolvedValue(completion('<think>hmm</think> {"a":1} '));
    const client = new LLMApiClient(baseOptions);

    await expect(client.generate(request)).resolves.toBe('{"a":1}');
    expect(mockCreate).toHaveBeenCalledWith(
      {
        model: 'test-model',
        messages: [
          { role: 'system', content: 'sys' },
          { role: 'user', content: 'user' },
        ],
        max_tokens: 100,
        temperature: 0.2,
        top_p: 0.95,
        stream: false,
      },
      { signal: undefined },
    );
  });

  it('omits sampling parameters for reasoning models', async () => {
    mockCreate.mockResolvedValue(completion('ok'));
    const client = new LLMApiClient({ ...baseOptions, reasoning: 'high' });

    await client.generate(request);

    const body = mockCreate.mock.calls[0][0];
    expect(body.reasoning_effort).toBe('high');
    expect(body).not.toHaveProperty('temperature');
    expect(body).not.toHaveProperty('top_p');
  });

  it('returns an empty string for empty content', async () => {
    mockCreate.mockResolvedValue(completion(null));
    const client = new LLMApiClient(baseOptions);
    await expect(client.generate(request)).resolves.toBe('');
  });

  it('concatenates streamed chunks', async () => {
    mockCreate.mockResolvedValue(chunks('{"a"', ':1}'));
    const client = new LLMApiClient({ ...baseOptions, streaming: true });

    await expect(client.generate(request)).resolves.toBe('{"a":1}');
    expect(mockCreate.mock.calls[0][0].stream).toBe(true);
  });

  it('wraps API failures as unavailable-model errors', async () => {
    mockCreate.mockRejectedValue({ status: 503 });
    const client = new LLMApiClient(baseOptions);

    await expect(client.generate(request)).rejects.toMatchObject({
      code: 'MODEL_UNAVAILABLE',
      message: 'Service Unavailable - API provider down',
    });
  });

  it('rethrows untouched once the caller aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const abort = Object.assign(new Error('Request was aborted.'), { name: 'AbortError' });
    mockCreate.mockRejectedValue(abort);
    const client = new LLMApiClient(baseOptions);

    await expect(client.generate({ ...request, signal: controller.signal })).rejects.toBe(abort);
  });

  it('logs call start and completion', async () => {
    mockCreate.mockResolvedValue(completion('hello'));
    const logger = new MockLogger();
    const client = new LLMApiClient({ ...baseOptions, logger });

    await client.generate({ ...request, promptId: 'demo_v1' });

    expect(logger.messagesAt('info')).toEqual([
      '[demo_v1] API call starting... temp=0.2 max_tokens=100',
      '[demo_v1] API call completed (5 chars)',
    ]);
  });

  describe('testConnection', () => {
    it('reports the served model', async () => {
      mockCreate.mockResolvedValue(completion('ok'));
      const client = new LLMApiClient(baseOptions);
      await expect(client.testConnection()).resolves.toEqual({ success: true, model: 'test-model' });
    });

    it('reports an empty reply', async () => {
      mockCreate.mockResolvedValue(completion(''));
      const client = new LLMApiClient(baseOptions);
      await expect(client.testConnection()).resolves.toEqual({ success: false, error: 'Empty response from model' });
    });

    it('reports a readable error', async () => {
      mockCreate.mockRejectedValue({ status: 404 });
      const client = new LLMApiClient(baseOptions);
      await expect(client.testConnection()).resolves.toEqual({
        success: false,
        error: 'Not Found - Model or endpoint not found',
      });
    });

    it('checks the streaming endpoint', async () => {
      mockCreate.mockResolvedValue(chunks('o', 'k'));
      const client = new LLMApiClient(baseOptions);
      await expect(client.testConnectionStreaming()).resolves.toEqual({ success: true, model: 'test-model' });
    });
  });

  describe('debug logging', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'llm-client-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('writes the first request and response per prompt id', async () => {
      mockCreate.mockResolvedValueOnce(completion('first')).mockResolvedValueOnce(completion('second'));
      const client = new LLMApiClient({ ...baseOptions, debugLogger: new DebugLogger(dir) });

      await client.generate({ ...request, promptId: 'names_v1' });
      await client.generate({ ...request, promptId: 'names_v1' });

      const response = JSON.parse(await readFile(join(dir, 'logs', 'names_v1_response.json'), 'utf8'));
      expect(response.choices[0].message.content).toBe('first');
      const sent = JSON.parse(await readFile(join(dir, 'logs', 'names_v1_request.json'), 'utf8'));
      expect(sent.max_tokens).toBe(100);
    });

    it('is enabled from settings with a debug directory', async () => {
      mockCreate.mockResolvedValue(completion('x'));
      const client = createLLMApiClient({
        apiUrl: 'http://localhost:8080/v1',
        apiKey: 'test-key',
        model: 'test-model',
        streaming: false,
        requestTimeoutMs: 1000,
        debugDir: dir,
      });

      await client.generate(request);

      const sent = JSON.parse(await readFile(join(dir, 'logs', 'generate_request.json'), 'utf8'));
      expect(sent.model).toBe('test-model');
    });
  });
});
