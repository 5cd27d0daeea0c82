import OpenAI from 'openai';
import type { ModelSettings } from '@/config';
import { defaultConfig } from '@/config';
import { getErrorMessage, modelUnavailableError } from '@/errors';
import type { ILogger } from '@/services/Logger';
import { isRecord, stripThinkingTags } from '@/utils/llmUtils';
import { DebugLogger } from './DebugLogger';
import type { GenerateRequest, LanguageModel } from './LanguageModel';

export interface LLMApiClientOptions {
  apiKey: string;
  apiUrl: string;
  model: string;
  streaming?: boolean;
  reasoning?: 'auto' | 'high' | 'medium' | 'low';
  topP?: number;
  timeoutMs?: number;
  debugLogger?: DebugLogger;
  logger?: ILogger;
}

export interface ConnectionTestResult {
  success: boolean;
  error?: string;
  model?: string;
}

type Provider = 'mistral' | 'openai' | 'unknown';

type RequestBody = Omit<OpenAI.ChatCompletionCreateParamsNonStreaming, 'stream'>;

/**
 * Detect provider from API URL or model name
 */
export function detectProvider(apiUrl: string, model: string): Provider {
  const lower = `${apiUrl} ${model}`.toLowerCase();
  if (lower.includes('mistral')) return 'mistral';
  if (lower.includes('openai')) return 'openai';
  return 'unknown';
}

/**
 * Apply provider-specific fixes to request body
 */
export function applyProviderFixes(requestBody: RequestBody, provider: Provider): RequestBody {
  if (provider === 'mistral') {
    // Mistral rejects top_p alongside temperature 0; it is safest not to send it
    const fixed = { ...requestBody };
    delete fixed.top_p;
    return fixed;
  }
  return requestBody;
}

const STATUS_MESSAGES: Record<number, string> = {
  400: 'Bad Request - Check API URL format',
  401: 'Unauthorized - Invalid API key',
  403: 'Forbidden - API key lacks permissions',
  404: 'Not Found - Model or endpoint not found',
  429: 'Rate Limited - Too many requests',
  500: 'Server Error - API provider issue',
  502: 'Bad Gateway - API provider unreachable',
  503: 'Service Unavailable - API provider down',
};

/**
 * Format API error for display
 */
export function formatApiError(e: unknown): string {
  if (typeof e === 'string') return e;
  if (!isRecord(e)) return 'Unknown error';

  // OpenAI SDK error body
  if (isRecord(e.error) && typeof e.error.message === 'string') {
    return e.error.message;
  }
  if (typeof e.status === 'number') {
    return STATUS_MESSAGES[e.status] ?? `HTTP ${e.status}: ${typeof e.statusText === 'string' ? e.statusText : 'Error'}`;
  }

  const message = typeof e.message === 'string' ? e.message : '';
  const code = isRecord(e.cause) ? e.cause.code : undefined;
  if (code === 'ENOTFOUND' || code === 'ECONNREFUSED' || message.includes('fetch')) {
    return 'Network Error - Check API URL and server status';
  }
  if (/timeout/i.test(message)) {
    return 'Request Timeout - Server took too long to respond';
  }
  return message || getErrorMessage(e);
}

/**
 * LanguageModel backed by any OpenAI-compatible chat completions server
 * (OpenAI, Mistral, llama.cpp, Ollama, LM Studio, vLLM).
 * Retries belong to the caller; the SDK's own retries are off.
 */
export class LLMApiClient implements LanguageModel {
  private options: LLMApiClientOptions;
  private logger?: ILogger;
  private client: OpenAI;
  private debugLogger?: DebugLogger;
  private provider: Provider;

  constructor(options: LLMApiClientOptions) {
    this.options = options;
    this.logger = options.logger;
    this.debugLogger = options.debugLogger;
    this.provider = detectProvider(options.apiUrl, options.model);

    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.apiUrl,
      maxRetries: 0,
      timeout: options.timeoutMs ?? defaultConfig.llm.requestTimeoutMs,
    });
  }

  /**
   * Reset debug logging flags, e.g. for a new book
   */
  resetLogging(): void {
    this.debugLogger?.resetLogging();
  }

  async generate(request: GenerateRequest): Promise<string> {
    const tag = request.promptId ?? 'generate';
    const requestBody = this.buildRequestBody(request);

    if (this.debugLogger?.shouldLog(tag)) {
      await this.debugLogger.saveLog(`${tag}_request.json`, requestBody);
    }

    this.logger?.info(
      `[${tag}] API call starting... temp=${requestBody.temperature ?? '-'} max_tokens=${request.maxTokens}`,
    );

    let content: string;
    try {
      content = this.options.streaming
        ? await this.createStreaming(requestBody, request.signal)
        : await this.createNonStreaming(requestBody, request.signal);
    } catch (e) {
      if (request.signal?.aborted) throw e;
      throw modelUnavailableError(formatApiError(e), e);
    }

    this.logger?.info(`[${tag}] API call completed (${content.length} chars)`);

    if (this.debugLogger?.shouldLog(tag)) {
      await this.debugLogger.saveLog(`${tag}_response.json`, {
        choices: [{ message: { content } }],
        model: this.options.model,
      });
      this.debugLogger.markLogged(tag);
    }

    return stripThinkingTags(content).trim();
  }

  private buildRequestBody(request: GenerateRequest): RequestBody {
    const body: RequestBody = {
      model: this.options.model,
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.userPrompt },
      ],
      max_tokens: request.maxTokens,
    };

    const { reasoning } = this.options;
    if (reasoning) {
      // Reasoning models reject temperature and top_p
      if (reasoning !== 'auto') body.reasoning_effort = reasoning;
    } else {
      body.temperature = request.temperature;
      body.top_p = this.options.topP ?? 0.95;
    }

    return applyProviderFixes(body, this.provider);
  }

  private async createNonStreaming(body: RequestBody, signal?: AbortSignal): Promise<string> {
    const response = await this.client.chat.completions.create({ ...body, stream: false }, { signal });
    return response.choices[0]?.message?.content ?? '';
  }

  private async createStreaming(body: RequestBody, signal?: AbortSignal): Promise<string> {
    const stream = await this.client.chat.completions.create({ ...body, stream: true }, { signal });
    let content = '';
    for await (const chunk of stream) {
      content += chunk.choices[0]?.delta?.content ?? '';
    }
    return content;
  }

  /**
   * Test API connection with a real completion request (non-streaming)
   */
  async testConnection(): Promise<ConnectionTestResult> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.options.model,
        messages: [{ role: 'user', content: 'Reply with: ok' }],
        max_tokens: 10,
        stream: false,
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        return { success: false, error: 'Empty response from model' };
      }

      return { success: true, model: response.model };
    } catch (e) {
      return { success: false, error: formatApiError(e) };
    }
  }

  /**
   * Test API connection with streaming (SSE) endpoint
   */
  async testConnectionStreaming(): Promise<ConnectionTestResult> {
    try {
      const stream = await this.client.chat.completions.create({
        model: this.options.model,
        messages: [{ role: 'user', content: 'Reply with: ok' }],
        max_tokens: 10,
        stream: true,
      });

      let content = '';
      let model = '';

      for await (const chunk of stream) {
        model = chunk.model || model;
        content += chunk.choices[0]?.delta?.content ?? '';
      }

      if (!content) {
        return { success: false, error: 'Empty response from streaming endpoint' };
      }

      return { success: true, model };
    } catch (e) {
      return { success: false, error: formatApiError(e) };
    }
  }
}

/**
 * Build a client from validated settings, with request logging when debugDir is set
 */
export function createLLMApiClient(settings: ModelSettings, logger?: ILogger): LLMApiClient {
  return new LLMApiClient({
    apiKey: settings.apiKey,
    apiUrl: settings.apiUrl,
    model: settings.model,
    streaming: settings.streaming,
    reasoning: settings.reasoning,
    topP: settings.topP,
    timeoutMs: settings.requestTimeoutMs,
    debugLogger: settings.debugDir ? new DebugLogger(settings.debugDir, logger) : undefined,
    logger,
  });
}
