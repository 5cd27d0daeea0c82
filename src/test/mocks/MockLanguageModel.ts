// Mock Language Model
// Scripted replies in call order; records every request

import { vi } from 'vitest';
import type { GenerateRequest, LanguageModel } from '@/services/llm/LanguageModel';

export type MockReply = string | Error | ((request: GenerateRequest) => string | Promise<string>);

export class MockLanguageModel implements LanguageModel {
  public requests: GenerateRequest[] = [];
  private queue: MockReply[] = [];
  private fallback: MockReply = '';

  generate = vi.fn(async (request: GenerateRequest): Promise<string> => {
    this.requests.push(request);
    const reply = this.queue.shift() ?? this.fallback;
    if (reply instanceof Error) throw reply;
    return typeof reply === 'function' ? reply(request) : reply;
  });

  /** Replies used once each, in order */
  enqueue(...replies: MockReply[]): this {
    this.queue.push(...replies);
    return this;
  }

  /** Reply used once the queue is empty */
  setDefault(reply: MockReply): this {
    this.fallback = reply;
    return this;
  }

  userPrompts(): string[] {
    return this.requests.map((r) => r.userPrompt);
  }

  reset(): void {
    this.requests = [];
    this.queue = [];
    this.fallback = '';
    this.generate.mockClear();
  }
}

/** A reply that never settles on its own; it rejects when the request is aborted */
export const hangUntilAborted: MockReply = (request) =>
  new Promise<string>((_, reject) => {
    request.signal?.addEventListener('abort', () => reject(Object.assign(new Error('aborted'), { name: 'AbortError' })), {
      once: true,
    });
  });

export function createMockLanguageModel(...replies: MockReply[]): MockLanguageModel {
  return new MockLanguageModel().enqueue(...replies);
}
