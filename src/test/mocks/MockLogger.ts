// Mock Logger
// Records every call so tests can assert on what the pipeline logged

import { vi } from 'vitest';
import type { ILogger, LogLevel } from '@/services/Logger';

export interface LogCall {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export class MockLogger implements ILogger {
  public calls: LogCall[] = [];

  info = vi.fn((message: string, data?: Record<string, unknown>) => {
    this.calls.push({ level: 'info', message, data });
  });

  warn = vi.fn((message: string, data?: Record<string, unknown>) => {
    this.calls.push({ level: 'warn', message, data });
  });

  error = vi.fn((message: string, error?: Error, data?: Record<string, unknown>) => {
    this.calls.push({ level: 'error', message, data, error });
  });

  debug = vi.fn((message: string, data?: Record<string, unknown>) => {
    this.calls.push({ level: 'debug', message, data });
  });

  // Test helpers
  callsAt(level: LogLevel): LogCall[] {
    return this.calls.filter((c) => c.level === level);
  }

  messagesAt(level: LogLevel): string[] {
    return this.callsAt(level).map((c) => c.message);
  }

  hasMessage(message: string): boolean {
    return this.calls.some((c) => c.message.includes(message));
  }

  reset(): void {
    this.calls = [];
  }
}

export function createMockLogger(): MockLogger {
  return new MockLogger();
}
