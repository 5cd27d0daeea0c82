// Logger Module
// Console logger with an optional reactive LoggerStore for hosts that display pipeline logs

import { computed, signal } from '@preact/signals-core';
import { defaultConfig } from '@/config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  id: string;
  timestamp: Date;
  elapsed: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

/**
 * Minimal logger interface for dependency injection
 * Both Logger and LoggerStore implement this
 */
export interface ILogger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: Error, data?: Record<string, unknown>): void;
  debug?(message: string, data?: Record<string, unknown>): void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// ========== Helper Functions ==========

function generateLogId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Format duration in ms to HH:MM:SS
 */
function formatElapsedTime(startTime: number): string {
  const elapsed = Math.floor((Date.now() - startTime) / 1000);
  const hours = Math.floor(elapsed / 3600);
  const minutes = Math.floor((elapsed % 3600) / 60);
  const seconds = elapsed % 60;
  return `${hours.toString().padStart(2, '0')}:${minutes.toString().padStart(2, '0')}:${seconds.toString().padStart(2, '0')}`;
}

function errorData(error: Error | undefined, data?: Record<string, unknown>): Record<string, unknown> | undefined {
  return error ? { ...data, error: error.message, stack: error.stack } : data;
}

// ========== Logger ==========

export interface LoggerOptions {
  store?: LoggerStore;
  prefix?: string;
  /** Messages below this level are dropped (default: info) */
  level?: LogLevel;
}

/**
 * Logger - logs to console and LoggerStore
 */
export class Logger implements ILogger {
  private store: LoggerStore | null;
  private prefix: string;
  private level: LogLevel;

  constructor(options: LoggerOptions = {}) {
    this.store = options.store ?? null;
    this.prefix = options.prefix ?? '';
    this.level = options.level ?? 'info';
  }

  setStore(store: LoggerStore): void {
    this.store = store;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  /**
   * Log debug message (console only, never stored)
   */
  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.enabled('debug')) return;
    console.debug(`[DEBUG] ${this.formatMessage(message)}`, data ?? '');
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.enabled('info')) return;
    const formatted = this.formatMessage(message);
    console.log(`[INFO] ${formatted}`, data ?? '');
    this.store?.add('info', formatted, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.enabled('warn')) return;
    const formatted = this.formatMessage(message);
    console.warn(`[WARN] ${formatted}`, data ?? '');
    this.store?.add('warn', formatted, data);
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void {
    const formatted = this.formatMessage(message);
    console.error(`[ERROR] ${formatted}`, error ?? '', data ?? '');
    this.store?.add('error', formatted, errorData(error, data));
  }

  /**
   * Create a child logger sharing store and level, with a nested prefix
   */
  child(prefix: string): Logger {
    const childPrefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return new Logger({ store: this.store ?? undefined, prefix: childPrefix, level: this.level });
  }
}

export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

// ========== LoggerStore ==========

/**
 * Logger Store - bounded, reactive log history of one analysis session
 */
export class LoggerStore implements ILogger {
  readonly entries = signal<LogEntry[]>([]);

  readonly maxEntries = signal<number>(defaultConfig.logging.maxEntries);

  readonly startTime = signal<number | null>(null);

  readonly hasEntries = computed(() => this.entries.value.length > 0);

  readonly count = computed(() => this.entries.value.length);

  readonly errorCount = computed(() => this.entries.value.filter((e) => e.level === 'error').length);

  /**
   * Start the elapsed timer (call at analysis start)
   */
  startTimer(): void {
    this.startTime.value = Date.now();
  }

  resetTimer(): void {
    this.startTime.value = null;
  }

  add(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      id: generateLogId(),
      timestamp: new Date(),
      elapsed: this.startTime.value ? formatElapsedTime(this.startTime.value) : '00:00:00',
      level,
      message,
      data,
    };

    // Chronological order, oldest trimmed first
    const newEntries = [...this.entries.value, entry];
    if (newEntries.length > this.maxEntries.value) {
      newEntries.splice(0, newEntries.length - this.maxEntries.value);
    }

    this.entries.value = newEntries;
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.add('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.add('warn', message, data);
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.add('error', message, errorData(error, data));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    console.debug(`[DEBUG] ${message}`, data ?? '');
  }

  clear(): void {
    this.entries.value = [];
  }

  setMaxEntries(max: number): void {
    this.maxEntries.value = max;
    if (this.entries.value.length > max) {
      this.entries.value = this.entries.value.slice(-max);
    }
  }

  // ========== Export Methods ==========

  toText(): string {
    return this.entries.value
      .map(
        (e) =>
          `[${e.elapsed}] [${e.level.toUpperCase()}] ${e.message}${e.data ? ` ${JSON.stringify(e.data)}` : ''}`,
      )
      .join('\n');
  }

  toJSON(): string {
    return JSON.stringify(this.entries.value, null, 2);
  }
}

export function createLoggerStore(): LoggerStore {
  return new LoggerStore();
}
