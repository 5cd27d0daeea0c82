import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { defaultConfig } from '@/config';
import { getErrorMessage } from '@/errors';
import type { ILogger } from '@/services/Logger';

/**
 * Writes the first request/response pair per prompt id to <dir>/logs.
 * A missing directory turns every call into a no-op.
 */
export class DebugLogger {
  private logged = new Set<string>();

  constructor(
    private directory: string | undefined,
    private logger?: ILogger,
  ) {}

  get enabled(): boolean {
    return Boolean(this.directory);
  }

  /** Save a JSON object to the logs/ subfolder; failures are logged, not thrown */
  async saveLog(filename: string, content: object): Promise<void> {
    if (!this.directory) return;
    try {
      const logsFolder = join(this.directory, defaultConfig.debug.logsFolder);
      await mkdir(logsFolder, { recursive: true });
      await writeFile(join(logsFolder, filename), JSON.stringify(content, null, 2), 'utf8');
    } catch (e) {
      this.logger?.warn('Failed to save log', { file: filename, error: getErrorMessage(e) });
    }
  }

  shouldLog(key: string): boolean {
    return this.enabled && !this.logged.has(key);
  }

  markLogged(key: string): void {
    this.logged.add(key);
  }

  /** Start over, e.g. for a new book */
  resetLogging(): void {
    this.logged.clear();
  }
}
