import * as fs from 'fs/promises';
import { ensureDir } from 'fs-extra';
import { dirname } from 'path';
import type { HealEvent } from '../types/events';
import { redactForLogs } from '../redaction';
import { LOG_LEVEL_ORDER, formatBindings, type LogLevel, type Logger } from './types';

/**
 * Appends events to a JSONL file and echoes messages to the console.
 * A failed append is reported on stderr and never fails the run.
 */
export class JsonlLogger implements Logger {
  private readonly threshold: number;

  constructor(
    private readonly filePath: string,
    private readonly bindings: Record<string, unknown> = {},
    private readonly level: LogLevel = 'info',
  ) {
    this.threshold = LOG_LEVEL_ORDER[level];
  }

  async log(event: HealEvent): Promise<void> {
    const line = JSON.stringify(redactForLogs(event)) + '\n';
    try {
      await ensureDir(dirname(this.filePath));
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: HealEvent, message: string): Promise<void> {
    await this.log(event);
    this.debug(message);
  }

  debug(message: string): void {
    if (this.enabled('debug')) console.debug(formatBindings(this.bindings, message));
  }

  info(message: string): void {
    if (this.enabled('info')) console.info(formatBindings(this.bindings, message));
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(formatBindings(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings }, this.level);
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= this.threshold;
  }
}
