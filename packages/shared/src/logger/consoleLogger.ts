import type { HealEvent } from '../types/events';
import { LOG_LEVEL_ORDER, formatBindings, type LogLevel, type Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Messages below this level are dropped. Defaults to `info`. */
  level?: LogLevel;
}

export class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(
    private readonly options: ConsoleLoggerOptions = {},
    private readonly bindings: Record<string, unknown> = {},
  ) {
    this.threshold = LOG_LEVEL_ORDER[options.level ?? 'info'];
  }

  log(event: HealEvent): void {
    if (this.enabled('debug')) {
      console.log(JSON.stringify(event));
    }
  }

  trace(event: HealEvent, message: string): void {
    if (this.enabled('info')) {
      console.log(formatBindings(this.bindings, message), JSON.stringify(event));
    }
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
    return new ConsoleLogger(this.options, { ...this.bindings, ...bindings });
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= this.threshold;
  }
}
