import type { HealEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Logging surface shared by the engine, the stores and the CLI.
 *
 * @example
 * ```typescript
 * logger.log(makeEvent(runId, { type: 'RunStarted', payload }));
 * logger.child({ caseId: 'login-ok' }).info('verifying');
 * logger.error(err, 'checklist commit failed');
 * ```
 */
export interface Logger {
  /**
   * Persist a structured heal event.
   */
  log(event: HealEvent): MaybePromise<void>;

  /**
   * Persist an event together with a human-readable summary of it.
   */
  trace(event: HealEvent, message: string): MaybePromise<void>;

  debug(message: string): MaybePromise<void>;
  info(message: string): MaybePromise<void>;
  warn(message: string): MaybePromise<void>;
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a logger whose messages carry the given bindings as a `[k=v]` prefix.
   */
  child(bindings: Record<string, unknown>): Logger;
}

export function formatBindings(bindings: Record<string, unknown>, message: string): string {
  const prefix = Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return prefix ? `[${prefix}] ${message}` : message;
}
