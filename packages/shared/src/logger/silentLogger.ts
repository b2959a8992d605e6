import type { HealEvent } from '../types/events';
import type { Logger } from './types';

/**
 * Discards everything. Used when stdout is reserved for machine output.
 */
export class SilentLogger implements Logger {
  log(_event: HealEvent): void {}
  trace(_event: HealEvent, _message: string): void {}
  debug(_message: string): void {}
  info(_message: string): void {}
  warn(_message: string): void {}
  error(_error: Error, _message?: string): void {}

  child(_bindings: Record<string, unknown>): Logger {
    return this;
  }
}
