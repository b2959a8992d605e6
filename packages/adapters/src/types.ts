import type { Logger } from '@testmend/shared';

/**
 * Retry behaviour for transient provider failures.
 *
 * @example
 * ```typescript
 * const retryOptions: RetryOptions = { maxRetries: 5, initialDelayMs: 2000 };
 * ```
 */
export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 3 */
  maxRetries?: number;
  /** Initial delay in milliseconds before first retry. Default: 1000 */
  initialDelayMs?: number;
  /** Maximum delay cap in milliseconds. Default: 10000 */
  maxDelayMs?: number;
  /** Multiplier for exponential backoff. Default: 2 */
  backoffFactor?: number;
}

/**
 * Context passed to adapter methods for each request.
 */
export interface AdapterContext {
  runId: string;
  logger: Logger;
  /** Signal to cancel the request */
  abortSignal?: AbortSignal;
  /** Maximum time in milliseconds for one attempt */
  timeoutMs?: number;
  retryOptions?: RetryOptions;
}
