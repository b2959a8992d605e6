import { CancelledError, ConfigError, TimeoutError, makeEvent } from '@testmend/shared';
import type { AdapterContext, RetryOptions } from '../types';
import { RateLimitError } from '../errors';

/**
 * Default retry options for provider requests.
 *
 * Retries use exponential backoff with +/- 10% jitter:
 *
 * ```
 * delay = min(maxDelayMs, initialDelayMs * (backoffFactor ^ (attempt - 1)))
 * ```
 *
 * Retried: `RateLimitError`, `TimeoutError`, HTTP 429 and 5xx, and the
 * network codes ETIMEDOUT, ECONNRESET and ECONNREFUSED.
 * Never retried: `ConfigError` (bad credentials), other 4xx, and user aborts.
 */
const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffFactor: 2,
};

function field(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  return Reflect.get(value, key);
}

function isRetriableError(error: unknown): boolean {
  if (error instanceof RateLimitError || error instanceof TimeoutError) {
    return true;
  }

  const status = field(error, 'status') ?? field(error, 'statusCode');
  if (typeof status === 'number') {
    return status === 429 || (status >= 500 && status < 600);
  }

  const code = field(error, 'code') ?? field(field(error, 'cause'), 'code');
  return code === 'ETIMEDOUT' || code === 'ECONNRESET' || code === 'ECONNREFUSED';
}

/**
 * Executes a provider request with retry, per-attempt timeout and abort
 * handling, logging `ProviderRequestStarted`/`ProviderRequestFinished`.
 *
 * A user abort rejects with `CancelledError` and is never retried.
 */
export async function executeProviderRequest<T>(
  ctx: AdapterContext,
  provider: string,
  model: string,
  requestFn: (signal: AbortSignal) => Promise<T>,
  optionsOverride: RetryOptions = {},
): Promise<T> {
  const { maxRetries, initialDelayMs, maxDelayMs, backoffFactor } = {
    ...DEFAULT_OPTIONS,
    ...ctx.retryOptions,
    ...optionsOverride,
  };

  const startTime = Date.now();
  await ctx.logger.log(
    makeEvent(ctx.runId, { type: 'ProviderRequestStarted', payload: { provider, model } }),
  );

  let attempts = 0;
  let lastError: unknown;

  while (attempts <= maxRetries) {
    const abortController = new AbortController();
    const abortHandler = () => abortController.abort();

    if (ctx.abortSignal) {
      if (ctx.abortSignal.aborted) {
        abortController.abort();
      } else {
        ctx.abortSignal.addEventListener('abort', abortHandler);
      }
    }

    let timeoutId: NodeJS.Timeout | undefined;
    if (ctx.timeoutMs) {
      timeoutId = setTimeout(() => {
        abortController.abort(new TimeoutError(`Request timed out after ${ctx.timeoutMs}ms`));
      }, ctx.timeoutMs);
    }

    try {
      const result = await requestFn(abortController.signal);

      const durationMs = Date.now() - startTime;
      await ctx.logger.log(
        makeEvent(ctx.runId, {
          type: 'ProviderRequestFinished',
          payload: { provider, durationMs, success: true, retries: attempts },
        }),
      );
      return result;
    } catch (error: unknown) {
      const reason: unknown = abortController.signal.reason;
      lastError = reason instanceof TimeoutError ? reason : error;

      if (ctx.abortSignal?.aborted) {
        throw new CancelledError(`Provider request to ${provider} cancelled`, { cause: error });
      }

      if (lastError instanceof ConfigError) {
        break;
      }

      if (!isRetriableError(lastError) || attempts >= maxRetries) {
        break;
      }

      attempts++;
      const delay = Math.min(maxDelayMs, initialDelayMs * Math.pow(backoffFactor, attempts - 1));
      const jitter = delay * 0.1 * (Math.random() * 2 - 1);
      await new Promise((resolve) => setTimeout(resolve, Math.max(0, delay + jitter)));
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
      ctx.abortSignal?.removeEventListener('abort', abortHandler);
    }
  }

  const durationMs = Date.now() - startTime;
  await ctx.logger.log(
    makeEvent(ctx.runId, {
      type: 'ProviderRequestFinished',
      payload: {
        provider,
        durationMs,
        success: false,
        error: lastError instanceof Error ? lastError.message : String(lastError),
        retries: attempts,
      },
    }),
  );

  throw lastError;
}
