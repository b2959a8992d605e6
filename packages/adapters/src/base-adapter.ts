import { ConfigError, ProviderError, TimeoutError } from '@testmend/shared';
import { RateLimitError } from './errors';

/**
 * Interface for API error types that have a status code.
 */
export interface APIErrorLike {
  status?: number;
  message: string;
}

/**
 * SDK-specific error checks supplied by each adapter.
 */
export interface ErrorTypeConfig {
  isAPIError: (error: unknown) => error is APIErrorLike;
  isTimeoutError: (error: unknown) => boolean;
}

/**
 * Base class for provider adapters that maps SDK errors onto the shared
 * error hierarchy:
 * - 429 -> RateLimitError
 * - 401, 403 -> ConfigError (bad or missing credentials)
 * - timeouts -> TimeoutError
 */
export abstract class BaseProviderAdapter {
  protected abstract readonly errorConfig: ErrorTypeConfig;

  protected mapError(error: unknown): Error {
    if (this.errorConfig.isAPIError(error)) {
      if (error.status === 429) {
        return new RateLimitError(error.message, undefined, { cause: error });
      }
      if (error.status === 401 || error.status === 403) {
        return new ConfigError(`Provider rejected credentials: ${error.message}`, {
          cause: error,
        });
      }
    }

    if (this.errorConfig.isTimeoutError(error)) {
      return new TimeoutError(error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }

    // Server errors keep their status so the retry loop can see it.
    if (error instanceof Error) return error;
    return new ProviderError(String(error));
  }
}
