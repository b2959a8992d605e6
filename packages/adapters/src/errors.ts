import { ProviderError, type AppErrorOptions } from '@testmend/shared';

export class RateLimitError extends ProviderError {
  constructor(
    message: string,
    public readonly retryAfter?: number,
    options: AppErrorOptions = {},
  ) {
    super(message, options);
  }
}
