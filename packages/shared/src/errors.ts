import type { PatchApplyErrorDetail, PatchErrorKind } from './types/patch';

/**
 * Error codes used throughout testmend.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ProviderError'
  | 'PatchError'
  | 'SandboxError'
  | 'StoreError'
  | 'LockError'
  | 'TimeoutError'
  | 'EscalationError'
  | 'TransitionError'
  | 'CancelledError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all testmend errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('StoreError', 'Checklist write failed', {
 *   cause: originalError,
 *   details: { caseId: 'login-happy-path' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage or an operator request is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when an LLM provider or another drafting collaborator fails.
 */
export class ProviderError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ProviderError', message, options);
  }
}

export interface PatchOpErrorOptions extends AppErrorOptions {
  kind?: PatchErrorKind;
  errors?: PatchApplyErrorDetail[];
}

/**
 * Error thrown when a patch cannot be applied or rolled back.
 * Carries the validation failure when the patch was rejected before writing.
 */
export class PatchOpError extends AppError {
  public readonly kind?: PatchErrorKind;
  public readonly errors: PatchApplyErrorDetail[];

  constructor(message: string, options: PatchOpErrorOptions = {}) {
    super('PatchError', message, options);
    this.kind = options.kind;
    this.errors = options.errors ?? [];
  }
}

/**
 * Error thrown when the sandbox runner cannot start a test process at all.
 * Test failures and timeouts are results, not errors.
 */
export class SandboxError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('SandboxError', message, options);
  }
}

/**
 * Error thrown when the checklist document is corrupt.
 */
export class StoreError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('StoreError', message, options);
  }
}

/**
 * Error thrown when the checklist's backing medium cannot be read or written.
 * Fatal for the case being committed, never for the whole run.
 */
export class StoreUnavailableError extends StoreError {}

/**
 * Error thrown when a per-file patch lock cannot be acquired in time.
 */
export class LockTimeoutError extends AppError {
  /** Lock key that could not be acquired */
  public readonly key: string;

  constructor(key: string, timeoutMs: number, options: AppErrorOptions = {}) {
    super('LockError', `Timed out after ${timeoutMs}ms waiting for lock on ${key}`, options);
    this.key = key;
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
  }
}

/**
 * Error thrown when an escalation cannot be raised or resolved.
 */
export class EscalationError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('EscalationError', message, options);
  }
}

/**
 * Error thrown when work stops because the run's AbortSignal fired.
 */
export class CancelledError extends AppError {
  constructor(message = 'Operation cancelled', options: AppErrorOptions = {}) {
    super('CancelledError', message, options);
  }
}

/**
 * Error thrown when a test case is moved along an edge the lifecycle does not have.
 */
export class InvalidTransitionError extends AppError {
  public readonly from: string;
  public readonly to: string;

  constructor(caseId: string, from: string, to: string, options: AppErrorOptions = {}) {
    super('TransitionError', `Case "${caseId}" cannot move from ${from} to ${to}`, options);
    this.from = from;
    this.to = to;
  }
}

/**
 * Errors that abort only the case being processed; the run carries on.
 */
export function isCaseFatal(error: unknown): error is AppError {
  return error instanceof StoreUnavailableError || error instanceof LockTimeoutError;
}

/**
 * Maps an error to the CLI exit code.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  return 1;
}
