/**
 * Error taxonomy for automation runs.
 *
 * Every failure that crosses a component boundary is one of these, so the
 * driver and workers can record an errorKind in the ledger and the CLI can
 * pick an exit code.
 */

/** 'RateLimitExceeded' is recorded for denied admissions; nothing throws it. */
export type ErrorKind =
  | 'GenerationError'
  | 'AuthError'
  | 'TransientError'
  | 'PlatformError'
  | 'RateLimitExceeded'
  | 'ConfigError'
  | 'UnknownError';

export interface AutomationErrorOptions {
  cause?: unknown;
  status?: number;
}

export abstract class AutomationError extends Error {
  abstract readonly kind: ErrorKind;
  readonly status?: number;

  constructor(message: string, options: AutomationErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.status = options.status;
  }
}

/** The AI service failed or returned something unusable. */
export class GenerationError extends AutomationError {
  readonly kind = 'GenerationError' as const;
}

/** Credentials rejected (401/403). Never retried. */
export class AuthError extends AutomationError {
  readonly kind = 'AuthError' as const;
}

/** Timeouts, network failures, 429 and 5xx. The next trigger may retry. */
export class TransientError extends AutomationError {
  readonly kind = 'TransientError' as const;
}

/** The platform rejected the request for another reason (other 4xx). */
export class PlatformError extends AutomationError {
  readonly kind = 'PlatformError' as const;
}

export class ConfigError extends AutomationError {
  readonly kind = 'ConfigError' as const;
}

export function errorKindOf(error: unknown): ErrorKind {
  return error instanceof AutomationError ? error.kind : 'UnknownError';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/** AuthError and ConfigError stop a run; nothing after them can succeed. */
export function isFatal(kind: ErrorKind | undefined): boolean {
  return kind === 'AuthError' || kind === 'ConfigError';
}

export function isDuplicateKeyError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 11000;
}

/** Fields for a log line describing a failure. */
export function errorData(error: unknown): Record<string, unknown> {
  return {
    errorKind: errorKindOf(error),
    error: errorMessage(error),
    ...(error instanceof AutomationError && error.status !== undefined ? { status: error.status } : {}),
  };
}
