/**
 * Error taxonomy shared by the sync and report paths.
 * Per-user and per-account errors are folded into summaries by `kind`; only
 * `FatalInputError` is meant to escape a sync run.
 */

export type ErrorKind =
  | 'credential'
  | 'rate_limit'
  | 'provider_transient'
  | 'provider'
  | 'store_write'
  | 'store_read'
  | 'fatal_input'
  | 'validation'
  | 'report_source'
  | 'unknown';

export class JarsyncError extends Error {
  readonly kind: ErrorKind;
  readonly retryable: boolean;

  constructor(kind: ErrorKind, message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'JarsyncError';
    this.kind = kind;
    this.retryable = options.retryable ?? false;
  }
}

export class CredentialError extends JarsyncError {
  constructor(message: string, cause?: unknown) {
    super('credential', message, { cause });
    this.name = 'CredentialError';
  }
}

export class RateLimitError extends JarsyncError {
  readonly retryAfterMs: number | null;

  constructor(message: string, retryAfterMs: number | null = null) {
    super('rate_limit', message, { retryable: true });
    this.name = 'RateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class ProviderTransientError extends JarsyncError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, cause?: unknown) {
    super('provider_transient', message, { retryable: true, cause });
    this.name = 'ProviderTransientError';
    this.status = status;
  }
}

export class ProviderError extends JarsyncError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, cause?: unknown) {
    super('provider', message, { cause });
    this.name = 'ProviderError';
    this.status = status;
  }
}

export class StoreWriteError extends JarsyncError {
  constructor(message: string, cause?: unknown) {
    super('store_write', message, { retryable: true, cause });
    this.name = 'StoreWriteError';
  }
}

export class StoreReadError extends JarsyncError {
  constructor(message: string, cause?: unknown) {
    super('store_read', message, { cause });
    this.name = 'StoreReadError';
  }
}

export class FatalInputError extends JarsyncError {
  constructor(message: string, cause?: unknown) {
    super('fatal_input', message, { cause });
    this.name = 'FatalInputError';
  }
}

export class ValidationError extends JarsyncError {
  constructor(message: string) {
    super('validation', message);
    this.name = 'ValidationError';
  }
}

export class ReportSourceError extends JarsyncError {
  constructor(message: string, cause?: unknown) {
    super('report_source', message, { cause });
    this.name = 'ReportSourceError';
  }
}

/**
 * Raised when a retry policy gives up. Keeps the kind of the last failure so
 * summaries still report e.g. `rate_limit` rather than a generic error.
 */
export class RetryExhaustedError extends JarsyncError {
  readonly attempts: number;
  readonly lastError: Error;

  constructor(attempts: number, lastError: Error) {
    super(
      lastError instanceof JarsyncError ? lastError.kind : 'unknown',
      `Gave up after ${attempts} attempts: ${lastError.message}`,
      { cause: lastError }
    );
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export interface ErrorDetail {
  kind: ErrorKind;
  message: string;
  retryable: boolean;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Classify any thrown value for a summary entry.
 */
export function toErrorDetail(error: unknown): ErrorDetail {
  if (error instanceof RetryExhaustedError) {
    return { kind: error.kind, message: error.message, retryable: error.lastError instanceof JarsyncError && error.lastError.retryable };
  }
  if (error instanceof JarsyncError) {
    return { kind: error.kind, message: error.message, retryable: error.retryable };
  }
  return { kind: 'unknown', message: toError(error).message, retryable: false };
}
