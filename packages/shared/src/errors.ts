export type FatalReason = 'auth' | 'not-found' | 'permission' | 'invalid-request' | 'unknown';

/**
 * A remote call failed in a way that may succeed on retry
 * (rate limiting, timeouts, dropped connections, 5xx).
 */
export class TransientError extends Error {
  readonly retryAfterMs?: number;
  readonly status?: number;

  constructor(message: string, options: { retryAfterMs?: number; status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransientError';
    this.retryAfterMs = options.retryAfterMs;
    this.status = options.status;
  }
}

/**
 * A remote call failed in a way retrying cannot fix.
 */
export class FatalError extends Error {
  readonly reason: FatalReason;
  readonly status?: number;

  constructor(message: string, options: { reason?: FatalReason; status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FatalError';
    this.reason = options.reason ?? 'unknown';
    this.status = options.status;
  }
}

export type GovernorErrorKind = 'fatal' | 'exhausted' | 'cancelled';

export class GovernorError extends Error {
  readonly kind: GovernorErrorKind;
  readonly attempts: number;

  constructor(kind: GovernorErrorKind, message: string, attempts: number, cause?: unknown) {
    super(message, { cause });
    this.name = 'GovernorError';
    this.kind = kind;
    this.attempts = attempts;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function createAbortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
