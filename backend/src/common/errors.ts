/**
 * Application Errors
 * ==================
 *
 * Every failure that leaves the engine is one of these. The HTTP layer
 * renders them by code and statusCode.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'TRANSIENT'
  | 'RATE_LIMITED'
  | 'TIMEOUT'
  | 'CANCELLED';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number,
    public readonly retryable: boolean
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): ErrorBody {
    return { code: this.code, message: this.message, retryable: this.retryable };
  }
}

export interface ErrorBody {
  code: ErrorCode;
  message: string;
  retryable: boolean;
}

/** Bad symbol, range or allocation. Never retried. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message, 400, false);
  }
}

/** Symbol unknown to every provider. */
export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404, false);
  }
}

/** Timeout, network failure, 5xx or malformed payload. */
export class TransientError extends AppError {
  constructor(message: string) {
    super('TRANSIENT', message, 503, true);
  }
}

export class RateLimitedError extends AppError {
  constructor(
    message: string,
    public readonly retryAfterMs?: number
  ) {
    super('RATE_LIMITED', message, 429, true);
  }
}

/** The caller stopped waiting; a shared fetch may still be running. */
export class TimeoutError extends AppError {
  constructor(message: string) {
    super('TIMEOUT', message, 504, true);
  }
}

export class CancelledError extends AppError {
  constructor(message: string) {
    super('CANCELLED', message, 499, true);
  }
}

/**
 * Map anything thrown into the taxonomy. Unknown failures are treated as
 * transient so the caller may try again.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new TransientError(message || 'Unknown error');
}
