/**
 * Error vocabulary.
 * Response-level error codes, the code → HTTP status table, and the error
 * classes the framework returns alongside (or instead of) a response.
 */

/** Codes the framework itself produces or maps. Use cases may add their own. */
export const ERROR_CODES = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_REQUEST: 'INVALID_REQUEST',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  NOT_FOUND: 'NOT_FOUND',
  TIMEOUT: 'TIMEOUT',
  CANCELLED: 'CANCELLED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  PROCESSING_ERROR: 'PROCESSING_ERROR',
  ADAPTER_ERROR: 'ADAPTER_ERROR',
  NETWORK_ERROR: 'NETWORK_ERROR',
  RATE_LIMITED: 'RATE_LIMITED',
  TEMPORARY_ERROR: 'TEMPORARY_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  GATEWAY_TIMEOUT: 'GATEWAY_TIMEOUT',
} as const;

export type KnownErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

// `string & {}` keeps editor completion for the known literals.
export type ErrorCode = KnownErrorCode | (string & {});

/** Codes treated as transient when a response does not say otherwise. */
export const RETRYABLE_CODES: ReadonlySet<string> = new Set<string>([
  ERROR_CODES.TIMEOUT,
  ERROR_CODES.NETWORK_ERROR,
  ERROR_CODES.RATE_LIMITED,
  ERROR_CODES.TEMPORARY_ERROR,
  ERROR_CODES.SERVICE_UNAVAILABLE,
  ERROR_CODES.GATEWAY_TIMEOUT,
]);

export function isRetryableCode(code: string): boolean {
  return RETRYABLE_CODES.has(code);
}

const STATUS_BY_CODE: Readonly<Record<string, number>> = {
  [ERROR_CODES.VALIDATION_ERROR]: 400,
  [ERROR_CODES.INVALID_REQUEST]: 400,
  [ERROR_CODES.UNAUTHORIZED]: 401,
  [ERROR_CODES.FORBIDDEN]: 403,
  [ERROR_CODES.NOT_FOUND]: 404,
  [ERROR_CODES.RATE_LIMITED]: 429,
  [ERROR_CODES.TIMEOUT]: 504,
  [ERROR_CODES.SERVICE_UNAVAILABLE]: 503,
  [ERROR_CODES.INTERNAL_ERROR]: 500,
};

/** HTTP status for an error code; unknown codes map to 500. */
export function statusForCode(code: string): number {
  return STATUS_BY_CODE[code] ?? 500;
}

/** Base class for framework errors that carry a machine-readable code. */
export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  get statusCode(): number {
    return statusForCode(this.code);
  }
}

/** The ambient context was cancelled (caller gone, shutdown). */
export class CancelledError extends AppError {
  constructor(message = 'context canceled') {
    super(ERROR_CODES.CANCELLED, message);
  }
}

/** The ambient context's deadline passed. */
export class DeadlineExceededError extends AppError {
  constructor(message = 'context deadline exceeded') {
    super(ERROR_CODES.TIMEOUT, message);
  }
}

/** Something below the Recovery middleware threw. */
export class PanicError extends AppError {
  constructor(public readonly value: unknown) {
    super(ERROR_CODES.INTERNAL_ERROR, `panic recovered: ${describeThrown(value)}`, undefined, {
      cause: value,
    });
  }
}

export class RetriesExhaustedError extends AppError {
  constructor(
    public readonly retries: number,
    cause: Error
  ) {
    super(
      cause instanceof AppError ? cause.code : ERROR_CODES.INTERNAL_ERROR,
      `max retries (${retries}) exceeded: ${cause.message}`,
      { retries },
      { cause }
    );
  }
}

export class BatchProcessingError extends AppError {
  constructor(
    public readonly messageId: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(
      ERROR_CODES.PROCESSING_ERROR,
      `batch processing failed at message ${messageId}: ${reason}`,
      { messageId },
      options
    );
  }
}

export class UnsupportedEventError extends AppError {
  constructor() {
    super(ERROR_CODES.INVALID_REQUEST, 'unsupported event type');
  }
}

export class ConfigError extends AppError {
  constructor(public readonly issues: string[]) {
    super(ERROR_CODES.INVALID_REQUEST, `Invalid configuration: ${issues.join('; ')}`, {
      issues,
    });
  }
}

/** True for the two errors an aborted context produces. */
export function isContextError(err: unknown): err is CancelledError | DeadlineExceededError {
  return err instanceof CancelledError || err instanceof DeadlineExceededError;
}

export function describeThrown(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
