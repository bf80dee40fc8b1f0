/**
 * Base error class for all service-related errors.
 *
 * `retryable` tells the job runner whether a fresh attempt of the same step
 * may succeed. Subclasses set it per error code.
 */
export class ServiceError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(message: string, code: string, details?: Record<string, unknown>, retryable: boolean = false) {
    super(message);
    this.name = 'ServiceError';
    this.code = code;
    this.details = details;
    this.retryable = retryable;

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when a requested resource is not found
 */
export class NotFoundError extends ServiceError {
  constructor(resource: string, id?: string, details?: Record<string, unknown>) {
    const message = id
      ? `${resource} with id '${id}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when input or configuration validation fails
 */
export class ValidationError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when an operation times out. Always retryable.
 */
export class TimeoutError extends ServiceError {
  public readonly operation: string;
  public readonly timeout: number;

  constructor(operation: string, timeout: number, details?: Record<string, unknown>) {
    super(`Operation '${operation}' timed out after ${timeout}ms`, 'TIMEOUT_ERROR', details, true);
    this.name = 'TimeoutError';
    this.operation = operation;
    this.timeout = timeout;
  }
}

export type ExtractionErrorCode =
  | 'EMPTY_DOCUMENT'
  | 'UNSUPPORTED_FORMAT'
  | 'CORRUPT_DOCUMENT'
  | 'SOURCE_UNREADABLE';

/**
 * Document could not be turned into text. Never retried.
 */
export class ExtractionError extends ServiceError {
  declare readonly code: ExtractionErrorCode;

  constructor(code: ExtractionErrorCode, message: string, details?: Record<string, unknown>) {
    super(message, code, details, false);
    this.name = 'ExtractionError';
  }
}

export type EmbeddingErrorCode = 'PROVIDER_FAILURE' | 'DIMENSION_MISMATCH';

/**
 * Provider failures are retryable unless the underlying error was permanent;
 * a dimension mismatch is a configuration problem and fatal.
 */
export class EmbeddingError extends ServiceError {
  declare readonly code: EmbeddingErrorCode;

  constructor(
    code: EmbeddingErrorCode,
    message: string,
    details?: Record<string, unknown>,
    retryable: boolean = code === 'PROVIDER_FAILURE'
  ) {
    super(message, code, details, retryable);
    this.name = 'EmbeddingError';
  }
}

export type StoreErrorCode =
  | 'COLLECTION_NOT_FOUND'
  | 'DIMENSION_CONFLICT'
  | 'DIMENSION_MISMATCH'
  | 'UPSERT_FAILED';

export class StoreError extends ServiceError {
  declare readonly code: StoreErrorCode;
  /** Record ids that were not written by the failing call. */
  public readonly failedIds: string[];

  constructor(code: StoreErrorCode, message: string, failedIds: string[] = [], details?: Record<string, unknown>) {
    super(message, code, { ...details, failedIds }, code === 'UPSERT_FAILED');
    this.name = 'StoreError';
    this.failedIds = failedIds;
  }
}

export type GenerationErrorCode = 'PROVIDER_FAILURE' | 'EMPTY_RESPONSE';

export class GenerationError extends ServiceError {
  declare readonly code: GenerationErrorCode;

  constructor(code: GenerationErrorCode, message: string, details?: Record<string, unknown>, retryable: boolean = true) {
    super(message, code, details, retryable);
    this.name = 'GenerationError';
  }
}

/**
 * Wraps the error of a failed step with the job and step it happened in.
 */
export class JobError extends ServiceError {
  public readonly jobId: string;
  public readonly stepName: string;
  public readonly originalError: unknown;
  /** Error class name of the wrapped error, e.g. `EmbeddingError`. */
  public readonly errorKind: string;
  /** Code of the wrapped error, e.g. `DIMENSION_MISMATCH`. */
  public readonly errorCode: string;

  constructor(jobId: string, stepName: string, cause: unknown, attempts: number) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Job ${jobId} failed at step '${stepName}' after ${attempts} attempt(s): ${message}`, 'JOB_FAILED', {
      jobId,
      stepName,
      attempts,
    });
    this.name = 'JobError';
    this.jobId = jobId;
    this.stepName = stepName;
    this.originalError = cause;
    this.errorKind = cause instanceof Error ? cause.name : 'UnknownError';
    this.errorCode = cause instanceof ServiceError ? cause.code : 'UNKNOWN';
  }
}

/**
 * Raised at a step boundary once cancellation of a running job was requested.
 */
export class JobCancelledError extends ServiceError {
  public readonly jobId: string;

  constructor(jobId: string, stepName: string) {
    super(`Job ${jobId} was cancelled before step '${stepName}'`, 'JOB_CANCELLED', { jobId, stepName });
    this.name = 'JobCancelledError';
    this.jobId = jobId;
  }
}

/**
 * Extract error message from various error types
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'An unknown error occurred';
}
