import { ServiceError } from '../services/base/ServiceError';

// Transient error patterns
export const TRANSIENT_ERROR_PATTERNS = [
  // Network errors
  'ECONNREFUSED',
  'ENOTFOUND',
  'ETIMEDOUT',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',

  // Database errors
  'SQLITE_BUSY',
  'SQLITE_LOCKED',

  // Generic patterns
  'timeout',
  'timed out',
  'rate limit',
  'temporarily',
  'try again',
  'overloaded',
  'too many requests',
  'service unavailable',
  'bad gateway',
  'internal server error',
];

// Permanent error patterns
export const PERMANENT_ERROR_PATTERNS = [
  // Permission errors
  'EACCES',
  'EPERM',
  'permission denied',
  'access denied',

  // Client errors
  'unauthorized',
  'forbidden',
  'invalid api key',

  // File errors
  'ENOENT',
  'invalid file',
  'corrupt',
  'malformed',
];

// HTTP statuses, matched against an error's `status` or `statusCode` only
export const TRANSIENT_STATUS_CODES: readonly number[] = [408, 429, 500, 502, 503, 504];
export const PERMANENT_STATUS_CODES: readonly number[] = [400, 401, 403, 404, 410, 422];

export interface ErrorClassification {
  retryable: boolean;
  /** Error class name, e.g. `EmbeddingError` */
  errorKind: string;
  /** Service error code, or `UNKNOWN` */
  errorCode: string;
}

function readStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  if (typeof status === 'number') {
    return status;
  }
  return typeof status === 'string' && /^\d{3}$/.test(status) ? Number(status) : undefined;
}

function readCode(error: unknown): string {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return '';
  }
  return typeof error.code === 'string' ? error.code : '';
}

function matches(patterns: readonly string[], text: string, code: string): boolean {
  return patterns.some(pattern => {
    const p = pattern.toLowerCase();
    return text.includes(p) || code.includes(p);
  });
}

/**
 * Decide whether a failed step may be retried.
 *
 * ServiceErrors carry their own verdict. A known HTTP status decides next.
 * Other errors are matched against the transient patterns, then the
 * permanent ones. Unmatched errors are retryable; the attempt budget still
 * bounds them.
 */
export function classifyError(error: unknown): ErrorClassification {
  if (error instanceof ServiceError) {
    return { retryable: error.retryable, errorKind: error.name, errorCode: error.code };
  }

  const errorKind = error instanceof Error ? error.name : 'UnknownError';
  const message = error instanceof Error ? `${error.name} ${error.message}` : String(error);
  const text = message.toLowerCase();
  const code = readCode(error).toLowerCase();
  const status = readStatus(error);
  const errorCode = readCode(error) || 'UNKNOWN';

  if (status !== undefined && TRANSIENT_STATUS_CODES.includes(status)) {
    return { retryable: true, errorKind, errorCode };
  }
  if (status !== undefined && PERMANENT_STATUS_CODES.includes(status)) {
    return { retryable: false, errorKind, errorCode };
  }
  if (matches(TRANSIENT_ERROR_PATTERNS, text, code)) {
    return { retryable: true, errorKind, errorCode };
  }
  if (matches(PERMANENT_ERROR_PATTERNS, text, code)) {
    return { retryable: false, errorKind, errorCode };
  }
  return { retryable: true, errorKind, errorCode };
}

export function isRetryableError(error: unknown): boolean {
  return classifyError(error).retryable;
}
