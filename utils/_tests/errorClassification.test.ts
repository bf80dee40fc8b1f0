import { describe, it, expect } from 'vitest';
import { classifyError, isRetryableError } from '../errorClassification';
import { EmbeddingError, ExtractionError, StoreError } from '../../services/base/ServiceError';

describe('classifyError', () => {
  it('uses the verdict carried by service errors', () => {
    expect(classifyError(new ExtractionError('CORRUPT_DOCUMENT', 'bad pdf'))).toEqual({
      retryable: false,
      errorKind: 'ExtractionError',
      errorCode: 'CORRUPT_DOCUMENT',
    });
    expect(classifyError(new EmbeddingError('PROVIDER_FAILURE', 'down')).retryable).toBe(true);
    expect(classifyError(new StoreError('UPSERT_FAILED', 'locked')).retryable).toBe(true);
    expect(classifyError(new StoreError('DIMENSION_MISMATCH', 'wrong size')).retryable).toBe(false);
  });

  it('treats network and rate-limit errors as transient', () => {
    const reset = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });

    expect(classifyError(reset)).toEqual({ retryable: true, errorKind: 'Error', errorCode: 'ECONNRESET' });
    expect(isRetryableError(new Error('Rate limit reached for requests'))).toBe(true);
    expect(isRetryableError(Object.assign(new Error('Too many requests'), { status: 429 }))).toBe(true);
  });

  it('treats auth and missing-file errors as permanent', () => {
    expect(isRetryableError(Object.assign(new Error('Unauthorized'), { status: 401 }))).toBe(false);
    expect(isRetryableError(Object.assign(new Error('no such file'), { code: 'ENOENT' }))).toBe(false);
  });

  it('reads status codes from the status field only', () => {
    expect(isRetryableError(new Error('invalid file: key sk-500429'))).toBe(false);
    expect(isRetryableError(new Error('chunk 404 of 503 written'))).toBe(true);
    expect(isRetryableError(Object.assign(new Error('upstream said no'), { status: 503 }))).toBe(true);
    expect(isRetryableError(Object.assign(new Error('upstream said no'), { statusCode: '403' }))).toBe(false);
  });

  it('decides by status before the message', () => {
    expect(isRetryableError(Object.assign(new Error('request timed out'), { status: 401 }))).toBe(false);
  });

  it('recognizes status phrases in messages', () => {
    expect(isRetryableError(new Error('503 Service Unavailable'))).toBe(true);
    expect(isRetryableError(new Error('401 invalid api key'))).toBe(false);
    expect(isRetryableError(new Error('403 Forbidden'))).toBe(false);
  });

  it('retries unknown errors', () => {
    expect(classifyError('something odd')).toEqual({ retryable: true, errorKind: 'UnknownError', errorCode: 'UNKNOWN' });
  });
});
