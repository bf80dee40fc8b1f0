import { describe, it, expect, vi, afterEach } from 'vitest';
import { calculateBackoffDelay, withRetry, withTimeout } from '../backoff';
import { TimeoutError } from '../../services/base/ServiceError';

vi.mock('../logger', () => ({
  logger: {
    error: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
  },
}));

describe('backoff', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('calculateBackoffDelay', () => {
    it('doubles the delay per attempt without jitter', () => {
      const policy = { baseDelayMs: 100, maxDelayMs: 10000, jitterFraction: 0 };

      expect([0, 1, 2, 3].map(attempt => calculateBackoffDelay(attempt, policy))).toEqual([100, 200, 400, 800]);
    });

    it('caps the delay', () => {
      expect(calculateBackoffDelay(10, { baseDelayMs: 100, maxDelayMs: 500, jitterFraction: 0 })).toBe(500);
    });

    it('keeps jitter within the configured fraction', () => {
      vi.spyOn(Math, 'random').mockReturnValue(1);
      expect(calculateBackoffDelay(0, { baseDelayMs: 100, jitterFraction: 0.25 })).toBe(125);

      vi.spyOn(Math, 'random').mockReturnValue(0);
      expect(calculateBackoffDelay(0, { baseDelayMs: 100, jitterFraction: 0.25 })).toBe(75);
    });
  });

  describe('withRetry', () => {
    const policy = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 2 };

    it('returns the first successful result', async () => {
      const fn = vi.fn()
        .mockRejectedValueOnce(new Error('flaky'))
        .mockResolvedValueOnce('done');
      const onRetry = vi.fn();

      await expect(withRetry(fn, () => true, policy, { onRetry })).resolves.toBe('done');
      expect(fn).toHaveBeenCalledTimes(2);
      expect(fn).toHaveBeenNthCalledWith(2, 1);
      expect(onRetry).toHaveBeenCalledTimes(1);
    });

    it('throws the last error once attempts are used up', async () => {
      const fn = vi.fn().mockRejectedValue(new Error('down'));

      await expect(withRetry(fn, () => true, policy)).rejects.toThrow('down');
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('does not retry errors rejected by shouldRetry', async () => {
      const fn = vi.fn().mockRejectedValue(new Error('fatal'));

      await expect(withRetry(fn, () => false, policy)).rejects.toThrow('fatal');
      expect(fn).toHaveBeenCalledTimes(1);
    });
  });

  describe('withTimeout', () => {
    it('resolves when the call settles in time', async () => {
      await expect(withTimeout(async () => 42, 50, 'fast')).resolves.toBe(42);
    });

    it('rejects with a retryable TimeoutError', async () => {
      const error = await withTimeout(() => new Promise<never>(() => undefined), 10, 'slow.call').catch(e => e);

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error.message).toBe("Operation 'slow.call' timed out after 10ms");
      expect(error.retryable).toBe(true);
    });
  });
});
