import { TimeoutError } from '../services/base/ServiceError';
import { logger } from './logger';

/**
 * Exponential backoff with jitter, plus per-call timeouts.
 *
 * Delay doubles each attempt (base * 2^attempt), capped at maxDelayMs,
 * with +/- jitterFraction randomness.
 */
export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Jitter fraction +/- (0.25 = +/-25%) */
  jitterFraction: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFraction: 0.25,
};

/**
 * @param attempt Zero-indexed attempt number
 * @returns Delay in milliseconds, never negative
 */
export function calculateBackoffDelay(attempt: number, policy?: Partial<RetryPolicy>): number {
  const cfg = { ...DEFAULT_RETRY_POLICY, ...policy };
  const exponentialDelay = cfg.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, cfg.maxDelayMs);

  const jitterRange = cappedDelay * cfg.jitterFraction;
  const jitter = (Math.random() * 2 - 1) * jitterRange;

  return Math.max(0, Math.round(cappedDelay + jitter));
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface RetryHooks {
  /** Called before waiting for the next attempt. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Execute a function with retry and exponential backoff.
 *
 * Errors rejected by `shouldRetry` are re-thrown immediately; otherwise the
 * last error is thrown once `maxAttempts` is used up.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  policy?: Partial<RetryPolicy>,
  hooks?: RetryHooks
): Promise<T> {
  const cfg = { ...DEFAULT_RETRY_POLICY, ...policy };
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error)) throw error;
      if (attempt < cfg.maxAttempts - 1) {
        const delay = calculateBackoffDelay(attempt, cfg);
        hooks?.onRetry?.(error, attempt, delay);
        logger.debug(`[Backoff] Attempt ${attempt + 1} failed, waiting ${delay}ms`);
        await sleep(delay);
      }
    }
  }

  throw lastError;
}

/**
 * Reject with TimeoutError if `fn` does not settle within `timeoutMs`.
 * The underlying call is not aborted; its eventual result is ignored.
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
