/**
 * Retry with exponential backoff, and per-credential request pacing for the
 * banking provider. The provider allows one statement request per credential per
 * minute and answers 429 beyond that.
 */

import { createHash } from 'node:crypto';
import { JarsyncError, RateLimitError, RetryExhaustedError, sleep, toError } from '@jarsync/types';

export interface RetryOptions {
  /** Total attempts including the first one. */
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Fraction of the backoff added as random jitter (0 disables it). */
  jitterRatio?: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'onRetry'>> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 60_000,
  backoffMultiplier: 2,
  jitterRatio: 0.3,
  isRetryable: isRetryableError,
  sleep,
};

/**
 * Classified errors carry their own `retryable` flag. Anything else is retried
 * only when it looks like an HTTP 429 or 5xx.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof JarsyncError) {
    return error.retryable;
  }
  if (error === null || typeof error !== 'object' || !('status' in error)) {
    return false;
  }
  const { status } = error;
  return typeof status === 'number' && (status === 429 || (status >= 500 && status < 600));
}

/**
 * Exponential backoff with jitter, capped at `maxDelayMs`.
 */
export function calculateDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
  jitterRatio: number = 0.3,
  random: () => number = Math.random
): number {
  const exponentialDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt - 1);
  const jitter = random() * jitterRatio * exponentialDelay;
  return Math.min(Math.round(exponentialDelay + jitter), maxDelayMs);
}

/**
 * Execute `fn`, retrying retryable failures with backoff.
 *
 * Non-retryable errors are rethrown as they are. When the attempts run out on a
 * retryable error, a `RetryExhaustedError` wrapping it is thrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = toError(error);
      if (!opts.isRetryable(error)) {
        throw lastError;
      }
      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(attempt, lastError);
      }

      let delayMs = calculateDelay(
        attempt,
        opts.initialDelayMs,
        opts.maxDelayMs,
        opts.backoffMultiplier,
        opts.jitterRatio
      );
      if (lastError instanceof RateLimitError && lastError.retryAfterMs !== null) {
        delayMs = Math.max(delayMs, lastError.retryAfterMs);
      }

      options.onRetry?.(attempt, lastError, delayMs);
      await opts.sleep(delayMs);
    }
  }
}

export interface Clock {
  /** Milliseconds since the epoch. */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

/**
 * Spaces calls at least `minIntervalMs` apart.
 *
 * Slots are reserved synchronously, so concurrent callers queue up in call order
 * instead of all waking at the same instant.
 */
export class RateLimiter {
  private nextAvailableAt = 0;

  constructor(
    private readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  async acquire(): Promise<void> {
    const now = this.clock.now();
    const slot = Math.max(now, this.nextAvailableAt);
    this.nextAvailableAt = slot + this.minIntervalMs;
    const waitMs = slot - now;
    if (waitMs > 0) {
      await this.clock.sleep(waitMs);
    }
  }

  /** Milliseconds until the next call would be let through. */
  getWaitTime(): number {
    return Math.max(0, this.nextAvailableAt - this.clock.now());
  }
}

/**
 * One limiter per provider credential. The credential is hashed before it is
 * used as a key.
 */
export class RateLimiterRegistry {
  private readonly limiters = new Map<string, RateLimiter>();

  constructor(
    private readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  forCredential(credential: string): RateLimiter {
    const key = createHash('sha256').update(credential).digest('hex');
    let limiter = this.limiters.get(key);
    if (limiter === undefined) {
      limiter = new RateLimiter(this.minIntervalMs, this.clock);
      this.limiters.set(key, limiter);
    }
    return limiter;
  }

  get size(): number {
    return this.limiters.size;
  }
}
