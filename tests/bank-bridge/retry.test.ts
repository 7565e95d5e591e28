import { describe, it, expect, vi } from 'vitest';
import {
  RateLimiter,
  RateLimiterRegistry,
  calculateDelay,
  isRetryableError,
  withRetry,
  type Clock,
} from '@jarsync/bank-bridge';
import {
  CredentialError,
  ProviderTransientError,
  RateLimitError,
  RetryExhaustedError,
  StoreWriteError,
} from '@jarsync/types';
import { fakeClock } from '../helpers/fake-bank.js';

describe('Retry Logic', () => {
  describe('isRetryableError', () => {
    it('should follow the retryable flag of classified errors', () => {
      expect(isRetryableError(new RateLimitError('429'))).toBe(true);
      expect(isRetryableError(new ProviderTransientError('502', 502))).toBe(true);
      expect(isRetryableError(new StoreWriteError('down'))).toBe(true);
      expect(isRetryableError(new CredentialError('401'))).toBe(false);
    });

    it('should retry raw 429 and 5xx statuses only', () => {
      expect(isRetryableError({ status: 429 })).toBe(true);
      expect(isRetryableError({ status: 503 })).toBe(true);
      expect(isRetryableError({ status: 404 })).toBe(false);
      expect(isRetryableError(new Error('boom'))).toBe(false);
      expect(isRetryableError(null)).toBe(false);
    });
  });

  describe('calculateDelay', () => {
    it('should grow exponentially without jitter', () => {
      expect(calculateDelay(1, 1000, 60000, 2, 0)).toBe(1000);
      expect(calculateDelay(2, 1000, 60000, 2, 0)).toBe(2000);
      expect(calculateDelay(3, 1000, 60000, 2, 0)).toBe(4000);
    });

    it('should cap at the maximum delay', () => {
      expect(calculateDelay(10, 1000, 30000, 2, 0)).toBe(30000);
    });

    it('should add up to jitterRatio of the delay', () => {
      expect(calculateDelay(1, 1000, 60000, 2, 0.3, () => 1)).toBe(1300);
      expect(calculateDelay(1, 1000, 60000, 2, 0.3, () => 0.5)).toBe(1150);
    });
  });

  describe('withRetry', () => {
    it('should return the first successful result', async () => {
      const fn = vi.fn().mockResolvedValue('ok');
      await expect(withRetry(fn)).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should retry retryable errors with backoff', async () => {
      const clock = fakeClock();
      const onRetry = vi.fn();
      const fn = vi
        .fn<[], Promise<string>>()
        .mockRejectedValueOnce(new ProviderTransientError('502', 502))
        .mockRejectedValueOnce(new ProviderTransientError('503', 503))
        .mockResolvedValueOnce('ok');

      const result = await withRetry(fn, { jitterRatio: 0, sleep: clock.sleep, onRetry });

      expect(result).toBe('ok');
      expect(fn).toHaveBeenCalledTimes(3);
      expect(clock.slept).toEqual([1000, 2000]);
      expect(onRetry).toHaveBeenCalledTimes(2);
      expect(onRetry.mock.calls[0]?.[0]).toBe(1);
      expect(onRetry.mock.calls[0]?.[2]).toBe(1000);
    });

    it('should wait at least the Retry-After hint of a rate limit error', async () => {
      const clock = fakeClock();
      const fn = vi
        .fn<[], Promise<string>>()
        .mockRejectedValueOnce(new RateLimitError('429', 60000))
        .mockResolvedValueOnce('ok');

      await withRetry(fn, { jitterRatio: 0, sleep: clock.sleep });
      expect(clock.slept).toEqual([60000]);
    });

    it('should not retry non-retryable errors', async () => {
      const clock = fakeClock();
      const error = new CredentialError('401');
      const fn = vi.fn().mockRejectedValue(error);

      await expect(withRetry(fn, { sleep: clock.sleep })).rejects.toBe(error);
      expect(fn).toHaveBeenCalledTimes(1);
      expect(clock.slept).toEqual([]);
    });

    it('should give up after maxAttempts with the last error kind', async () => {
      const clock = fakeClock();
      const fn = vi.fn().mockRejectedValue(new RateLimitError('429'));

      const failure = await withRetry(fn, { maxAttempts: 3, jitterRatio: 0, sleep: clock.sleep }).catch(
        (error: unknown) => error
      );

      expect(failure).toBeInstanceOf(RetryExhaustedError);
      if (!(failure instanceof RetryExhaustedError)) return;
      expect(failure.attempts).toBe(3);
      expect(failure.kind).toBe('rate_limit');
      expect(failure.message).toBe('Gave up after 3 attempts: 429');
      expect(fn).toHaveBeenCalledTimes(3);
      expect(clock.slept).toEqual([1000, 2000]);
    });
  });

  describe('RateLimiter', () => {
    it('should let the first call through and space the following ones', async () => {
      const clock = fakeClock(1_000_000);
      const limiter = new RateLimiter(60000, clock);

      await limiter.acquire();
      expect(clock.slept).toEqual([]);

      await limiter.acquire();
      expect(clock.slept).toEqual([60000]);

      await limiter.acquire();
      expect(clock.slept).toEqual([60000, 60000]);
    });

    it('should not wait when the interval already passed', async () => {
      const clock = fakeClock(1_000_000);
      const limiter = new RateLimiter(60000, clock);
      await limiter.acquire();
      await clock.sleep(90000);
      clock.slept.length = 0;

      await limiter.acquire();
      expect(clock.slept).toEqual([]);
      expect(limiter.getWaitTime()).toBe(60000);
    });

    it('should queue concurrent callers in call order', async () => {
      const slept: number[] = [];
      const clock: Clock = { now: () => 0, sleep: async (ms) => void slept.push(ms) };
      const limiter = new RateLimiter(1000, clock);

      await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);
      expect(slept).toEqual([1000, 2000]);
    });
  });

  describe('RateLimiterRegistry', () => {
    it('should hand out one limiter per credential', () => {
      const registry = new RateLimiterRegistry(60000, fakeClock());
      const first = registry.forCredential('test-token-a');
      expect(registry.forCredential('test-token-a')).toBe(first);
      expect(registry.forCredential('test-token-b')).not.toBe(first);
      expect(registry.size).toBe(2);
    });
  });
});
