import { describe, it, expect } from 'vitest';
import { mapWithConcurrency, withTimeout } from '@jarsync/types';

describe('mapWithConcurrency', () => {
  it('should keep input order and respect the limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await mapWithConcurrency([30, 10, 20, 5, 15], 2, async (ms, index) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, ms));
      inFlight--;
      return index * 10;
    });

    expect(results).toEqual([0, 10, 20, 30, 40]);
    expect(peak).toBe(2);
  });

  it('should handle an empty list', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});

describe('withTimeout', () => {
  it('should resolve when the promise settles first', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 50, () => new Error('late'))).resolves.toBe('ok');
  });

  it('should reject with the timeout error otherwise', async () => {
    const never = new Promise<string>(() => undefined);
    await expect(withTimeout(never, 10, () => new Error('late'))).rejects.toThrow('late');
  });
});
