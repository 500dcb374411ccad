import { setTimeout as delay } from 'node:timers/promises';
import { describe, expect, it } from 'vitest';
import { chunk, createRequestLimiter, runWithConcurrency, settleAll } from '../src/index.js';

describe('createRequestLimiter', () => {
  it('should start jobs in order, spaced by the minimum interval', async () => {
    const limiter = createRequestLimiter({ minIntervalMs: 30 });
    const started: Array<{ id: number; at: number }> = [];

    await Promise.all(
      [1, 2, 3].map((id) =>
        limiter.schedule(async () => {
          started.push({ id, at: Date.now() });
        })
      )
    );

    expect(started.map((s) => s.id)).toEqual([1, 2, 3]);
    const [first, second, third] = started.map((s) => s.at);
    expect((second ?? 0) - (first ?? 0)).toBeGreaterThanOrEqual(25);
    expect((third ?? 0) - (second ?? 0)).toBeGreaterThanOrEqual(25);
  });

  it('should pass rejections through to the caller', async () => {
    const limiter = createRequestLimiter({ minIntervalMs: 0 });

    await expect(
      limiter.schedule(async () => {
        throw new Error('upstream');
      })
    ).rejects.toThrow('upstream');
  });
});

describe('settleAll', () => {
  it('should keep input order and isolate failures', async () => {
    const limiter = createRequestLimiter({ minIntervalMs: 0, maxConcurrent: 2 });

    const settled = await settleAll(limiter, [1, 2, 3], async (n) => {
      if (n === 2) {
        throw new Error('two');
      }
      return n * 10;
    });

    expect(settled[0]).toEqual({ status: 'fulfilled', value: 10 });
    expect(settled[1]?.status).toBe('rejected');
    expect(settled[2]).toEqual({ status: 'fulfilled', value: 30 });
  });
});

describe('runWithConcurrency', () => {
  it('should cap calls in flight', async () => {
    let active = 0;
    let peak = 0;

    await runWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
    });

    expect(peak).toBe(3);
  });

  it('should handle an empty list', async () => {
    expect(await runWithConcurrency([], 3, async () => 1)).toEqual([]);
  });
});

describe('chunk', () => {
  it('should split into consecutive groups', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });
});
