import { describe, expect, it, vi, afterEach } from 'vitest';
import { backoffDelay, sleep } from './retry';

describe('backoffDelay', () => {
  const retry = { count: 5, initialDelayMs: 100, backoffFactor: 2, maxDelayMs: 500 };

  it('grows exponentially up to the cap', () => {
    expect([1, 2, 3, 4, 5].map((attempt) => backoffDelay(retry, attempt))).toEqual([
      100, 200, 400, 500, 500,
    ]);
  });
});

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves true after the delay', async () => {
    vi.useFakeTimers();
    const done = sleep(1000);
    await vi.advanceTimersByTimeAsync(1000);
    await expect(done).resolves.toBe(true);
  });

  it('resolves false when aborted', async () => {
    const controller = new AbortController();
    const done = sleep(60_000, controller.signal);
    controller.abort();
    await expect(done).resolves.toBe(false);
  });

  it('resolves false immediately for an aborted signal', async () => {
    await expect(sleep(60_000, AbortSignal.abort())).resolves.toBe(false);
  });
});
