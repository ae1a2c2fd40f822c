import type { RetryConfig } from '@repairbench/shared';

/**
 * delay = min(maxDelayMs, initialDelayMs * backoffFactor ^ (attempt - 1))
 *
 * @param attempt 1 for the first retry
 */
export function backoffDelay(retry: RetryConfig, attempt: number): number {
  return Math.min(retry.maxDelayMs, retry.initialDelayMs * Math.pow(retry.backoffFactor, attempt - 1));
}

/**
 * Waits `ms`, resolving `false` early if the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
