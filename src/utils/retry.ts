export type RetryOptions = {
  retries: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
};

export function computeBackoffMs(attempt: number, baseDelayMs: number, maxDelayMs?: number): number {
  const delay = baseDelayMs * 2 ** Math.max(0, attempt);
  return maxDelayMs === undefined ? delay : Math.min(delay, maxDelayMs);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Runs `fn` until it succeeds, the retry budget is spent, `shouldRetry` rejects
 * the error, or `signal` aborts. The last error is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  let attempt = 0;
  for (;;) {
    try {
      return await fn();
    } catch (err) {
      const retryable = options.shouldRetry ? options.shouldRetry(err) : true;
      if (!retryable || attempt >= options.retries || options.signal?.aborted) {
        throw err;
      }
      const delayMs = computeBackoffMs(attempt, options.baseDelayMs, options.maxDelayMs);
      options.onRetry?.(err, attempt + 1, delayMs);
      await sleep(delayMs, options.signal);
      attempt += 1;
    }
  }
}
