export interface RetryOptions {
  /** Total attempts, including the first call. */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY: RetryOptions = {
  attempts: 3,
  baseDelayMs: 50,
  maxDelayMs: 1000,
};

/**
 * Run `fn`, retrying while `shouldRetry(err)` holds.
 * Backoff is linear: baseDelayMs × attempt, capped at maxDelayMs.
 * The last error is rethrown once attempts are exhausted.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  shouldRetry: (err: unknown) => boolean,
  opts: RetryOptions = DEFAULT_RETRY,
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void
): Promise<T> {
  let attempt = 1;
  for (;;) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= opts.attempts || !shouldRetry(err)) {
        throw err;
      }
      const delayMs = Math.min(opts.maxDelayMs, opts.baseDelayMs * attempt);
      onRetry?.(err, attempt, delayMs);
      await sleep(delayMs);
      attempt++;
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
