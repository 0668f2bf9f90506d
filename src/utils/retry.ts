import { sleep } from "./time.js";

export interface RetryOptions {
  attempts: number;
  /** Delay before retry n is `baseDelayMs * n`. */
  baseDelayMs: number;
  signal?: AbortSignal;
  onRetry?: (err: unknown, attempt: number) => void;
}

/**
 * Runs `fn` up to `attempts` times with linear backoff, rethrowing the last
 * error. An aborted signal stops further attempts and rejects with its reason.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= opts.attempts; attempt++) {
    if (opts.signal?.aborted) throw opts.signal.reason;
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (opts.signal?.aborted) throw opts.signal.reason;
      if (attempt < opts.attempts) {
        opts.onRetry?.(err, attempt);
        await sleep(opts.baseDelayMs * attempt, opts.signal);
      }
    }
  }
  throw lastError;
}
