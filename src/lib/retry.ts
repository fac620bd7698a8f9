/**
 * Retry with exponential backoff for operations that are expected to settle
 * shortly (e.g. a container's port binding becoming visible).
 * Only errors accepted by `shouldRetry` are retried; anything else propagates at once.
 */

export interface RetryOpts {
  /** Total attempts including the first (default 5) */
  attempts?: number;
  /** Delay before the second attempt in ms (doubles each retry, default 200) */
  baseDelayMs?: number;
  /** Upper bound for a single delay (default 2000) */
  maxDelayMs?: number;
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
}

export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  opts?: RetryOpts,
): Promise<T> {
  const attempts = Math.max(1, opts?.attempts ?? 5);
  const baseDelay = opts?.baseDelayMs ?? 200;
  const maxDelay = opts?.maxDelayMs ?? 2000;
  const shouldRetry = opts?.shouldRetry ?? (() => true);

  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === attempts - 1 || !shouldRetry(err)) break;
      const delay = backoffDelay(attempt, baseDelay, maxDelay);
      opts?.onRetry?.(err, attempt + 1, delay);
      await sleep(delay);
    }
  }

  throw lastError;
}
