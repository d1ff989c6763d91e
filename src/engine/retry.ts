/**
 * Retry, timeout and bounded-concurrency helpers for external calls.
 */

/** Exponential backoff policy. */
export interface RetryPolicy {
  /** Total attempts, including the first. */
  maxAttempts: number;
  baseDelayMs: number;
  /** Upper bound for a single delay before jitter. */
  maxDelayMs: number;
  /** Fraction of the delay randomized (0 disables jitter). */
  jitterRatio: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 30_000,
  jitterRatio: 0.2,
};

/** Outcome of `retryWithBackoff`. */
export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number; exhausted: boolean };

export interface RetryOptions {
  /** Errors for which this returns false end the loop immediately. */
  isRetryable: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/** Delay before the attempt following `attempt` (1-based). */
export function computeBackoff(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt - 1));
  if (policy.jitterRatio <= 0) return exponential;
  const spread = exponential * policy.jitterRatio;
  return Math.max(0, Math.round(exponential - spread + random() * spread * 2));
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error, or
 * `policy.maxAttempts` is reached. Never throws; the outcome says which.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  const sleepFn = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (err) {
      lastError = err;
      if (!options.isRetryable(err)) {
        return { ok: false, error: err, attempts: attempt, exhausted: false };
      }
      if (attempt < maxAttempts) {
        const delay = computeBackoff(policy, attempt, options.random);
        options.onRetry?.(err, attempt, delay);
        await sleepFn(delay);
      }
    }
  }

  return { ok: false, error: lastError, attempts: maxAttempts, exhausted: true };
}

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number, label: string) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Execute `fn` with a deadline. The signal handed to `fn` aborts when the
 * deadline passes or when `parentSignal` aborts.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parentSignal?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parentSignal?.reason);
  parentSignal?.addEventListener('abort', onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(timeoutMs, label);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}

/**
 * Map over `items` with at most `limit` calls in flight. Results keep the
 * input order. `fn` is expected to handle its own errors.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
