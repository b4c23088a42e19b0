/**
 * Retry wrapper for external API calls (Google APIs, the research provider).
 * Default policy is exponential backoff with jitter; callers can swap in their
 * own retry predicate and delay schedule.
 */

const DEFAULT_MAX_ATTEMPTS = 4;
const INITIAL_DELAY_MS = 1000;
const MAX_DELAY_MS = 15000;

export interface RetryOptions {
  /** Total attempts including the first one. */
  maxAttempts?: number;
  shouldRetry?: (err: unknown) => boolean;
  /** Wait after the given failed attempt (1-based) before trying again. */
  delayMs?: (attempt: number) => number;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (err: unknown, attempt: number, waitMs: number) => void;
}

export function isRetryable(err: unknown): boolean {
  if (err && typeof err === 'object' && 'code' in err) {
    const code = Number(err.code);
    if (code === 401 || code === 403 || code === 400 || code === 404) return false;
    if (code === 429 || code >= 500) return true;
  }
  if (err instanceof Error && /network|timeout|ECONNRESET|ETIMEDOUT|socket hang up/i.test(err.message)) return true;
  return false;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function jitter(ms: number): number {
  return Math.floor(ms * (0.5 + Math.random() * 0.5));
}

export function exponentialDelay(attempt: number): number {
  return jitter(Math.min(INITIAL_DELAY_MS * Math.pow(2, attempt - 1), MAX_DELAY_MS));
}

/**
 * Run a promise-returning function until it succeeds, the error is not
 * retryable, or the attempt budget is spent. The last error is rethrown.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const shouldRetry = options.shouldRetry ?? isRetryable;
  const delayMs = options.delayMs ?? exponentialDelay;
  const sleep = options.sleep ?? delay;
  let lastErr: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastErr = err;
      if (attempt === maxAttempts || !shouldRetry(err)) throw err;
      const waitMs = delayMs(attempt);
      options.onRetry?.(err, attempt, waitMs);
      await sleep(waitMs);
    }
  }
  throw lastErr;
}
