/**
 * Retry utility for provider calls.
 * Exponential backoff without jitter, capped per wait; waits never shrink
 * from one attempt to the next.
 */

export interface RetryOptions<T> {
  /** Total attempts, first call included. */
  maxAttempts: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
  fn: (attempt: number) => Promise<T>;
  shouldRetry: (error: unknown) => boolean;
  onAttemptFailed?: (error: unknown, attempt: number, retrying: boolean) => void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Raised once the retry budget is spent on retryable failures.
 * Non-retryable failures propagate unchanged instead.
 */
export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(
      `${lastError instanceof Error ? lastError.message : String(lastError)} (gave up after ${attempts} attempts)`,
      { cause: lastError },
    );
    this.name = 'RetryExhaustedError';
  }
}

export async function withRetry<T>(options: RetryOptions<T>): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await options.fn(attempt);
    } catch (error: unknown) {
      const retryable = options.shouldRetry(error);
      const canRetry = retryable && attempt < maxAttempts;
      options.onAttemptFailed?.(error, attempt, canRetry);

      if (!retryable) {
        throw error;
      }

      if (!canRetry) {
        throw new RetryExhaustedError(attempt, error);
      }

      await sleep(computeBackoffMs(options.baseBackoffMs, options.maxBackoffMs, attempt));
    }
  }
}

/** Wait before retry number `attempt` (1-based): base * 2^(attempt-1), capped. */
export function computeBackoffMs(baseMs: number, maxMs: number, attempt: number): number {
  const exponential = Math.max(0, baseMs) * 2 ** Math.max(0, attempt - 1);
  return Math.min(exponential, Math.max(0, maxMs));
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
