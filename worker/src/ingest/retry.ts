import { RetryExhaustedError } from './errors.js';

export const delay = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
};

export type RunWithRetryParams<T> = RetryPolicy & {
  operation: string;
  runStep: () => Promise<T>;
  isRetryableError: (err: unknown) => boolean;
  /** Runs after the backoff sleep and before the next attempt. */
  beforeRetry?: (attempt: number) => Promise<void>;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (params: {
    attempt: number;
    maxAttempts: number;
    error: unknown;
    delayMs: number;
  }) => void;
  onSuccessAfterRetry?: (params: {
    attempts: number;
    maxAttempts: number;
  }) => void;
  onExhausted?: (params: {
    attempt: number;
    maxAttempts: number;
    error: unknown;
  }) => void;
};

/**
 * Bounded retry with exponential backoff (`baseDelayMs * 2^(attempt-1)`).
 * Non-retryable errors are rethrown as-is; running out of attempts throws
 * RetryExhaustedError with the last error as its cause.
 */
export async function runWithRetry<T>(params: RunWithRetryParams<T>) {
  const maxAttempts = Math.max(1, params.maxAttempts);
  const sleep = params.sleep ?? delay;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      if (attempt > 1) await params.beforeRetry?.(attempt);
      const value = await params.runStep();
      if (attempt > 1) {
        params.onSuccessAfterRetry?.({ attempts: attempt, maxAttempts });
      }
      return value;
    } catch (err) {
      lastError = err;
      if (!params.isRetryableError(err)) throw err;
      if (attempt >= maxAttempts) break;

      const delayMs = params.baseDelayMs * 2 ** (attempt - 1);
      params.onRetry?.({ attempt, maxAttempts, error: err, delayMs });
      await sleep(delayMs);
    }
  }

  params.onExhausted?.({ attempt: maxAttempts, maxAttempts, error: lastError });
  throw new RetryExhaustedError(params.operation, maxAttempts, lastError);
}
