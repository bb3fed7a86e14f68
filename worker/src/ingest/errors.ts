export type FailureKind = 'size-exceeded' | 'transient' | 'permanent';

/** A unit or request too large for one ingestion attempt. Never retried. */
export class SizeExceededError extends Error {
  code = 'SIZE_EXCEEDED' as const;
  constructor(
    message: string,
    public readonly size?: number,
    public readonly limit?: number,
  ) {
    super(message);
    this.name = 'SizeExceededError';
  }
}

export class RetryExhaustedError extends Error {
  code = 'RETRY_EXHAUSTED' as const;
  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    cause: unknown,
  ) {
    super(
      `${operation} failed after ${attempts} attempt(s): ${
        getErrorMessage(cause) ?? 'unknown error'
      }`,
      { cause },
    );
    this.name = 'RetryExhaustedError';
  }
}

export class QueueFileError extends Error {
  code = 'QUEUE_FILE_INVALID' as const;
  constructor(
    public readonly filePath: string,
    detail: string,
  ) {
    super(`Unreadable state file ${filePath}: ${detail}`);
    this.name = 'QueueFileError';
  }
}

export class LockTimeoutError extends Error {
  code = 'LOCK_TIMEOUT' as const;
  constructor(public readonly lockPath: string) {
    super(`Timed out waiting for lock ${lockPath}`);
    this.name = 'LockTimeoutError';
  }
}

export function getErrorMessage(err: unknown): string | undefined {
  if (!err) return undefined;
  if (typeof err === 'string') return err;
  if (err instanceof Error) return err.message;
  if (
    typeof err === 'object' &&
    'message' in err &&
    typeof err.message === 'string'
  ) {
    return err.message;
  }
  return undefined;
}

const SIZE_PATTERN =
  /context length|maximum context|too many tokens|too large|payload too large|exceeds? (the )?(maximum|limit)|\b413\b|invalid string length|array buffer allocation failed|heap out of memory/i;

const TRANSIENT_PATTERN =
  /ECONNREFUSED|ECONNRESET|ETIMEDOUT|EAI_AGAIN|EPIPE|socket hang up|fetch failed|network|timed? ?out|\b(429|500|502|503|504)\b|unavailable|Reconnecting\.\.\./i;

export function isSizeExceeded(err: unknown): boolean {
  if (err instanceof SizeExceededError) return true;
  if (err instanceof RetryExhaustedError) return isSizeExceeded(err.cause);
  if (err instanceof RangeError) return true;
  const message = getErrorMessage(err);
  return Boolean(message && SIZE_PATTERN.test(message));
}

export function classifyFailure(err: unknown): FailureKind {
  if (isSizeExceeded(err)) return 'size-exceeded';
  if (err instanceof RetryExhaustedError) return 'permanent';
  const message = getErrorMessage(err);
  if (message && TRANSIENT_PATTERN.test(message)) return 'transient';
  return 'permanent';
}

/**
 * Anything that is not a size problem is worth another attempt: unknown
 * backend errors are treated like transient ones.
 */
export function isRetryableError(err: unknown): boolean {
  return !isSizeExceeded(err) && !(err instanceof RetryExhaustedError);
}
