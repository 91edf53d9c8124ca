const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 1000;
const DEFAULT_MAX_DELAY_MS = 15_000;
const BACKOFF_MULTIPLIER = 2;

export interface IExponentialBackoffOptions {
  readonly maxAttempts?: number;
  readonly baseDelayMs?: number;
  readonly maxDelayMs?: number;
  readonly shouldRetry: (error: unknown, attempt: number) => boolean;
  readonly onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/** Thrown once retries stop; `cause` carries the last failure. */
export class BackoffExhaustedError extends Error {
  public constructor(
    public readonly attempts: number,
    public readonly retryable: boolean,
    cause: unknown,
  ) {
    super(`Gave up after ${String(attempts)} attempt(s)`, { cause });
    this.name = BackoffExhaustedError.name;
  }
}

const sleep = async (delayMs: number): Promise<void> => {
  if (delayMs <= 0) {
    return;
  }

  await new Promise<void>((resolve: () => void): void => {
    setTimeout(resolve, delayMs);
  });
};

const resolveInteger = (value: number | undefined, fallback: number, min: number): number => {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < min) {
    return fallback;
  }

  return Math.floor(value);
};

export const computeBackoffDelayMs = (
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number => Math.min(baseDelayMs * BACKOFF_MULTIPLIER ** (attempt - 1), maxDelayMs);

export const executeWithExponentialBackoff = async <TResult>(
  operation: () => Promise<TResult>,
  options: IExponentialBackoffOptions,
): Promise<TResult> => {
  const maxAttempts: number = resolveInteger(options.maxAttempts, DEFAULT_MAX_ATTEMPTS, 1);
  const baseDelayMs: number = resolveInteger(options.baseDelayMs, DEFAULT_BASE_DELAY_MS, 0);
  const maxDelayMs: number = resolveInteger(options.maxDelayMs, DEFAULT_MAX_DELAY_MS, 0);
  let lastError: unknown = null;

  for (let attempt: number = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await operation();
    } catch (error: unknown) {
      lastError = error;

      if (!options.shouldRetry(error, attempt)) {
        throw new BackoffExhaustedError(attempt, false, error);
      }

      if (attempt === maxAttempts) {
        break;
      }

      const delayMs: number = computeBackoffDelayMs(attempt, baseDelayMs, maxDelayMs);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }

  throw new BackoffExhaustedError(maxAttempts, true, lastError);
};
