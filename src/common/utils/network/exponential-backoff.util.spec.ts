import { afterEach, describe, expect, it, vi } from 'vitest';

import {
  BackoffExhaustedError,
  computeBackoffDelayMs,
  executeWithExponentialBackoff,
} from './exponential-backoff.util';

describe('executeWithExponentialBackoff', (): void => {
  afterEach((): void => {
    vi.useRealTimers();
  });

  it('returns the first successful result', async (): Promise<void> => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('HTTP 503'))
      .mockResolvedValueOnce('ok');

    const result: string = await executeWithExponentialBackoff(operation, {
      maxAttempts: 3,
      baseDelayMs: 0,
      shouldRetry: (): boolean => true,
    });

    expect(result).toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('stops after max attempts and reports them', async (): Promise<void> => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('HTTP 503'));
    const onRetry = vi.fn();

    const error: unknown = await executeWithExponentialBackoff(operation, {
      maxAttempts: 3,
      baseDelayMs: 0,
      shouldRetry: (): boolean => true,
      onRetry,
    }).catch((caught: unknown): unknown => caught);

    expect(error).toBeInstanceOf(BackoffExhaustedError);
    expect(error).toMatchObject({ attempts: 3, retryable: true });
    expect(operation).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('does not retry non-retryable errors', async (): Promise<void> => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('HTTP 404'));

    const error: unknown = await executeWithExponentialBackoff(operation, {
      maxAttempts: 3,
      baseDelayMs: 0,
      shouldRetry: (): boolean => false,
    }).catch((caught: unknown): unknown => caught);

    expect(error).toMatchObject({ attempts: 1, retryable: false });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('waits between attempts with doubling delay', async (): Promise<void> => {
    vi.useFakeTimers();
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('timeout'))
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValueOnce('ok');

    const pending: Promise<string> = executeWithExponentialBackoff(operation, {
      maxAttempts: 3,
      baseDelayMs: 100,
      maxDelayMs: 1000,
      shouldRetry: (): boolean => true,
    });

    await vi.advanceTimersByTimeAsync(99);
    expect(operation).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(301);

    await expect(pending).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
  });
});

describe('computeBackoffDelayMs', (): void => {
  it('caps the delay at the configured maximum', (): void => {
    expect(computeBackoffDelayMs(1, 500, 3000)).toBe(500);
    expect(computeBackoffDelayMs(3, 500, 3000)).toBe(2000);
    expect(computeBackoffDelayMs(4, 500, 3000)).toBe(3000);
  });
});
