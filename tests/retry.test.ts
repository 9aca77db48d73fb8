import { describe, it, expect, vi, afterEach } from 'vitest';
import { InferenceError, JobCancelledError, NetworkError, RateLimitError } from '../src/pipeline/errors';
import { calculateDelay, DEFAULT_RETRY_CONFIG, shouldRetry, withRetry } from '../src/pipeline/retry';
import type { RetryConfig } from '../src/pipeline/retry';

const fast: RetryConfig = { ...DEFAULT_RETRY_CONFIG, initialDelay: 1, jitter: false };

describe('calculateDelay', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('grows exponentially up to the cap', () => {
    const config = { ...DEFAULT_RETRY_CONFIG, jitter: false };
    expect(calculateDelay(0, config)).toBe(1000);
    expect(calculateDelay(1, config)).toBe(2000);
    expect(calculateDelay(10, config)).toBe(30000);
  });

  it('applies equal jitter between half and the full delay', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(calculateDelay(0, DEFAULT_RETRY_CONFIG)).toBe(500);
  });
});

describe('shouldRetry', () => {
  it('retries transient failures until attempts run out', () => {
    expect(shouldRetry(0, new NetworkError('reset'), DEFAULT_RETRY_CONFIG)).toBe(true);
    expect(shouldRetry(1, new RateLimitError('slow down'), DEFAULT_RETRY_CONFIG)).toBe(true);
    expect(shouldRetry(2, new NetworkError('reset'), DEFAULT_RETRY_CONFIG)).toBe(false);
  });

  it('uses the status code for plain inference errors', () => {
    expect(shouldRetry(0, new InferenceError('timeout', 408), DEFAULT_RETRY_CONFIG)).toBe(true);
    expect(shouldRetry(0, new InferenceError('bad request', 400), DEFAULT_RETRY_CONFIG)).toBe(false);
    expect(shouldRetry(0, new Error('other'), DEFAULT_RETRY_CONFIG)).toBe(false);
  });
});

describe('withRetry', () => {
  it('returns the first success', async () => {
    const fn = vi
      .fn<[number], Promise<string>>()
      .mockRejectedValueOnce(new NetworkError('reset'))
      .mockRejectedValueOnce(new NetworkError('reset'))
      .mockResolvedValueOnce('done');
    const onRetry = vi.fn();

    await expect(withRetry(fn, fast, { onRetry })).resolves.toBe('done');
    expect(fn.mock.calls.map((c) => c[0])).toEqual([0, 1, 2]);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('rethrows the classified error when it is not retryable', async () => {
    const classified = new InferenceError('blocked');
    const fn = vi.fn(async () => {
      throw new Error('raw');
    });

    await expect(withRetry(fn, fast, { classify: () => classified })).rejects.toBe(classified);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('stops waiting when the signal aborts', async () => {
    const controller = new AbortController();
    const fn = vi.fn(async () => {
      throw new NetworkError('reset');
    });

    await expect(
      withRetry(fn, { ...DEFAULT_RETRY_CONFIG, initialDelay: 60000 }, {
        signal: controller.signal,
        onRetry: () => controller.abort(),
      })
    ).rejects.toBeInstanceOf(JobCancelledError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
