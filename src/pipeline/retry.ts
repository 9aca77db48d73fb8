/**
 * Retry logic with exponential backoff
 */

import {
  InferenceError,
  JobCancelledError,
  NetworkError,
  RateLimitError,
  ServerError,
  TimeoutError,
} from './errors';

export interface RetryConfig {
  /** Maximum number of retry attempts after the first call */
  maxRetries: number;
  /** Initial delay between retries in milliseconds */
  initialDelay: number;
  /** Maximum delay between retries in milliseconds */
  maxDelay: number;
  exponentialBase: number;
  /** Add random jitter to delays */
  jitter: boolean;
  /** HTTP status codes that should trigger retry */
  retryableStatusCodes: Set<number>;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  initialDelay: 1000,
  maxDelay: 30000,
  exponentialBase: 2,
  jitter: true,
  retryableStatusCodes: new Set([408, 429, 500, 502, 503, 504]),
};

export function calculateDelay(attempt: number, config: RetryConfig): number {
  let delay = Math.min(
    config.initialDelay * Math.pow(config.exponentialBase, attempt),
    config.maxDelay
  );

  if (config.jitter) {
    // "Equal jitter": random value between 50% and 100% of delay.
    delay = delay * (0.5 + Math.random() * 0.5);
  }

  return delay;
}

export function shouldRetry(attempt: number, error: unknown, config: RetryConfig): boolean {
  if (attempt >= config.maxRetries) {
    return false;
  }

  if (error instanceof NetworkError || error instanceof TimeoutError) {
    return true;
  }

  if (error instanceof RateLimitError || error instanceof ServerError) {
    return true;
  }

  if (
    error instanceof InferenceError &&
    error.statusCode !== undefined &&
    config.retryableStatusCodes.has(error.statusCode)
  ) {
    return true;
  }

  return false;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new JobCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new JobCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Execute function with retry logic. `classify` maps raw failures onto the
 * error family `shouldRetry` understands.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  opts: { signal?: AbortSignal; classify?: (e: unknown) => unknown; onRetry?: (attempt: number, error: unknown, delayMs: number) => void } = {}
): Promise<T> {
  const classify = opts.classify ?? ((e: unknown) => e);

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (raw) {
      const error = classify(raw);
      if (opts.signal?.aborted || !shouldRetry(attempt, error, config)) {
        throw error;
      }
      const delay = calculateDelay(attempt, config);
      opts.onRetry?.(attempt, error, delay);
      await sleep(delay, opts.signal);
    }
  }
}
