import { RateLimitError, RetryExhaustedError, TranslationError } from '../errors.js';

export interface RetryConfig {
  /** Total attempts, including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Stops further attempts and cuts a pending backoff short. */
  signal?: AbortSignal;
}

const DEFAULT_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  shouldRetry: isRetryable,
};

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const { maxAttempts, baseDelayMs, maxDelayMs, shouldRetry, onRetry, signal } = { ...DEFAULT_CONFIG, ...config };

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    signal?.throwIfAborted();
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (signal?.aborted || !shouldRetry(error)) {
        throw error;
      }

      if (attempt === maxAttempts) {
        break;
      }

      const delay = calculateDelay(error, attempt - 1, baseDelayMs, maxDelayMs);
      onRetry?.(error, attempt, delay);
      await sleep(delay, signal);
    }
  }

  throw new RetryExhaustedError(maxAttempts, lastError);
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof TranslationError) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (message.includes('rate limit') || message.includes('429')) {
      return true;
    }
    if (message.includes('500') || message.includes('502') || message.includes('503')) {
      return true;
    }
    if (message.includes('timeout') || message.includes('econnreset')) {
      return true;
    }
  }

  return false;
}

export function calculateDelay(
  error: unknown,
  retryIndex: number,
  baseDelayMs: number,
  maxDelayMs: number = 30000
): number {
  if (error instanceof RateLimitError && error.retryAfterMs > 0) {
    return Math.min(error.retryAfterMs, maxDelayMs);
  }

  const exponentialDelay = baseDelayMs * Math.pow(2, retryIndex);
  const jitter = Math.random() * 0.3 * exponentialDelay;
  return Math.min(exponentialDelay + jitter, maxDelayMs);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(signal.reason);
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
