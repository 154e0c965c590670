/**
 * Bounded retry with exponential backoff for model calls
 */

import { isModelCallError } from '@/lib/detection/errors';

export interface RetryConfig {
  maxAttempts: number;
  /** Delay before the second attempt; doubles for each one after */
  baseDelay?: number;
  maxDelay?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  /** Aborting stops the wait between attempts */
  signal?: AbortSignal;
}

/**
 * Thrown when every attempt failed with a retryable error
 */
export class RetryError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(message);
    this.name = 'RetryError';
  }
}

/**
 * Backoff before attempt `attempt + 1`: baseDelay * 2^(attempt - 1), capped
 */
export function calculateDelay(baseDelay: number, attempt: number, maxDelay: number): number {
  return Math.floor(Math.min(baseDelay * 2 ** (attempt - 1), maxDelay));
}

/**
 * Default retry predicate. Model call errors decide for themselves; other
 * errors are retried only when they carry a 429 or 5xx status.
 */
export function isRetryable(error: unknown): boolean {
  if (isModelCallError(error)) {
    return error.retryable;
  }

  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status === 429 || (error.status >= 500 && error.status < 600);
  }

  return false;
}

export async function retryWithBackoff<T>(fn: () => Promise<T>, config: RetryConfig): Promise<T> {
  const { maxAttempts, baseDelay = 1000, maxDelay = 30000, shouldRetry = isRetryable, onRetry, signal } = config;

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(signal);

    try {
      return await fn();
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));

      if (!shouldRetry(error)) {
        throw failure;
      }
      if (attempt >= maxAttempts) {
        throw new RetryError(`Failed after ${attempt} attempts: ${failure.message}`, attempt, failure);
      }

      const delayMs = calculateDelay(baseDelay, attempt, maxDelay);
      onRetry?.(failure, attempt, delayMs);
      await wait(delayMs, signal);
    }
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new Error('Retry aborted');
  }
}

function wait(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Retry aborted'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error('Retry aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
