/**
 * Retry logic with exponential backoff for recognition calls
 */

import { PipelineCancelledError, isRetryable } from './errors';
import { warn } from './log';

export interface RetryConfig {
  /** Retries after the first attempt */
  retries: number;
  /** Delay before the first retry in milliseconds */
  baseDelayMs: number;
  /** Upper bound for a single delay */
  maxDelayMs: number;
  /** Scale delays into [50%, 100%] */
  jitter: boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  retries: 1,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitter: true,
};

export function backoffDelay(attempt: number, config: RetryConfig): number {
  const delay = Math.min(config.baseDelayMs * Math.pow(2, attempt), config.maxDelayMs);
  return config.jitter ? delay * (0.5 + Math.random() * 0.5) : delay;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Run fn, retrying recognition failures. Anything else, and the last
 * failure once retries are spent, propagates unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  signal?: AbortSignal
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= config.retries || !isRetryable(error) || signal?.aborted) {
        throw error;
      }
      const delay = backoffDelay(attempt, config);
      warn('retry.backoff', {
        attempt: attempt + 1,
        delayMs: Math.round(delay),
        error: error instanceof Error ? error.message : String(error),
      });
      await sleep(delay, signal);
      // Cancelled while backing off: no further attempt
      if (signal?.aborted) throw new PipelineCancelledError();
    }
  }
}
