import { isSourceError } from '../errors.js';
import { logger } from '../observability/logger.js';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  label: string;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export function isRetryable(error: unknown): boolean {
  return isSourceError(error) && error.kind === 'transient';
}

/**
 * Runs `operation` up to `maxAttempts` times, doubling the delay after each transient failure.
 * Anything other than a transient source error is rethrown immediately.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(options.maxAttempts, 1);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (!isRetryable(error) || attempt >= attempts) {
        throw error;
      }
      const delayMs = options.baseDelayMs * 2 ** (attempt - 1);
      logger.warn('source_retry', { source: options.label, attempt, delayMs });
      await wait(delayMs);
    }
  }
}
