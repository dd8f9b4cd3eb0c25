/**
 * Retry utility with exponential backoff
 */

import { env } from '../../../config/env';
import { classifyError, ScrapingError } from '../../../lib/scraping/errors';

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  onRetry?: (error: ScrapingError, attempt: number, delay: number) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run fn until it succeeds, retrying only errors classified as retryable.
 * Delay before retry n (1-based) is baseDelay * 2^(n-1).
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = env.CRAWL_MAX_ATTEMPTS,
    baseDelay = env.RETRY_BACKOFF_BASE,
    onRetry,
  } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      const classified = classifyError(error);
      if (!classified.retryable || attempt >= maxAttempts) {
        throw error;
      }

      const delay = baseDelay * Math.pow(2, attempt - 1);
      onRetry?.(classified, attempt, delay);
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }
}
