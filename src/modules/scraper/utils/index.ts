/**
 * Scraper utilities barrel export
 */

export { retryWithBackoff, sleep } from './retry';
export type { RetryOptions } from './retry';
