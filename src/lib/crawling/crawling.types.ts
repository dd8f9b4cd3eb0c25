/**
 * Crawling Types
 * Type definitions shared by the crawl engines and the orchestrator
 */

import type { CrawlTarget, ExtractedPage } from '../../modules/scraper/scraper.types';

/**
 * Crawling configuration interface
 */
export interface CrawlingConfig {
  /**
   * Maximum pages to extract
   */
  maxPages: number;

  /**
   * Request timeout in milliseconds
   */
  timeout: number;

  /**
   * Attempts per header profile for transient failures
   */
  maxAttempts: number;

  /**
   * First retry delay in milliseconds, doubled on every further attempt
   */
  retryBaseDelay: number;
}

/**
 * A page the crawl gave up on, kept for logging only
 */
export interface SkippedPage {
  url: string;
  reason: string;
}

export interface CrawlResult {
  domain: string;
  pages: ExtractedPage[];
  skipped: SkippedPage[];
}

/**
 * One way of crawling a site. The orchestrator tries engines in order.
 */
export interface CrawlEngine {
  readonly name: string;
  crawl(target: CrawlTarget): Promise<CrawlResult>;
}
