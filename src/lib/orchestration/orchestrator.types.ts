/**
 * Crawler Orchestration Types
 */

import type { CrawlTarget } from '../../modules/scraper/scraper.types';
import type { CrawlResult } from '../crawling';

/**
 * One engine's run within an orchestration
 */
export interface EngineAttempt {
  engine: string;
  /**
   * True when the engine returned at least one page
   */
  success: boolean;
  pageCount: number;
  executionTime: number;
  error?: string;
}

export interface OrchestrationResult {
  target: CrawlTarget;
  result: CrawlResult;
  engineUsed: string;
  attempts: EngineAttempt[];
  totalTime: number;
}

export interface OrchestrationStatistics {
  totalOrchestrations: number;
  failedOrchestrations: number;
  avgExecutionTime: number;
  engineUsageCounts: Record<string, number>;
  engineSuccessCounts: Record<string, number>;
}
