/**
 * Crawler Orchestrator
 * Runs crawl engines in order until one returns pages
 */

import { env } from '../../config/env';
import { parseCrawlTarget } from '../crawling/url-normalizer';
import type { CrawlEngine } from '../crawling';
import { SiteUnreachableError } from '../scraping/errors';
import { HttpCrawlEngine, CheerioCrawlEngine } from '../../modules/scraper/scrapers';
import { EngineAttempt, OrchestrationResult, OrchestrationStatistics } from './orchestrator.types';

function emptyStatistics(): OrchestrationStatistics {
  return {
    totalOrchestrations: 0,
    failedOrchestrations: 0,
    avgExecutionTime: 0,
    engineUsageCounts: {},
    engineSuccessCounts: {},
  };
}

export class CrawlOrchestrator {
  private readonly statistics: OrchestrationStatistics = emptyStatistics();

  constructor(private readonly engines: readonly CrawlEngine[]) {}

  getEngineNames(): string[] {
    return this.engines.map((engine) => engine.name);
  }

  /**
   * Crawl a raw target. An engine that throws counts as zero pages; the
   * first non-empty result wins. Invalid targets throw InvalidTargetError
   * before any engine runs.
   */
  async crawl(rawUrl: string): Promise<OrchestrationResult> {
    const target = parseCrawlTarget(rawUrl);
    const startTime = Date.now();
    const attempts: EngineAttempt[] = [];

    for (const engine of this.engines) {
      const engineStart = Date.now();
      console.log(`Crawl ${target.domain}: trying ${engine.name} engine...`);

      try {
        const result = await engine.crawl(target);
        const success = result.pages.length > 0;
        attempts.push({
          engine: engine.name,
          success,
          pageCount: result.pages.length,
          executionTime: Date.now() - engineStart,
        });

        if (success) {
          console.log(`Crawl ${target.domain}: ✓ ${engine.name} returned ${result.pages.length} pages`);
          const orchestration: OrchestrationResult = {
            target,
            result,
            engineUsed: engine.name,
            attempts,
            totalTime: Date.now() - startTime,
          };
          this.updateStatistics(orchestration.attempts, orchestration.totalTime, true);
          return orchestration;
        }

        console.warn(`Crawl ${target.domain}: ${engine.name} returned no pages`);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`Crawl ${target.domain}: ${engine.name} failed - ${message}`);
        attempts.push({
          engine: engine.name,
          success: false,
          pageCount: 0,
          executionTime: Date.now() - engineStart,
          error: message,
        });
      }
    }

    this.updateStatistics(attempts, Date.now() - startTime, false);
    throw new SiteUnreachableError(target.normalizedUrl, this.getEngineNames());
  }

  getStatistics(): OrchestrationStatistics {
    return {
      ...this.statistics,
      engineUsageCounts: { ...this.statistics.engineUsageCounts },
      engineSuccessCounts: { ...this.statistics.engineSuccessCounts },
    };
  }

  private updateStatistics(attempts: EngineAttempt[], executionTime: number, success: boolean): void {
    const stats = this.statistics;
    stats.totalOrchestrations++;
    if (!success) {
      stats.failedOrchestrations++;
    }

    stats.avgExecutionTime =
      (stats.avgExecutionTime * (stats.totalOrchestrations - 1) + executionTime) / stats.totalOrchestrations;

    for (const attempt of attempts) {
      stats.engineUsageCounts[attempt.engine] = (stats.engineUsageCounts[attempt.engine] || 0) + 1;
      if (attempt.success) {
        stats.engineSuccessCounts[attempt.engine] = (stats.engineSuccessCounts[attempt.engine] || 0) + 1;
      }
    }
  }
}

export function createDefaultEngines(): CrawlEngine[] {
  const engines: CrawlEngine[] = [new HttpCrawlEngine()];
  if (env.FALLBACK_ENABLED) {
    engines.push(new CheerioCrawlEngine());
  }
  return engines;
}

// Export singleton instance
export const crawlOrchestrator = new CrawlOrchestrator(createDefaultEngines());
