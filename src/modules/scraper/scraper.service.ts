/**
 * Digest Service
 * crawl → categorize → page dedup → assemble
 */

import { env } from '../../config/env';
import { CrawlOrchestrator, crawlOrchestrator } from '../../lib/orchestration';
import { Categorizer, categorizer } from '../../lib/categorization';
import { DigestAssembler, digestAssembler, deduplicatePages, parseDedupPolicy } from '../../lib/digest';
import { CategorizedPage, DedupPolicy, IDigestResponse, PageCategory } from './scraper.types';

export interface DigestServiceOptions {
  orchestrator?: CrawlOrchestrator;
  categorizer?: Categorizer;
  assembler?: DigestAssembler;
  dedupPolicy?: DedupPolicy;
}

/**
 * ISO-8601 UTC, whole seconds
 */
export function timestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export class DigestService {
  private readonly orchestrator: CrawlOrchestrator;
  private readonly categorizer: Categorizer;
  private readonly assembler: DigestAssembler;
  private readonly dedupPolicy: DedupPolicy;

  constructor(options: DigestServiceOptions = {}) {
    this.orchestrator = options.orchestrator || crawlOrchestrator;
    this.categorizer = options.categorizer || categorizer;
    this.assembler = options.assembler || digestAssembler;
    this.dedupPolicy = options.dedupPolicy || parseDedupPolicy(env.DIGEST_DEDUP_POLICY);
  }

  /**
   * Throws InvalidTargetError for bad input and SiteUnreachableError when no
   * engine extracted a page
   */
  async createDigest(rawUrl: string): Promise<IDigestResponse> {
    const { target, result, engineUsed } = await this.orchestrator.crawl(rawUrl);

    const categorized: CategorizedPage[] = result.pages.map((page) => ({
      ...page,
      category: this.categorizer.categorize(page.url, page),
    }));
    const pages = deduplicatePages(categorized, this.dedupPolicy);
    const digest = this.assembler.assemble(target.domain, pages);

    const categories = [...new Set(pages.map((page) => page.category))].sort();

    console.log(
      `Crawl ${target.domain}: digest via ${engineUsed}, ${pages.length}/${result.pages.length} pages kept, ${digest.blocks.length} blocks, ${digest.totalBytes} bytes`
    );

    return {
      success: true,
      url: target.normalizedUrl,
      domain: target.domain,
      ts: timestamp(),
      categories,
      hasPricing: categories.includes(PageCategory.PRICING),
      hasBlog: categories.includes(PageCategory.BLOG),
      hasCareers: categories.includes(PageCategory.CAREERS),
      pageCount: pages.length,
      content: digest.content,
    };
  }
}

export const digestService = new DigestService();
