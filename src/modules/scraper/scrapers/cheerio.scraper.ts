/**
 * Cheerio Scraper - Fallback engine
 * Concurrent Crawlee crawl with its own sessions, cookies, redirect and
 * retry policy. Runs only after the HTTP engine came back empty.
 */

import * as cheerio from 'cheerio';
import { env } from '../../../config/env';
import type { CrawlTarget, ExtractedPage } from '../scraper.types';
import type { CrawlEngine, CrawlResult, SkippedPage } from '../../../lib/crawling';
import { DuplicateDetector, LinkDiscoverer, linkDiscoverer, normalizeUrl } from '../../../lib/crawling';
import { HtmlProcessor, htmlProcessor } from '../../../lib/processing';
import { BROWSER_PROFILE, buildHeaders } from '../../../lib/scraping';

export interface CheerioScraperOptions {
  maxPages?: number;
  concurrency?: number;
  delayMs?: number;
  maxRetries?: number;
  maxRedirects?: number;
  navigationTimeout?: number;
  /**
   * Whole-run budget; the crawl is abandoned once it elapses
   */
  timeout?: number;
  htmlProcessor?: HtmlProcessor;
  linkDiscoverer?: LinkDiscoverer;
}

const HOMEPAGE_LABEL = 'HOMEPAGE';

export class CheerioCrawlEngine implements CrawlEngine {
  readonly name = 'crawlee';

  private readonly maxPages: number;
  private readonly concurrency: number;
  private readonly delayMs: number;
  private readonly maxRetries: number;
  private readonly maxRedirects: number;
  private readonly navigationTimeout: number;
  private readonly timeout: number;
  private readonly htmlProcessor: HtmlProcessor;
  private readonly linkDiscoverer: LinkDiscoverer;

  constructor(options: CheerioScraperOptions = {}) {
    this.maxPages = options.maxPages ?? env.CRAWL_MAX_PAGES;
    this.concurrency = options.concurrency ?? env.FALLBACK_CONCURRENCY;
    this.delayMs = options.delayMs ?? env.FALLBACK_DELAY_MS;
    this.maxRetries = options.maxRetries ?? 3;
    this.maxRedirects = options.maxRedirects ?? env.FALLBACK_MAX_REDIRECTS;
    this.navigationTimeout = options.navigationTimeout ?? env.FALLBACK_NAVIGATION_TIMEOUT;
    this.timeout = options.timeout ?? env.FALLBACK_TIMEOUT;
    this.htmlProcessor = options.htmlProcessor || htmlProcessor;
    this.linkDiscoverer = options.linkDiscoverer || linkDiscoverer;
  }

  async crawl(target: CrawlTarget): Promise<CrawlResult> {
    // Loaded on demand: most crawls never reach the fallback
    const { CheerioCrawler, Configuration } = await import('crawlee');

    const pages: ExtractedPage[] = [];
    const skipped: SkippedPage[] = [];
    const detector = new DuplicateDetector();
    // Normalized URLs of extracted pages; two redirects may land on one page
    const retained = new Set<string>();
    const headers = buildHeaders(BROWSER_PROFILE);
    const maxRedirects = this.maxRedirects;

    detector.addUrl(target.normalizedUrl);

    const crawler = new CheerioCrawler(
      {
        maxConcurrency: this.concurrency,
        maxRequestRetries: this.maxRetries,
        maxSessionRotations: this.maxRetries,
        sameDomainDelaySecs: this.delayMs / 1000,
        navigationTimeoutSecs: this.navigationTimeout / 1000,
        maxRequestsPerCrawl: this.maxPages * 4,
        useSessionPool: true,
        persistCookiesPerSession: true,
        // 5xx, 401/403/429 (blocked session) are retried by default; add 408
        additionalHttpErrorStatusCodes: [408],
        preNavigationHooks: [
          (_context, gotOptions) => {
            gotOptions.followRedirect = true;
            gotOptions.maxRedirects = maxRedirects;
          },
        ],
        requestHandler: async ({ request, body, response, addRequests }) => {
          const loadedUrl = request.loadedUrl || request.url;
          const url = normalizeUrl(loadedUrl);

          if (response.statusCode !== 200) {
            skipped.push({ url, reason: `HTTP ${response.statusCode}` });
            return;
          }

          // Cap check and push stay in one synchronous block so concurrent
          // handlers can never overshoot maxPages
          if (pages.length >= this.maxPages || retained.has(url)) {
            return;
          }
          retained.add(url);
          const html = body.toString();
          pages.push(this.htmlProcessor.extract(html, url));

          if (request.label !== HOMEPAGE_LABEL) {
            return;
          }

          // After a redirect the homepage lives at a new URL; its own nav link must not queue it again
          detector.addUrl(url);
          const links = this.linkDiscoverer
            .discoverLinks(cheerio.load(html), loadedUrl)
            .filter((link) => !detector.addUrl(link));

          console.log(`Crawl ${target.domain}: fallback queued ${links.length} navigation links`);
          await addRequests(links.map((link) => ({ url: link, headers })));
        },
        failedRequestHandler: ({ request }, error) => {
          const url = normalizeUrl(request.url);
          console.warn(`Crawl ${target.domain}: fallback gave up on ${url} - ${error.message}`);
          skipped.push({ url, reason: error.message });
        },
      },
      new Configuration({ persistStorage: false })
    );

    let timeoutId: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timeoutId = setTimeout(() => resolve('timeout'), this.timeout);
    });

    try {
      const outcome = await Promise.race([
        crawler
          .run([{ url: target.normalizedUrl, headers, label: HOMEPAGE_LABEL, uniqueKey: target.normalizedUrl }])
          .then(() => 'done' as const),
        timedOut,
      ]);

      if (outcome === 'timeout') {
        console.warn(`Crawl ${target.domain}: fallback abandoned after ${this.timeout}ms`);
        await crawler.autoscaledPool?.abort();
        return { domain: target.domain, pages: [], skipped };
      }
    } finally {
      clearTimeout(timeoutId);
    }

    console.log(`Crawl ${target.domain}: fallback extracted ${pages.length} pages, ${skipped.length} skipped`);

    return { domain: target.domain, pages, skipped };
  }
}
