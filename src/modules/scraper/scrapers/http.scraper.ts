/**
 * HTTP Scraper - Primary engine
 * Sequential crawl over native fetch, parsed with Cheerio. One request in
 * flight at a time.
 */

import * as cheerio from 'cheerio';
import { env } from '../../../config/env';
import type { CrawlTarget, ExtractedPage } from '../scraper.types';
import type { CrawlEngine, CrawlingConfig, CrawlResult, SkippedPage } from '../../../lib/crawling';
import { DuplicateDetector, LinkDiscoverer, linkDiscoverer, normalizeUrl } from '../../../lib/crawling';
import { HtmlProcessor, htmlProcessor } from '../../../lib/processing';
import { HEADER_PROFILES, HeaderProfile, buildHeaders, FetchError, ScrapingErrorType } from '../../../lib/scraping';
import { retryWithBackoff } from '../utils';
import type { FetchedDocument, FetchOutcome } from './types';

export interface HttpScraperOptions extends Partial<CrawlingConfig> {
  headerProfiles?: readonly HeaderProfile[];
  htmlProcessor?: HtmlProcessor;
  linkDiscoverer?: LinkDiscoverer;
}

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml'];

export function isHtmlContentType(contentType: string): boolean {
  const lower = contentType.toLowerCase();
  return HTML_CONTENT_TYPES.some((type) => lower.includes(type));
}

/**
 * One GET with a timeout. Non-2xx and non-HTML responses throw FetchError.
 */
async function fetchOnce(url: string, headers: Record<string, string>, timeout: number): Promise<FetchedDocument> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(url, {
      method: 'GET',
      headers,
      redirect: 'follow',
      signal: controller.signal,
    });

    if (!response.ok) {
      await response.body?.cancel();
      throw new FetchError(`HTTP ${response.status}`, response.status);
    }

    const contentType = response.headers.get('content-type') || '';
    if (!isHtmlContentType(contentType)) {
      await response.body?.cancel();
      throw new FetchError(`Not HTML (${contentType || 'no content type'})`, response.status, ScrapingErrorType.NOT_HTML);
    }

    const html = await response.text();
    return {
      html,
      contentType,
      finalUrl: response.url || url,
    };
  } finally {
    clearTimeout(timeoutId);
  }
}

export class HttpCrawlEngine implements CrawlEngine {
  readonly name = 'http';

  private readonly config: CrawlingConfig;
  private readonly headerProfiles: readonly HeaderProfile[];
  private readonly htmlProcessor: HtmlProcessor;
  private readonly linkDiscoverer: LinkDiscoverer;

  constructor(options: HttpScraperOptions = {}) {
    this.config = {
      maxPages: options.maxPages ?? env.CRAWL_MAX_PAGES,
      timeout: options.timeout ?? env.CRAWL_TIMEOUT,
      maxAttempts: options.maxAttempts ?? env.CRAWL_MAX_ATTEMPTS,
      retryBaseDelay: options.retryBaseDelay ?? env.RETRY_BACKOFF_BASE,
    };
    this.headerProfiles = options.headerProfiles || HEADER_PROFILES;
    this.htmlProcessor = options.htmlProcessor || htmlProcessor;
    this.linkDiscoverer = options.linkDiscoverer || linkDiscoverer;
  }

  /**
   * Fetch one document, trying each header profile in turn. Transient
   * failures are retried per profile; anything left over is a skip.
   */
  async fetchPage(url: string): Promise<FetchOutcome> {
    let reason = 'no header profiles configured';

    for (const profile of this.headerProfiles) {
      try {
        const document = await retryWithBackoff(
          () => fetchOnce(url, buildHeaders(profile), this.config.timeout),
          {
            maxAttempts: this.config.maxAttempts,
            baseDelay: this.config.retryBaseDelay,
            onRetry: (error, attempt, delay) => {
              console.log(`HTTP ${url}: ${error.message}, retry ${attempt}/${this.config.maxAttempts - 1} in ${delay}ms`);
            },
          }
        );
        return { status: 'fetched', profile: profile.name, ...document };
      } catch (error: unknown) {
        reason = `${profile.name}: ${error instanceof Error ? error.message : String(error)}`;
      }
    }

    return { status: 'skipped', url, reason };
  }

  async crawl(target: CrawlTarget): Promise<CrawlResult> {
    const homepage = await this.fetchPage(target.normalizedUrl);
    if (homepage.status === 'skipped') {
      throw new FetchError(`Cannot reach ${target.normalizedUrl} (${homepage.reason})`);
    }

    // Redirects (apex → www, http → https) move the site; follow them
    const siteOrigin = new URL(homepage.finalUrl).origin;
    const links = this.linkDiscoverer.discoverLinks(cheerio.load(homepage.html), homepage.finalUrl);
    const homepageLink = normalizeUrl(siteOrigin);
    if (!links.includes(homepageLink)) {
      links.unshift(homepageLink);
    }

    console.log(`Crawl ${target.domain}: ${links.length} navigation links discovered`);

    const fetchedHomepage = new Set([normalizeUrl(target.normalizedUrl), normalizeUrl(homepage.finalUrl)]);
    const detector = new DuplicateDetector();
    const pages: ExtractedPage[] = [];
    const skipped: SkippedPage[] = [];

    for (const link of links) {
      if (pages.length >= this.config.maxPages) break;
      if (detector.addUrl(link)) continue;

      const outcome = fetchedHomepage.has(link) ? homepage : await this.fetchPage(link);
      if (outcome.status === 'skipped') {
        console.warn(`Crawl ${target.domain}: skipped ${link} - ${outcome.reason}`);
        skipped.push({ url: link, reason: outcome.reason });
        continue;
      }

      pages.push(this.htmlProcessor.extract(outcome.html, link));
    }

    console.log(`Crawl ${target.domain}: ${pages.length} pages extracted, ${skipped.length} skipped`);

    return { domain: target.domain, pages, skipped };
  }
}
