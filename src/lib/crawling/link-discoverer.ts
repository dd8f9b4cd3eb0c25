/**
 * Link Discoverer
 * Same-origin candidate links from the navigation regions of a page
 */

import type { CheerioAPI } from 'cheerio';
import { normalizeUrl, resolveUrl, isHttpUrl, isSameOrigin } from './url-normalizer';

export interface LinkDiscovererConfig {
  /**
   * Regions whose anchors are treated as site navigation
   */
  navigationSelectors?: string[];
}

export class LinkDiscoverer {
  private readonly navigationSelectors: string[];

  constructor(config?: LinkDiscovererConfig) {
    this.navigationSelectors = config?.navigationSelectors || [
      'nav',
      'header',
      '[role="navigation"]',
      '[role="banner"]',
    ];
  }

  /**
   * Discover links in navigation regions, falling back to every anchor in
   * the document when those regions yield nothing. Insertion order is kept.
   */
  discoverLinks($: CheerioAPI, baseUrl: string): string[] {
    const navigationAnchors = $(this.navigationSelectors.join(', ')).find('a[href]');
    const navigationLinks = this.collect(navigationAnchors.map((_, el) => $(el).attr('href')).get(), baseUrl);
    if (navigationLinks.length > 0) {
      return navigationLinks;
    }

    return this.collect($('a[href]').map((_, el) => $(el).attr('href')).get(), baseUrl);
  }

  private collect(hrefs: string[], baseUrl: string): string[] {
    const seen = new Set<string>();
    const links: string[] = [];

    for (const href of hrefs) {
      const absoluteUrl = resolveUrl(href.trim(), baseUrl);
      if (!absoluteUrl || !isHttpUrl(absoluteUrl)) continue;

      const link = normalizeUrl(absoluteUrl);
      if (!link || seen.has(link)) continue;
      if (!isSameOrigin(link, baseUrl)) continue;

      seen.add(link);
      links.push(link);
    }

    return links;
  }
}

// Export singleton instance
export const linkDiscoverer = new LinkDiscoverer();
