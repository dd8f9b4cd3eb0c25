/**
 * URL Normalization Utilities
 * Functions for building crawl targets and normalizing discovered URLs
 */

import type { CrawlTarget } from '../../modules/scraper/scraper.types';
import { InvalidTargetError } from '../scraping/errors';

/**
 * Build the crawl target from user input. A missing scheme becomes https.
 */
export function parseCrawlTarget(rawUrl: string): CrawlTarget {
  const trimmed = rawUrl.trim();
  if (!trimmed) {
    throw new InvalidTargetError("Missing 'url' field");
  }

  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  let urlObj: URL;
  try {
    urlObj = new URL(withScheme);
  } catch {
    throw new InvalidTargetError(`Invalid URL: ${trimmed}`);
  }

  if (!urlObj.hostname) {
    throw new InvalidTargetError(`Invalid URL: ${trimmed}`);
  }

  return {
    rawUrl: trimmed,
    normalizedUrl: withScheme,
    scheme: urlObj.protocol === 'http:' ? 'http' : 'https',
    domain: urlObj.host,
    baseUrl: urlObj.origin,
  };
}

/**
 * Normalize a URL for visit-once bookkeeping: no fragment, lowercase host,
 * no trailing slash
 */
export function normalizeUrl(url: string): string {
  try {
    const urlObj = new URL(url);
    urlObj.hash = '';
    return urlObj.href.replace(/\/+$/, '');
  } catch {
    return url.split('#')[0].replace(/\/+$/, '');
  }
}

/**
 * Resolve an href against a base URL. Returns null when it cannot be resolved.
 */
export function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).href;
  } catch {
    return null;
  }
}

export function isHttpUrl(url: string): boolean {
  return /^https?:\/\//i.test(url);
}

/**
 * Same network location: scheme and host (with port) both match
 */
export function isSameOrigin(url: string, baseUrl: string): boolean {
  try {
    return new URL(url).origin === new URL(baseUrl).origin;
  } catch {
    return false;
  }
}

/**
 * Path of a URL for display, "/" for the root
 */
export function urlPath(url: string): string {
  try {
    return new URL(url).pathname || '/';
  } catch {
    return '/';
  }
}
