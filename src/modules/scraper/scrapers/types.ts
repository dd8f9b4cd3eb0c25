/**
 * Scraper interface and shared types
 */

export interface FetchedDocument {
  html: string;
  contentType: string;
  finalUrl: string;
}

/**
 * Result of fetching one page. A skip is never fatal to the crawl.
 */
export type FetchOutcome =
  | ({ status: 'fetched'; profile: string } & FetchedDocument)
  | { status: 'skipped'; url: string; reason: string };
