/**
 * Scrapers barrel export
 * Engine order: HTTP (sequential fetch) → Crawlee (concurrent fallback)
 */

export { HttpCrawlEngine, isHtmlContentType } from './http.scraper';
export type { HttpScraperOptions } from './http.scraper';
export { CheerioCrawlEngine } from './cheerio.scraper';
export type { CheerioScraperOptions } from './cheerio.scraper';
export type { FetchedDocument, FetchOutcome } from './types';
