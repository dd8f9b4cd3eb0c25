/**
 * Scraping Utilities - Barrel Export
 *
 * - Request header profiles
 * - Error classification & crawl-level failures
 */

// Header profiles
export {
  HeaderProfile,
  BROWSER_PROFILE,
  CRAWLER_PROFILE,
  HEADER_PROFILES,
  buildHeaders,
} from './headers';

// Error handling
export {
  ScrapingErrorType,
  ScrapingError,
  TRANSIENT_STATUS_CODES,
  FetchError,
  InvalidTargetError,
  SiteUnreachableError,
  classifyError,
} from './errors';
