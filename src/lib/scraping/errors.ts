/**
 * Scraping Error Handling
 * Fetch error classification, retry guidance and crawl-level failures
 */

export enum ScrapingErrorType {
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  RATE_LIMITED = 'RATE_LIMITED',
  AUTH_REQUIRED = 'AUTH_REQUIRED',
  NOT_FOUND = 'NOT_FOUND',
  SERVER_ERROR = 'SERVER_ERROR',
  CLIENT_ERROR = 'CLIENT_ERROR',
  NOT_HTML = 'NOT_HTML',
  UNKNOWN = 'UNKNOWN',
}

export interface ScrapingError {
  type: ScrapingErrorType;
  message: string;
  statusCode?: number;
  retryable: boolean;
}

// Statuses worth another attempt with the same request
export const TRANSIENT_STATUS_CODES: readonly number[] = [429, 500, 502, 503, 504];

/**
 * Thrown by a single fetch. Carries the HTTP status when there was a response.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly type?: ScrapingErrorType
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

/**
 * Target string missing or not a URL; rejected before any network access
 */
export class InvalidTargetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTargetError';
  }
}

/**
 * Every crawl engine produced zero pages
 */
export class SiteUnreachableError extends Error {
  constructor(
    public readonly url: string,
    public readonly engines: string[]
  ) {
    super(`Cannot scrape ${url}: all strategies failed (${engines.join(' + ')})`);
    this.name = 'SiteUnreachableError';
  }
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

// fetch() aborts reject with a DOMException, which is not always an Error subclass
function errorName(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return '';
}

/**
 * Classify an error and provide retry guidance
 */
export function classifyError(error: unknown): ScrapingError {
  const message = errorMessage(error);
  const code = error instanceof FetchError ? error.statusCode : undefined;

  if (error instanceof FetchError && error.type === ScrapingErrorType.NOT_HTML) {
    return { type: ScrapingErrorType.NOT_HTML, message, statusCode: code, retryable: false };
  }

  // Timeout errors (AbortController surfaces as AbortError / TimeoutError)
  const name = errorName(error);
  if (
    name === 'AbortError' ||
    name === 'TimeoutError' ||
    message.includes('timeout') ||
    message.includes('ETIMEDOUT')
  ) {
    return { type: ScrapingErrorType.TIMEOUT, message: 'Request timed out', statusCode: code, retryable: true };
  }

  if (code) {
    if (code === 429) {
      return { type: ScrapingErrorType.RATE_LIMITED, message: 'Rate limited by server', statusCode: code, retryable: true };
    }
    if (code === 401 || code === 403) {
      return { type: ScrapingErrorType.AUTH_REQUIRED, message: 'Access refused', statusCode: code, retryable: false };
    }
    if (code === 404) {
      return { type: ScrapingErrorType.NOT_FOUND, message: 'Page not found', statusCode: code, retryable: false };
    }
    if (code >= 500) {
      return {
        type: ScrapingErrorType.SERVER_ERROR,
        message: 'Server error',
        statusCode: code,
        retryable: TRANSIENT_STATUS_CODES.includes(code),
      };
    }
    return { type: ScrapingErrorType.CLIENT_ERROR, message: `HTTP ${code}`, statusCode: code, retryable: false };
  }

  // Network errors (undici wraps these as "fetch failed" with a cause)
  if (
    message.includes('fetch failed') ||
    message.includes('ECONNREFUSED') ||
    message.includes('ECONNRESET') ||
    message.includes('ENOTFOUND') ||
    message.includes('EAI_AGAIN')
  ) {
    return { type: ScrapingErrorType.NETWORK_ERROR, message: 'Network connection failed', retryable: true };
  }

  return { type: ScrapingErrorType.UNKNOWN, message: message || 'Unknown error', retryable: false };
}
