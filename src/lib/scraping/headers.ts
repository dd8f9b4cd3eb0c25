/**
 * Request Header Profiles
 * A browser-like primary profile and a crawler-like alternate for retries
 */

export interface HeaderProfile {
  name: string;
  userAgent: string;
  accept: string;
  acceptLanguage: string;
  acceptEncoding?: string;
  cacheControl?: string;
  secFetchDest?: string;
  secFetchMode?: string;
  secFetchSite?: string;
  secFetchUser?: string;
  upgradeInsecureRequests?: string;
}

// Chrome on Mac
export const BROWSER_PROFILE: HeaderProfile = {
  name: 'browser',
  userAgent:
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
  accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  acceptLanguage: 'en-US,en;q=0.9,fr;q=0.8',
  acceptEncoding: 'gzip, deflate, br',
  cacheControl: 'no-cache',
  secFetchDest: 'document',
  secFetchMode: 'navigate',
  secFetchSite: 'none',
  secFetchUser: '?1',
  upgradeInsecureRequests: '1',
};

// Sites that turn away headless browsers usually still serve search crawlers
export const CRAWLER_PROFILE: HeaderProfile = {
  name: 'crawler',
  userAgent: 'Mozilla/5.0 (compatible; Googlebot/2.1; +http://www.google.com/bot.html)',
  accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  acceptLanguage: 'en-US,en;q=0.9',
};

/**
 * Profiles in the order a page fetch tries them
 */
export const HEADER_PROFILES: readonly HeaderProfile[] = [BROWSER_PROFILE, CRAWLER_PROFILE];

/**
 * Build headers object from a profile
 */
export function buildHeaders(profile: HeaderProfile): Record<string, string> {
  const headers: Record<string, string> = {
    'User-Agent': profile.userAgent,
    'Accept': profile.accept,
    'Accept-Language': profile.acceptLanguage,
  };

  if (profile.acceptEncoding) headers['Accept-Encoding'] = profile.acceptEncoding;
  if (profile.cacheControl) headers['Cache-Control'] = profile.cacheControl;
  if (profile.secFetchDest) headers['Sec-Fetch-Dest'] = profile.secFetchDest;
  if (profile.secFetchMode) headers['Sec-Fetch-Mode'] = profile.secFetchMode;
  if (profile.secFetchSite) headers['Sec-Fetch-Site'] = profile.secFetchSite;
  if (profile.secFetchUser) headers['Sec-Fetch-User'] = profile.secFetchUser;
  if (profile.upgradeInsecureRequests) headers['Upgrade-Insecure-Requests'] = profile.upgradeInsecureRequests;

  return headers;
}
