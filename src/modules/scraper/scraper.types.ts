/**
 * Scraper Module Types
 * Records passed between crawl, categorization and digest assembly
 */

// ============================================================================
// Enums
// ============================================================================

/**
 * Marketing-site sections. See CATEGORY_PRIORITY for the rank used in
 * digest ordering and trimming.
 */
export enum PageCategory {
  HOME = 'home',
  PRODUCT = 'product',
  PRICING = 'pricing',
  ABOUT = 'about',
  CONTACT = 'contact',
  BLOG = 'blog',
  LEGAL = 'legal',
  CAREERS = 'careers',
  FAQ = 'faq',
  PARTNERS = 'partners',
  CASE_STUDY = 'case-study',
  PRESS = 'press',
  INVESTORS = 'investors',
  SECURITY = 'security',
  API = 'api',
  OTHER = 'other',
}

export const CATEGORY_PRIORITY: Readonly<Record<PageCategory, number>> = Object.freeze({
  [PageCategory.HOME]: 0,
  [PageCategory.PRODUCT]: 1,
  [PageCategory.PRICING]: 2,
  [PageCategory.ABOUT]: 3,
  [PageCategory.CONTACT]: 4,
  [PageCategory.BLOG]: 5,
  [PageCategory.LEGAL]: 6,
  [PageCategory.CAREERS]: 7,
  [PageCategory.FAQ]: 8,
  [PageCategory.PARTNERS]: 9,
  [PageCategory.CASE_STUDY]: 10,
  [PageCategory.PRESS]: 11,
  [PageCategory.INVESTORS]: 12,
  [PageCategory.SECURITY]: 13,
  [PageCategory.API]: 14,
  [PageCategory.OTHER]: 15,
});

export enum DedupPolicy {
  PRODUCT_REPEATS = 'product-repeats', // product and other may repeat
  STRICT = 'strict',                   // only other may repeat
}

// ============================================================================
// Core Interfaces
// ============================================================================

export interface CrawlTarget {
  rawUrl: string;
  normalizedUrl: string;
  scheme: 'http' | 'https';
  domain: string;
  baseUrl: string;
}

export interface StructuredData {
  schemaDescription?: string;
  schemaName?: string;
  schemaType?: string;
  ogDescription?: string;
  ogTitle?: string;
  ogSiteName?: string;
}

export interface ExtractedPage {
  readonly url: string;
  readonly title: string;
  readonly metaDescription: string;
  readonly h1: string;
  readonly headings: readonly string[];
  readonly textPreview: string;
  readonly structuredData: Readonly<StructuredData>;
}

export interface CategorizedPage extends ExtractedPage {
  readonly category: PageCategory;
}

export interface CompanySignals {
  tagline: string;
  products: string[];
  siteName: string;
  hasPricing: boolean;
  hasBlog: boolean;
  hasCareers: boolean;
}

export interface DigestBlock {
  category: PageCategory;
  path: string;
  renderedText: string;
  byteLength: number;
}

export interface Digest {
  header: string;
  blocks: DigestBlock[];
  totalBytes: number;
  content: string;
}

// ============================================================================
// API Request/Response Types
// ============================================================================

export interface ICreateDigestRequest {
  url?: unknown;
}

export interface IDigestResponse {
  success: true;
  url: string;
  domain: string;
  ts: string;
  categories: PageCategory[];
  hasPricing: boolean;
  hasBlog: boolean;
  hasCareers: boolean;
  pageCount: number;
  content: string;
}
