import { CategorizedPage, CompanySignals, PageCategory } from '../../modules/scraper/scraper.types';
import { splitSentences } from '../processing/text.processor';

export const MAX_TAGLINE_LENGTH = 120;
export const MAX_PRODUCT_NAME_LENGTH = 80;

function firstNonEmpty(...values: Array<string | undefined>): string {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return '';
}

function extractTagline(pages: readonly CategorizedPage[]): string {
  const home = pages.find((page) => page.category === PageCategory.HOME);
  if (!home) {
    return '';
  }

  const tagline = firstNonEmpty(home.h1, home.structuredData.ogTitle, home.metaDescription);
  if (tagline.length > MAX_TAGLINE_LENGTH) {
    return splitSentences(tagline)[0] || tagline;
  }
  return tagline;
}

function extractProducts(pages: readonly CategorizedPage[]): string[] {
  const seen = new Set<string>();
  const products: string[] = [];

  for (const page of pages) {
    if (page.category !== PageCategory.PRODUCT) continue;

    const name = firstNonEmpty(page.h1, page.title);
    const key = name.toLowerCase();
    if (!name || name.length >= MAX_PRODUCT_NAME_LENGTH || seen.has(key)) continue;

    seen.add(key);
    products.push(name);
  }

  return products;
}

/**
 * Crawl-wide signals from the retained, categorized page set
 */
export function extractCompanySignals(pages: readonly CategorizedPage[]): CompanySignals {
  const categories = new Set(pages.map((page) => page.category));

  return {
    tagline: extractTagline(pages),
    products: extractProducts(pages),
    siteName: firstNonEmpty(...pages.map((page) => page.structuredData.ogSiteName)),
    hasPricing: categories.has(PageCategory.PRICING),
    hasBlog: categories.has(PageCategory.BLOG),
    hasCareers: categories.has(PageCategory.CAREERS),
  };
}
