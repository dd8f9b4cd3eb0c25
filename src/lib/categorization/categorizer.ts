/**
 * Page Categorizer
 * Three-pass rule cascade, first match wins:
 * homepage check → URL path keywords → content keywords → URL segment prefixes → other
 */

import { PageCategory } from '../../modules/scraper/scraper.types';
import type { ExtractedPage } from '../../modules/scraper/scraper.types';
import { CategoryRule, CategoryRuleSet, DEFAULT_CATEGORY_RULES } from './category.rules';

export type CategorizableContent = Pick<ExtractedPage, 'title' | 'h1' | 'metaDescription' | 'headings'>;

const HOMEPAGE_PATHS = new Set(['', 'home', 'index', 'index.html']);
// Short alphabetic paths are locale roots (/fr, /en, /deu)
const LOCALE_PATH = /^[a-z]{1,3}$/;

/**
 * Lowercased pathname without leading or trailing slashes
 */
export function categoryPath(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url;
  }
  return pathname.toLowerCase().replace(/^\/+|\/+$/g, '');
}

function matchRules(rules: readonly CategoryRule[], haystack: string): PageCategory | null {
  for (const rule of rules) {
    if (rule.keywords.some((keyword) => haystack.includes(keyword))) {
      return rule.category;
    }
  }
  return null;
}

export class Categorizer {
  constructor(private readonly rules: CategoryRuleSet = DEFAULT_CATEGORY_RULES) {}

  categorize(url: string, content: CategorizableContent): PageCategory {
    const path = categoryPath(url);

    if (HOMEPAGE_PATHS.has(path) || LOCALE_PATH.test(path)) {
      return PageCategory.HOME;
    }

    const byUrl = matchRules(this.rules.urlRules, path);
    if (byUrl) {
      return byUrl;
    }

    const searchable = [content.title, content.h1, content.metaDescription, content.headings.join(' ')]
      .join(' ')
      .toLowerCase();
    const byContent = matchRules(this.rules.contentRules, searchable);
    if (byContent) {
      return byContent;
    }

    const segments = path.split('/');
    if (segments.some((segment) => this.rules.productPrefixes.some((prefix) => segment.startsWith(prefix)))) {
      return PageCategory.PRODUCT;
    }

    return PageCategory.OTHER;
  }
}

export const categorizer = new Categorizer();

export function categorizePage(url: string, content: CategorizableContent): PageCategory {
  return categorizer.categorize(url, content);
}
