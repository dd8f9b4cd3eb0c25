/**
 * Keyword tables for the categorizer. Built once at load time and shared
 * by reference; row order is the tie-break between categories.
 */

import { PageCategory } from '../../modules/scraper/scraper.types';
import rules from './category-rules.json';

export interface CategoryRule {
  readonly category: PageCategory;
  readonly keywords: readonly string[];
}

export interface CategoryRuleSet {
  readonly urlRules: readonly CategoryRule[];
  readonly contentRules: readonly CategoryRule[];
  readonly productPrefixes: readonly string[];
}

const CATEGORIES: readonly string[] = Object.values(PageCategory);

function isPageCategory(value: string): value is PageCategory {
  return CATEGORIES.includes(value);
}

function toRules(rows: ReadonlyArray<{ category: string; keywords: string[] }>): readonly CategoryRule[] {
  return Object.freeze(
    rows.map((row) => {
      if (!isPageCategory(row.category)) {
        throw new Error(`Unknown category in rules table: ${row.category}`);
      }
      return Object.freeze({ category: row.category, keywords: Object.freeze([...row.keywords]) });
    })
  );
}

export const DEFAULT_CATEGORY_RULES: CategoryRuleSet = Object.freeze({
  urlRules: toRules(rules.urlRules),
  contentRules: toRules(rules.contentRules),
  productPrefixes: Object.freeze([...rules.productPrefixes]),
});
