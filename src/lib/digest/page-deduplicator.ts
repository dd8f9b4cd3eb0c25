/**
 * Category-level page dedup: first page per category wins, in crawl order
 */

import { CategorizedPage, DedupPolicy, PageCategory } from '../../modules/scraper/scraper.types';

const POLICIES: readonly string[] = Object.values(DedupPolicy);

function isDedupPolicy(value: string): value is DedupPolicy {
  return POLICIES.includes(value);
}

/**
 * Resolve a configured policy name; unknown names fall back to product-repeats
 */
export function parseDedupPolicy(value: string | undefined): DedupPolicy {
  const name = (value || '').trim().toLowerCase();
  if (isDedupPolicy(name)) {
    return name;
  }
  if (name) {
    console.warn(`Unknown dedup policy "${value}", using ${DedupPolicy.PRODUCT_REPEATS}`);
  }
  return DedupPolicy.PRODUCT_REPEATS;
}

export function repeatableCategories(policy: DedupPolicy): ReadonlySet<PageCategory> {
  return policy === DedupPolicy.STRICT
    ? new Set<PageCategory>([PageCategory.OTHER])
    : new Set<PageCategory>([PageCategory.PRODUCT, PageCategory.OTHER]);
}

export function deduplicatePages<T extends CategorizedPage>(pages: readonly T[], policy: DedupPolicy): T[] {
  const repeatable = repeatableCategories(policy);
  const seen = new Set<PageCategory>();
  const kept: T[] = [];

  for (const page of pages) {
    if (seen.has(page.category) && !repeatable.has(page.category)) {
      continue;
    }
    seen.add(page.category);
    kept.push(page);
  }

  return kept;
}
