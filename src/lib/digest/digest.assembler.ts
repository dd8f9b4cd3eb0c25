/**
 * Digest Assembler
 * Renders the header and one block per page, then fits the result into a
 * UTF-8 byte budget: per-block allowances weighted by priority tier, then
 * whole blocks dropped from the low-priority end. The header always stays.
 */

import { env } from '../../config/env';
import {
  CATEGORY_PRIORITY,
  CategorizedPage,
  CompanySignals,
  Digest,
  DigestBlock,
} from '../../modules/scraper/scraper.types';
import { urlPath } from '../crawling/url-normalizer';
import { extractCompanySignals } from './company-signals';
import { SentenceDeduplicator } from './sentence-deduplicator';
import { buildSummary } from './summary';

export interface TierWeight {
  /**
   * Pages covered by this tier; the last tier covers the rest
   */
  size: number;
  weight: number;
}

export interface DigestAssemblerConfig {
  maxBytes?: number;
  maxHeadings?: number;
  separator?: string;
  tiers?: readonly TierWeight[];
  truncateStep?: number;
  ellipsis?: string;
}

export const DEFAULT_TIERS: readonly TierWeight[] = [
  { size: 3, weight: 1.4 },
  { size: 3, weight: 1.0 },
  { size: Infinity, weight: 0.7 },
];

export function byteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

/**
 * Cut `step` code points at a time, appending the ellipsis, until the text
 * fits in `limit` bytes. Null when nothing fits.
 */
export function truncateToBytes(text: string, limit: number, step = 50, ellipsis = '...'): string | null {
  if (byteLength(text) <= limit) {
    return text;
  }

  const chars = Array.from(text);
  for (let keep = chars.length - step; keep > 0; keep -= step) {
    const candidate = chars.slice(0, keep).join('').trimEnd() + ellipsis;
    if (byteLength(candidate) <= limit) {
      return candidate;
    }
  }
  return null;
}

export function sortByPriority<T extends CategorizedPage>(pages: readonly T[]): T[] {
  // Array.prototype.sort is stable: ties keep crawl order
  return [...pages].sort((a, b) => CATEGORY_PRIORITY[a.category] - CATEGORY_PRIORITY[b.category]);
}

export function renderHeader(domain: string, signals: CompanySignals, pageCount: number): string {
  const yesNo = (flag: boolean) => (flag ? 'yes' : 'no');
  const lines = [`Domain: ${domain}`];

  if (signals.siteName) lines.push(`Site: ${signals.siteName}`);
  if (signals.tagline) lines.push(`Tagline: ${signals.tagline}`);
  if (signals.products.length > 0) lines.push(`Products: ${signals.products.join('; ')}`);

  lines.push(`Pages: ${pageCount}`);
  lines.push(
    `Pricing: ${yesNo(signals.hasPricing)} | Blog: ${yesNo(signals.hasBlog)} | Careers: ${yesNo(signals.hasCareers)}`
  );

  return lines.join('\n');
}

export class DigestAssembler {
  private readonly maxBytes: number;
  private readonly maxHeadings: number;
  private readonly separator: string;
  private readonly tiers: readonly TierWeight[];
  private readonly truncateStep: number;
  private readonly ellipsis: string;

  constructor(config: DigestAssemblerConfig = {}) {
    this.maxBytes = config.maxBytes ?? env.MAX_OUTPUT_BYTES;
    this.maxHeadings = config.maxHeadings ?? 4;
    this.separator = config.separator ?? '\n\n';
    this.tiers = config.tiers || DEFAULT_TIERS;
    this.truncateStep = config.truncateStep ?? 50;
    this.ellipsis = config.ellipsis ?? '...';
  }

  assemble(domain: string, pages: readonly CategorizedPage[]): Digest {
    const signals = extractCompanySignals(pages);
    const header = renderHeader(domain, signals, pages.length);
    const sorted = sortByPriority(pages);

    const remaining = this.maxBytes - byteLength(header) - byteLength(this.separator) * sorted.length;
    const baseAllowance = sorted.length > 0 ? remaining / sorted.length : 0;

    // One pool per digest: later blocks lose sentences earlier blocks already said
    const dedup = new SentenceDeduplicator();
    const blocks: DigestBlock[] = [];

    sorted.forEach((page, index) => {
      const text = this.renderBlock(page, dedup);
      const allowance = Math.floor(baseAllowance * this.tierWeight(index));
      const fitted = truncateToBytes(text, allowance, this.truncateStep, this.ellipsis);
      if (fitted === null) {
        return;
      }
      blocks.push({
        category: page.category,
        path: urlPath(page.url),
        renderedText: fitted,
        byteLength: byteLength(fitted),
      });
    });

    let content = this.join(header, blocks);
    while (byteLength(content) > this.maxBytes && blocks.length > 0) {
      blocks.pop();
      content = this.join(header, blocks);
    }

    return { header, blocks, totalBytes: byteLength(content), content };
  }

  /**
   * Tag line, deduplicated summary, then headings the summary does not already cover
   */
  renderBlock(page: CategorizedPage, dedup: SentenceDeduplicator): string {
    const lines = [`[${page.category.toUpperCase()}] ${urlPath(page.url)}`];

    const summary = dedup.deduplicate(buildSummary(page));
    if (summary) {
      lines.push(summary);
    }

    const covered = summary.toLowerCase();
    const seen = new Set<string>();
    for (const heading of page.headings) {
      if (seen.size >= this.maxHeadings) break;
      const key = heading.toLowerCase();
      if (!key || seen.has(key) || covered.includes(key)) continue;
      seen.add(key);
      lines.push(`- ${heading}`);
    }

    return lines.join('\n');
  }

  private tierWeight(index: number): number {
    let start = 0;
    for (const tier of this.tiers) {
      if (index < start + tier.size) {
        return tier.weight;
      }
      start += tier.size;
    }
    return this.tiers.length > 0 ? this.tiers[this.tiers.length - 1].weight : 1;
  }

  private join(header: string, blocks: readonly DigestBlock[]): string {
    return [header, ...blocks.map((block) => block.renderedText)].join(this.separator);
  }
}

export const digestAssembler = new DigestAssembler();
