/**
 * Best-summary selection for one page
 */

import type { ExtractedPage } from '../../modules/scraper/scraper.types';
import { splitSentences } from '../processing/text.processor';
import { SentenceDeduplicator } from './sentence-deduplicator';

export const MAX_EXTRA_SENTENCES = 3;
export const FALLBACK_SENTENCES = 2;

/**
 * First non-empty of meta description, OpenGraph description, schema
 * description and h1
 */
export function pickDescription(page: ExtractedPage): string {
  const candidates = [
    page.metaDescription,
    page.structuredData.ogDescription,
    page.structuredData.schemaDescription,
    page.h1,
  ];
  for (const candidate of candidates) {
    const value = candidate?.trim();
    if (value) return value;
  }
  return '';
}

/**
 * Description plus up to three body sentences that add something new.
 * Without any description, the first two body sentences.
 */
export function buildSummary(page: ExtractedPage): string {
  const body = splitSentences(page.textPreview);
  const description = pickDescription(page);

  if (!description) {
    return body.slice(0, FALLBACK_SENTENCES).join(' ');
  }

  const pool = new SentenceDeduplicator();
  splitSentences(description).forEach((sentence) => pool.accept(sentence));

  const extras: string[] = [];
  for (const sentence of body) {
    if (extras.length >= MAX_EXTRA_SENTENCES) break;
    if (pool.accept(sentence)) {
      extras.push(sentence);
    }
  }

  return [description, ...extras].join(' ');
}
