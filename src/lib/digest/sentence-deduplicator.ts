/**
 * Sentence Deduplicator
 * Word-overlap dedup with a seen-sentence pool that lives for one crawl.
 * Pages are fed in priority order, so earlier pages keep their sentences
 * and later near-duplicates are dropped.
 */

import { splitSentences } from '../processing/text.processor';

const WORD = /[\p{L}\p{N}']+/gu;
export const DEFAULT_OVERLAP_THRESHOLD = 0.5;

export function wordSet(sentence: string): Set<string> {
  return new Set(sentence.toLowerCase().match(WORD) || []);
}

/**
 * Shared words over the smaller word count; 0 when either side has none
 */
export function overlapRatio(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  const smaller = Math.min(a.size, b.size);
  if (smaller === 0) {
    return 0;
  }

  let shared = 0;
  for (const word of a) {
    if (b.has(word)) shared++;
  }
  return shared / smaller;
}

export class SentenceDeduplicator {
  private readonly seen: Set<string>[];

  constructor(
    private readonly threshold: number = DEFAULT_OVERLAP_THRESHOLD,
    seen: readonly Set<string>[] = []
  ) {
    this.seen = [...seen];
  }

  /**
   * Keep the sentence and add it to the pool unless it repeats one already seen
   */
  accept(sentence: string): boolean {
    const words = wordSet(sentence);
    if (this.seen.some((prior) => overlapRatio(words, prior) > this.threshold)) {
      return false;
    }
    this.seen.push(words);
    return true;
  }

  deduplicate(text: string): string {
    return splitSentences(text)
      .filter((sentence) => this.accept(sentence))
      .join(' ');
  }

  /**
   * Independent copy of the current pool
   */
  fork(): SentenceDeduplicator {
    return new SentenceDeduplicator(this.threshold, this.seen);
  }
}
