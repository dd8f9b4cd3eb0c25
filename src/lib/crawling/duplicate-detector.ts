/**
 * Duplicate Detector
 * Visit-once bookkeeping keyed by normalized URL
 */

import { normalizeUrl } from './url-normalizer';

export class DuplicateDetector {
  private visitedUrls: Set<string> = new Set();

  /**
   * Record a URL and return true if it was already recorded
   */
  addUrl(url: string): boolean {
    const normalized = normalizeUrl(url);

    if (this.visitedUrls.has(normalized)) {
      return true;
    }

    this.visitedUrls.add(normalized);
    return false;
  }
}
