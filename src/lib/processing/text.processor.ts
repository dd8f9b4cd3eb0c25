/**
 * Text Processor
 * Invisible-character cleanup, whitespace collapsing and boilerplate removal
 * for text pulled out of marketing pages
 */

import boilerplatePhrases from './boilerplate-phrases.json';

export interface TextProcessorConfig {
  /**
   * Phrases that mark a short line or sentence as boilerplate (lowercase)
   */
  linePhrases?: readonly string[];

  /**
   * Standalone call-to-action phrases excised from running text
   */
  inlinePhrases?: readonly string[];

  /**
   * Segments at or above this length are never dropped by the line pass
   */
  maxBoilerplateLineLength?: number;
}

// Zero-width and invisible characters, replaced with a space so words never merge
const INVISIBLE_CHARS = /[\u200b\u200c\u200d\u2060\ufeff\u200e\u200f\u00ad]/g;
const HORIZONTAL_WHITESPACE = /[ \t\u00a0]+/g;
const BLANK_LINES = /\n(?:[ \t]*\n)+/g;
const UNDEFINED_ARTIFACT = /\bundefined\b/g;
// "null" survives when it reads as a word ("null pointer", "null and void")
const NULL_ARTIFACT = /\bnull\b(?!\s+(?:and|or|pointer|value|check|safety))/g;
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;
const WORD_CHAR = /[\p{L}\p{N}]/u;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Split text into sentences on terminal punctuation followed by whitespace
 */
export function splitSentences(text: string): string[] {
  return text
    .split(SENTENCE_BOUNDARY)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

export class TextProcessor {
  private readonly linePhrases: readonly string[];
  private readonly inlinePattern: RegExp | null;
  private readonly maxBoilerplateLineLength: number;

  constructor(config?: TextProcessorConfig) {
    this.linePhrases = (config?.linePhrases || boilerplatePhrases.linePhrases).map((phrase) =>
      phrase.toLowerCase()
    );
    const inlinePhrases = config?.inlinePhrases || boilerplatePhrases.inlinePhrases;
    this.inlinePattern =
      inlinePhrases.length > 0
        ? new RegExp(`\\b(?:${inlinePhrases.map(escapeRegExp).join('|')})\\b`, 'gi')
        : null;
    this.maxBoilerplateLineLength = config?.maxBoilerplateLineLength || 80;
  }

  /**
   * Normalize raw text: invisible characters become spaces, collapse whitespace and
   * blank lines, strip script artifacts, trim
   */
  normalize(text: string): string {
    if (!text) {
      return '';
    }

    return text
      .replace(INVISIBLE_CHARS, ' ')
      .replace(HORIZONTAL_WHITESPACE, ' ')
      .replace(BLANK_LINES, '\n')
      .replace(UNDEFINED_ARTIFACT, '')
      .replace(NULL_ARTIFACT, '')
      .replace(HORIZONTAL_WHITESPACE, ' ')
      .trim();
  }

  /**
   * Remove calls-to-action, cookie banners and navigation chrome.
   * Expects normalized input.
   */
  removeBoilerplate(text: string): string {
    const lines: string[] = [];

    for (const line of text.split('\n')) {
      if (!line.trim()) continue;

      // A line that is one sentence follows the short-line rule; inside longer
      // lines only sentences that open with a phrase are dropped
      const segments = splitSentences(line);
      const kept =
        segments.length === 1
          ? segments.filter((segment) => !this.isBoilerplateLine(segment))
          : segments.filter((segment) => !this.opensWithPhrase(segment));
      if (kept.length > 0) {
        lines.push(kept.join(' '));
      }
    }

    let cleaned = lines.join('\n');
    if (this.inlinePattern) {
      cleaned = cleaned.replace(this.inlinePattern, '');
    }

    return cleaned
      .replace(HORIZONTAL_WHITESPACE, ' ')
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .join('\n');
  }

  /**
   * normalize() followed by removeBoilerplate()
   */
  clean(text: string): string {
    return this.removeBoilerplate(this.normalize(text));
  }

  private isBoilerplateLine(line: string): boolean {
    const lower = line.toLowerCase().trim();
    return this.linePhrases.some(
      (phrase) =>
        lower === phrase || (lower.length < this.maxBoilerplateLineLength && lower.includes(phrase))
    );
  }

  private opensWithPhrase(segment: string): boolean {
    const lower = segment.toLowerCase().trim();
    if (lower.length >= this.maxBoilerplateLineLength) {
      return false;
    }
    return this.linePhrases.some(
      (phrase) => lower.startsWith(phrase) && !WORD_CHAR.test(lower.charAt(phrase.length))
    );
  }
}

// Export singleton instance with default configuration
export const textProcessor = new TextProcessor();

// Export convenience functions
export function normalizeText(text: string): string {
  return textProcessor.normalize(text);
}

export function removeBoilerplate(text: string): string {
  return textProcessor.removeBoilerplate(text);
}
