/**
 * HTML Processor
 * Turns one HTML document into an ExtractedPage: head metadata, headings,
 * and the cleaned text of the primary content region
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { ExtractedPage } from '../../modules/scraper/scraper.types';
import { extractStructuredData } from './structured-data';
import { TextProcessor, textProcessor as defaultTextProcessor } from './text.processor';

export interface HtmlProcessorConfig {
  noiseSelectors?: string[];
  mainContentSelectors?: string[];
  textProcessor?: TextProcessor;
}

export class HtmlProcessor {
  // Navigation, chrome and overlay elements removed before body text extraction
  private readonly noiseSelectors: string[];

  // Primary content region, in order of preference
  private readonly mainContentSelectors: string[];

  private readonly textProcessor: TextProcessor;

  constructor(config?: HtmlProcessorConfig) {
    this.noiseSelectors = config?.noiseSelectors || [
      'script',
      'style',
      'noscript',
      'nav',
      'footer',
      'aside',
      'header',
      '[role="navigation"]',
      '[role="banner"]',
      '[role="contentinfo"]',
      '[class*="cookie"]',
      '[id*="cookie"]',
      '[class*="banner"]',
      '[id*="banner"]',
      '[class*="popup"]',
      '[id*="popup"]',
      '[class*="modal"]',
      '[id*="modal"]',
      '[class*="mega-menu"]',
      '[class*="dropdown-menu"]',
      '[class*="nav-"]',
    ];
    this.mainContentSelectors = config?.mainContentSelectors || ['main', 'article', 'body'];
    this.textProcessor = config?.textProcessor || defaultTextProcessor;
  }

  /**
   * Extract one page. Metadata is read before any element is removed.
   */
  extract(html: string, url: string): ExtractedPage {
    const $ = cheerio.load(html);
    const normalize = (value: string | undefined): string => this.textProcessor.normalize(value || '');

    const structuredData = extractStructuredData($);
    const title = normalize($('title').first().text());
    const metaDescription = normalize($('meta[name="description"]').first().attr('content'));
    const h1 = normalize($('h1').first().text());
    const headings = $('h2, h3')
      .map((_, el) => normalize($(el).text()))
      .get()
      .filter((heading) => heading.length > 0);

    this.removeNoise($);

    return {
      url,
      title,
      metaDescription,
      h1,
      headings,
      textPreview: this.textProcessor.clean(this.mainText($)),
      structuredData,
    };
  }

  private removeNoise($: CheerioAPI): void {
    for (const selector of this.noiseSelectors) {
      $(selector).remove();
    }
  }

  /**
   * Text of the preferred content region with every text node separated by
   * a space, so adjacent block elements never run together
   */
  private mainText($: CheerioAPI): string {
    for (const selector of this.mainContentSelectors) {
      const region = $(selector).first();
      if (region.length === 0) continue;

      region.find('*').before(' ').after(' ');
      return region.text().replace(/\s+/g, ' ');
    }
    return '';
  }
}

// Export singleton instance with default configuration
export const htmlProcessor = new HtmlProcessor();

export function extractPage(html: string, url: string): ExtractedPage {
  return htmlProcessor.extract(html, url);
}
