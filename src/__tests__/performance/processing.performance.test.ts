/**
 * Processing Performance Tests
 * Rough bounds for extraction and digest assembly on large inputs
 */

import { HtmlProcessor } from '../../lib/processing/html.processor';
import { DigestAssembler, byteLength } from '../../lib/digest';
import { PageCategory } from '../../modules/scraper/scraper.types';
import { createCategorizedPage } from '../helpers/fixtures';

describe('Processing Performance Tests', () => {
  function generateTestHtml(paragraphs: number): string {
    const body = Array.from({ length: paragraphs }, (_, i) => `<p>Paragraph ${i} explains feature ${i}.</p>`).join('\n');
    return `
      <html>
      <head><title>Test Page</title><style>body { color: red; }</style></head>
      <body>
        <nav><a href="/pricing">Pricing</a></nav>
        <main><h1>Test Heading</h1>${body}</main>
      </body>
      </html>
    `;
  }

  describe('HTML Extraction', () => {
    it('should extract a large page in reasonable time', () => {
      const html = generateTestHtml(20000);
      const processor = new HtmlProcessor();

      const startTime = Date.now();
      const page = processor.extract(html, 'https://acme.test/features');
      const processingTime = Date.now() - startTime;

      console.log(`Large HTML (${(html.length / 1024).toFixed(0)}KB) extraction time: ${processingTime}ms`);

      expect(page.h1).toBe('Test Heading');
      expect(processingTime).toBeLessThan(10000);
    });
  });

  describe('Digest Assembly', () => {
    it('should fit hundreds of pages into the budget', () => {
      const categories = Object.values(PageCategory);
      const pages = Array.from({ length: 300 }, (_, i) =>
        createCategorizedPage(categories[i % categories.length], {
          url: `https://acme.test/page-${i}`,
          metaDescription: `Page ${i} describes topic ${i} in detail.`,
          textPreview: Array.from({ length: 20 }, (_, j) => `Fact ${i}-${j} about item ${j}.`).join(' '),
          headings: [`Heading ${i}`],
        })
      );

      const startTime = Date.now();
      const digest = new DigestAssembler({ maxBytes: 7800 }).assemble('acme.test', pages);
      const processingTime = Date.now() - startTime;

      console.log(`Digest of ${pages.length} pages: ${digest.blocks.length} blocks in ${processingTime}ms`);

      expect(digest.totalBytes).toBeLessThanOrEqual(7800);
      expect(byteLength(digest.content)).toBe(digest.totalBytes);
      expect(processingTime).toBeLessThan(10000);
    });
  });
});
