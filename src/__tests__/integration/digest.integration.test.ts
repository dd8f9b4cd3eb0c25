/**
 * Digest Integration Tests
 * Controller → service → orchestrator → engines → digest, over a stubbed fetch
 */

import { DigestController } from '../../modules/scraper/scraper.controller';
import { DigestService } from '../../modules/scraper/scraper.service';
import { CrawlOrchestrator } from '../../lib/orchestration';
import { HttpCrawlEngine } from '../../modules/scraper/scrapers';
import { DigestAssembler } from '../../lib/digest';
import { errorHandler } from '../../middleware/error-handler';
import { DedupPolicy, IDigestResponse } from '../../modules/scraper/scraper.types';
import { siteHtml } from '../helpers/fixtures';
import {
  FakeEngine,
  createMockRequest,
  createMockResponse,
  htmlRoutes,
  mockFetch,
} from '../helpers/mocks';

function createController(fallback: FakeEngine): DigestController {
  const orchestrator = new CrawlOrchestrator([new HttpCrawlEngine({ maxAttempts: 1, retryBaseDelay: 0 }), fallback]);
  return new DigestController(
    new DigestService({
      orchestrator,
      assembler: new DigestAssembler({ maxBytes: 7800 }),
      dedupPolicy: DedupPolicy.PRODUCT_REPEATS,
    })
  );
}

describe('Digest Integration Tests', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should crawl the site and return a digest', async () => {
    mockFetch(htmlRoutes(siteHtml));
    const fallback = new FakeEngine('crawlee', { domain: 'acme.test', pages: [], skipped: [] });
    const { res, json } = createMockResponse();
    const next = jest.fn();

    await new Promise<void>((resolve) => {
      json.mockImplementation(() => resolve());
      next.mockImplementation(() => resolve());
      createController(fallback).createDigest(createMockRequest({ url: 'acme.test' }), res, next);
    });

    expect(next).not.toHaveBeenCalled();
    expect(fallback.calls).toHaveLength(0);
    expect(json).toHaveBeenCalledTimes(1);

    const response: IDigestResponse = json.mock.calls[0][0];
    expect(response).toMatchObject({
      success: true,
      url: 'https://acme.test',
      domain: 'acme.test',
      categories: ['about', 'blog', 'home', 'pricing'],
      hasPricing: true,
      hasBlog: true,
      hasCareers: false,
      pageCount: 4,
    });

    const header =
      'Domain: acme.test\nSite: Acme Ledger\nTagline: Billing that closes the books\nPages: 4\n' +
      'Pricing: yes | Blog: yes | Careers: no';
    expect(response.content.startsWith(`${header}\n\n`)).toBe(true);
    expect(response.content.match(/^\[[A-Z-]+\] \S+$/gm)).toEqual([
      '[HOME] /',
      '[PRICING] /pricing',
      '[ABOUT] /about',
      '[BLOG] /blog',
    ]);
    expect(Buffer.byteLength(response.content, 'utf8')).toBeLessThanOrEqual(7800);
  });

  it('should answer 502 when no engine extracts a page', async () => {
    mockFetch({});
    const fallback = new FakeEngine('crawlee', { domain: 'acme.test', pages: [], skipped: [] });
    const { res, status, json } = createMockResponse();
    const req = createMockRequest({ url: 'acme.test' });

    await new Promise<void>((resolve) => {
      createController(fallback).createDigest(req, res, (error: unknown) => {
        if (error instanceof Error) {
          errorHandler(error, req, res, () => undefined);
        }
        resolve();
      });
    });

    expect(fallback.calls).toHaveLength(1);
    expect(status).toHaveBeenCalledWith(502);
    expect(json).toHaveBeenCalledWith({
      success: false,
      error: 'Site unreachable',
      detail: 'Cannot scrape https://acme.test: all strategies failed (http + crawlee)',
    });
  });
});
