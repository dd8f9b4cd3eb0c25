import { DigestController, parseDigestRequest } from '../scraper.controller';
import { DigestService } from '../scraper.service';
import { ApiError } from '../../../middleware/error-handler';
import { CrawlOrchestrator } from '../../../lib/orchestration';
import { FakeEngine, createMockRequest, createMockResponse } from '../../../__tests__/helpers/mocks';
import { createPage } from '../../../__tests__/helpers/fixtures';

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('parseDigestRequest', () => {
  it('should accept an object body', () => {
    expect(parseDigestRequest({ url: 'acme.test' })).toEqual({ url: 'acme.test' });
  });

  it('should accept a body serialized twice', () => {
    expect(parseDigestRequest('{"url":"acme.test"}')).toEqual({ url: 'acme.test' });
  });

  it('should reject malformed or non-object bodies', () => {
    expect(() => parseDigestRequest('{url')).toThrow(ApiError);
    expect(() => parseDigestRequest(['acme.test'])).toThrow('Invalid JSON body');
    expect(() => parseDigestRequest(null)).toThrow('Invalid JSON body');
  });
});

describe('DigestController', () => {
  const engine = new FakeEngine('http', {
    domain: 'acme.test',
    pages: [createPage({ url: 'https://acme.test', h1: 'Billing that closes the books' })],
    skipped: [],
  });
  const controller = new DigestController(
    new DigestService({ orchestrator: new CrawlOrchestrator([engine]) })
  );

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should respond with the digest', async () => {
    const { res, json } = createMockResponse();
    const next = jest.fn();

    controller.createDigest(createMockRequest('{"url":"acme.test"}'), res, next);
    await flush();

    expect(next).not.toHaveBeenCalled();
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({ success: true, url: 'https://acme.test', domain: 'acme.test', categories: ['home'] })
    );
  });

  it.each([{}, { url: '   ' }, { url: 42 }])('should reject %p as a missing url', async (body) => {
    const { res, json } = createMockResponse();
    const next = jest.fn();

    controller.createDigest(createMockRequest(body), res, next);
    await flush();

    expect(json).not.toHaveBeenCalled();
    expect(next).toHaveBeenCalledWith(expect.objectContaining({ statusCode: 400, message: "Missing 'url' field" }));
  });
});
