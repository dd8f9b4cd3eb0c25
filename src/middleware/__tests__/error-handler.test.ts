import type { NextFunction } from 'express';
import { ApiError, asyncHandler, errorHandler, toApiError } from '../error-handler';
import { InvalidTargetError, SiteUnreachableError } from '../../lib/scraping/errors';
import { createMockRequest, createMockResponse } from '../../__tests__/helpers/mocks';

describe('toApiError', () => {
  it('should pass ApiError through', () => {
    const error = new ApiError(400, "Missing 'url' field");
    expect(toApiError(error)).toBe(error);
  });

  it('should map input errors to 400', () => {
    const parseError = Object.assign(new SyntaxError('Unexpected end of JSON input'), {
      type: 'entity.parse.failed',
    });

    expect(toApiError(parseError)).toMatchObject({
      statusCode: 400,
      message: 'Invalid JSON body',
      detail: 'Unexpected end of JSON input',
    });
    expect(toApiError(new InvalidTargetError('Invalid URL: http://'))).toMatchObject({
      statusCode: 400,
      message: 'Invalid URL: http://',
    });
  });

  it('should map an unreachable site to 502 and anything else to 500', () => {
    expect(toApiError(new SiteUnreachableError('https://acme.test', ['http', 'crawlee']))).toMatchObject({
      statusCode: 502,
      message: 'Site unreachable',
      detail: 'Cannot scrape https://acme.test: all strategies failed (http + crawlee)',
    });
    expect(toApiError(new Error('boom'))).toMatchObject({ statusCode: 500, message: 'Scraping failed', detail: 'boom' });
  });

  it('should not treat a stray SyntaxError as a body parse failure', () => {
    expect(toApiError(new SyntaxError('Unexpected token')).statusCode).toBe(500);
  });
});

describe('errorHandler', () => {
  const next: NextFunction = jest.fn();

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should render client errors and log them as warnings', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { res, status, json } = createMockResponse();

    errorHandler(new ApiError(400, "Missing 'url' field"), createMockRequest({}), res, next);

    expect(status).toHaveBeenCalledWith(400);
    expect(json).toHaveBeenCalledWith({ success: false, error: "Missing 'url' field" });
    expect(warn).toHaveBeenCalledWith("POST /api/digest rejected: Missing 'url' field");
  });

  it('should render server errors with their detail and no stack outside development', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const { res, status, json } = createMockResponse();

    errorHandler(
      new SiteUnreachableError('https://acme.test', ['http', 'crawlee']),
      createMockRequest({ url: 'acme.test' }),
      res,
      next
    );

    expect(status).toHaveBeenCalledWith(502);
    expect(json).toHaveBeenCalledWith({
      success: false,
      error: 'Site unreachable',
      detail: 'Cannot scrape https://acme.test: all strategies failed (http + crawlee)',
    });
    expect(error).toHaveBeenCalledWith(
      'POST /api/digest failed: Cannot scrape https://acme.test: all strategies failed (http + crawlee)'
    );
  });
});

describe('asyncHandler', () => {
  it('should forward a rejection to next', async () => {
    const failure = new Error('boom');
    const next = jest.fn();
    const { res } = createMockResponse();

    asyncHandler(async () => {
      throw failure;
    })(createMockRequest({}), res, next);
    await new Promise((resolve) => setImmediate(resolve));

    expect(next).toHaveBeenCalledWith(failure);
  });
});
