/**
 * Error Handling Middleware
 * ApiError for expected failures, asyncHandler for promise-returning
 * handlers, and the final JSON error renderer
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { env } from '../config/env';
import { InvalidTargetError, SiteUnreachableError } from '../lib/scraping/errors';

export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly detail?: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export interface IErrorResponse {
  success: false;
  error: string;
  detail?: string;
  stack?: string;
}

/**
 * Forward rejections from async route handlers to next()
 */
export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };

// body-parser marks its own failures with a `type` such as 'entity.parse.failed'
function isBodyParseError(err: Error): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Map any error to a status and message
 */
export function toApiError(err: Error): ApiError {
  if (err instanceof ApiError) {
    return err;
  }
  if (isBodyParseError(err)) {
    return new ApiError(400, 'Invalid JSON body', err.message);
  }
  if (err instanceof InvalidTargetError) {
    return new ApiError(400, err.message);
  }
  if (err instanceof SiteUnreachableError) {
    return new ApiError(502, 'Site unreachable', err.message);
  }
  return new ApiError(500, 'Scraping failed', err.message);
}

export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction): void => {
  const apiError = toApiError(err);

  if (apiError.statusCode >= 500) {
    console.error(`${req.method} ${req.originalUrl} failed: ${err.message}`);
  } else {
    console.warn(`${req.method} ${req.originalUrl} rejected: ${apiError.message}`);
  }

  const body: IErrorResponse = {
    success: false,
    error: apiError.message,
  };
  if (apiError.detail) {
    body.detail = apiError.detail;
  }
  if (env.NODE_ENV === 'development' && apiError.statusCode >= 500 && err.stack) {
    body.stack = err.stack;
  }

  res.status(apiError.statusCode).json(body);
};
