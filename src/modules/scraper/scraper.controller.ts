/**
 * Digest Controller
 * HTTP request/response handling for the digest endpoint
 */

import { Request, Response } from 'express';
import { DigestService, digestService } from './scraper.service';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import { ICreateDigestRequest } from './scraper.types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Accept `{ "url": ... }` or the same object serialized once more as a JSON string
 */
export function parseDigestRequest(body: unknown): ICreateDigestRequest {
  let data = body;
  if (typeof data === 'string') {
    try {
      data = JSON.parse(data);
    } catch (error: unknown) {
      throw new ApiError(400, 'Invalid JSON body', error instanceof Error ? error.message : undefined);
    }
  }

  if (!isRecord(data)) {
    throw new ApiError(400, 'Invalid JSON body', 'Expected a JSON object');
  }
  return data;
}

export class DigestController {
  constructor(private readonly service: DigestService = digestService) {}

  /**
   * POST /api/digest
   * Crawl a site and return its digest
   */
  createDigest = asyncHandler(async (req: Request, res: Response) => {
    const { url } = parseDigestRequest(req.body);

    if (typeof url !== 'string' || !url.trim()) {
      throw new ApiError(400, "Missing 'url' field");
    }

    const response = await this.service.createDigest(url);

    res.json(response);
  });
}

export const digestController = new DigestController();
