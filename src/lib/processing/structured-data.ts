/**
 * Structured Data Extraction
 * JSON-LD (schema.org) and OpenGraph fields from a parsed document head
 */

import type { CheerioAPI } from 'cheerio';
import type { StructuredData } from '../../modules/scraper/scraper.types';
import { textProcessor } from './text.processor';

export type JsonLdParseResult =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse one ld+json block. Arrays contribute their first entry only.
 */
export function parseJsonLdBlock(raw: string): JsonLdParseResult {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error: unknown) {
    return { ok: false, reason: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }

  if (Array.isArray(data)) {
    if (data.length === 0) {
      return { ok: false, reason: 'empty array' };
    }
    data = data[0];
  }

  if (!isRecord(data)) {
    return { ok: false, reason: 'not an object' };
  }

  return { ok: true, value: data };
}

function readSchemaType(value: unknown): string | undefined {
  if (typeof value === 'string' && value) {
    return value;
  }
  if (Array.isArray(value)) {
    const types = value.filter((entry): entry is string => typeof entry === 'string' && entry.length > 0);
    return types.length > 0 ? types.join(', ') : undefined;
  }
  return undefined;
}

function readMetaProperty($: CheerioAPI, property: string): string | undefined {
  const content = $(`meta[property="${property}"]`).first().attr('content');
  const cleaned = content ? textProcessor.normalize(content) : '';
  return cleaned || undefined;
}

/**
 * Must run before noise removal: it reads <head> content the body cleanup
 * never touches, but script tags are among the removed elements.
 */
export function extractStructuredData($: CheerioAPI): StructuredData {
  const structured: StructuredData = {};

  $('script[type="application/ld+json"]').each((_, el) => {
    const result = parseJsonLdBlock($(el).text());
    if (!result.ok) {
      return;
    }

    const { description, name } = result.value;
    if (typeof description === 'string' && description) {
      structured.schemaDescription = textProcessor.normalize(description);
    }
    if (typeof name === 'string' && name) {
      structured.schemaName = textProcessor.normalize(name);
    }
    const schemaType = readSchemaType(result.value['@type']);
    if (schemaType) {
      structured.schemaType = schemaType;
    }
  });

  const ogDescription = readMetaProperty($, 'og:description');
  if (ogDescription) structured.ogDescription = ogDescription;

  const ogTitle = readMetaProperty($, 'og:title');
  if (ogTitle) structured.ogTitle = ogTitle;

  const ogSiteName = readMetaProperty($, 'og:site_name');
  if (ogSiteName) structured.ogSiteName = ogSiteName;

  return structured;
}
