/**
 * BoundaryResponseParser.ts
 *
 * Turns the free-text answer of the boundary-detection model into validated
 * ProductBoundary records. The model is asked for a JSON array but may wrap it
 * in prose or markdown fences, quote numbers, or send page lists as strings.
 *
 * Pure: no I/O, never throws. Malformed input degrades to an empty result
 * carrying a diagnostic detail.
 */

import {
  BoundaryParseOutcome,
  ParseDiagnostics,
  ProductBoundary,
} from '../models/ProductBoundary';
import { errorMessage } from '../utils/errors';
import { componentLogger } from '../utils/logger';

const log = componentLogger('BoundaryResponseParser');

export const DEFAULT_CONFIDENCE = 0.7;
export const UNNAMED_PRODUCT = 'Unnamed Product';

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
}

/**
 * The substring from the first `[` to the last `]`, if any
 */
export function locateJsonArray(raw: string): string | null {
  const start = raw.indexOf('[');
  const end = raw.lastIndexOf(']');
  if (start < 0 || end <= start) {
    return null;
  }
  return raw.slice(start, end + 1);
}

/**
 * Coerce a confidence value; anything unusable becomes the default
 */
export function coerceConfidence(value: unknown): number {
  let parsed: number = Number.NaN;

  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    parsed = Number(value.trim());
  } else if (typeof value === 'boolean') {
    parsed = value ? 1 : 0;
  }

  if (!Number.isFinite(parsed)) {
    return DEFAULT_CONFIDENCE;
  }
  return Math.min(1, Math.max(0, parsed));
}

const INTEGER_TOKEN = /^[+-]?\d+$/;

function coercePage(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === 'string' && INTEGER_TOKEN.test(value.trim())) {
    return parseInt(value.trim(), 10);
  }
  return null;
}

/**
 * Raw page values from a native list or a string.
 * Strings are decoded as JSON first, then as a comma-separated integer list;
 * if both fail the list is empty.
 */
export function extractPageValues(value: unknown): unknown[] {
  if (Array.isArray(value)) {
    return value;
  }
  if (typeof value === 'number') {
    return [value];
  }
  if (typeof value !== 'string') {
    return [];
  }

  const decoded = tryParseJson(value);
  if (decoded.ok) {
    if (Array.isArray(decoded.value)) return decoded.value;
    if (typeof decoded.value === 'number') return [decoded.value];
    return [];
  }

  const tokens = value.split(',').map(token => token.trim());
  if (tokens.every(token => INTEGER_TOKEN.test(token))) {
    return tokens.map(token => parseInt(token, 10));
  }
  return [];
}

/**
 * Coerce page values to distinct integers in first-seen order.
 * No range check here: that belongs to whoever knows the real document.
 */
export function coercePages(value: unknown): { pages: number[]; invalid: number } {
  const pages: number[] = [];
  let invalid = 0;

  for (const raw of extractPageValues(value)) {
    const page = coercePage(raw);
    if (page === null) {
      invalid++;
    } else if (!pages.includes(page)) {
      pages.push(page);
    }
  }

  return { pages, invalid };
}

function coerceProduct(value: unknown): string {
  if (typeof value === 'string' && value.trim() !== '') {
    return value.trim();
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return UNNAMED_PRODUCT;
}

function boundaryKey(boundary: ProductBoundary): string {
  const pageSet = [...boundary.pages].sort((a, b) => a - b).join(',');
  return `${boundary.product}\u0000${pageSet}`;
}

function emptyDiagnostics(elementCount: number): ParseDiagnostics {
  return {
    elementCount,
    skippedNonObjects: 0,
    belowThreshold: 0,
    duplicatesCollapsed: 0,
    invalidPageValues: 0,
    outOfRangePages: 0,
  };
}

export class BoundaryResponseParser {
  /**
   * Parse a raw model response into a tagged outcome
   */
  parseDetailed(rawResponse: string, totalPages: number, confidenceThreshold: number): BoundaryParseOutcome {
    const arrayText = locateJsonArray(rawResponse);
    if (arrayText === null) {
      const detail = 'No JSON array found in response';
      log.warn({ responseLength: rawResponse.length }, detail);
      return { kind: 'malformed', detail };
    }

    const decoded = tryParseJson(arrayText);
    if (!decoded.ok) {
      const detail = `Invalid JSON array in response: ${decoded.error}`;
      log.warn({ responseLength: rawResponse.length }, detail);
      return { kind: 'malformed', detail };
    }
    if (!Array.isArray(decoded.value)) {
      return { kind: 'malformed', detail: 'Decoded response is not an array' };
    }

    const elements: unknown[] = decoded.value;
    const diagnostics = emptyDiagnostics(elements.length);
    const boundaries: ProductBoundary[] = [];
    const seen = new Set<string>();

    for (const element of elements) {
      if (!isJsonObject(element)) {
        diagnostics.skippedNonObjects++;
        continue;
      }

      const confidence = coerceConfidence(element.confidence);
      if (confidence < confidenceThreshold) {
        diagnostics.belowThreshold++;
        continue;
      }

      const { pages, invalid } = coercePages(element.pages);
      diagnostics.invalidPageValues += invalid;
      diagnostics.outOfRangePages += pages.filter(page => page < 1 || page > totalPages).length;

      const boundary: ProductBoundary = {
        product: coerceProduct(element.product),
        pages,
        confidence,
        reason: typeof element.reason === 'string' ? element.reason : '',
      };

      const key = boundaryKey(boundary);
      if (seen.has(key)) {
        diagnostics.duplicatesCollapsed++;
        continue;
      }
      seen.add(key);
      boundaries.push(boundary);
    }

    log.info({ accepted: boundaries.length, ...diagnostics }, 'Parsed boundary response');

    if (boundaries.length === 0) {
      return { kind: 'empty', diagnostics };
    }
    return { kind: 'ok', boundaries, diagnostics };
  }

  /**
   * Parse a raw model response into accepted boundaries, in source order
   */
  parse(rawResponse: string, totalPages: number, confidenceThreshold: number): ProductBoundary[] {
    const outcome = this.parseDetailed(rawResponse, totalPages, confidenceThreshold);
    return outcome.kind === 'ok' ? outcome.boundaries : [];
  }
}

export default BoundaryResponseParser;
