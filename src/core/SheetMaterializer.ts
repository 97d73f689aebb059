/**
 * SheetMaterializer.ts
 *
 * Writes one PDF per accepted product boundary, copying the selected pages
 * from the catalog unchanged.
 */

import path from 'path';
import fs from 'fs-extra';
import { PDFDocument } from 'pdf-lib';
import {
  ExtractedSheet,
  MaterializationResult,
  PageOverlap,
  ProductBoundary,
  SheetWriteFailureRecord,
  SkippedBoundary,
} from '../models/ProductBoundary';
import { loadPdfDocument } from '../utils/pdfUtils';
import { errorMessage, SheetWriteFailure } from '../utils/errors';
import { componentLogger } from '../utils/logger';

const log = componentLogger('SheetMaterializer');

export const SHEETS_DIR_SUFFIX = '_sheets';
const MAX_NAME_LENGTH = 50;
const TRUNCATED_NAME_LENGTH = 47;

/**
 * Restrict a product name to letters, digits, space, hyphen and underscore,
 * then turn spaces into underscores and cap the length at 50 characters.
 */
export function sanitizeProductName(product: string): string {
  const chars = Array.from(
    Array.from(product)
      .map(ch => (/[\p{L}\p{N} _-]/u.test(ch) ? ch : '_'))
      .join('')
      .trim()
      .replace(/ /g, '_')
  );

  // Lengths count code points, so an astral letter is never split
  if (chars.length > MAX_NAME_LENGTH) {
    return `${chars.slice(0, TRUNCATED_NAME_LENGTH).join('')}...`;
  }
  return chars.join('');
}

/**
 * Confidence with two decimals. Exact ties (0.125, 0.375, ...) go to the
 * even digit; `toFixed` would round them up.
 */
export function formatConfidence(confidence: number): string {
  const isTie = Number.isInteger(confidence * 8) && !Number.isInteger(confidence * 4);
  if (!isTie) {
    return confidence.toFixed(2);
  }
  const lower = Math.floor(confidence * 100);
  return ((lower % 2 === 0 ? lower : lower + 1) / 100).toFixed(2);
}

export function formatPageRange(pages: number[]): string {
  const first = pages[0];
  const last = pages[pages.length - 1];
  return first === last ? `p${first}` : `p${first}-${last}`;
}

/**
 * File name for a sheet
 * @param pages 1-indexed, sorted, non-empty
 */
export function buildSheetFileName(product: string, pages: number[], confidence: number): string {
  return `sheet_${pages[0]}_${sanitizeProductName(product)}_${formatPageRange(pages)}_conf${formatConfidence(confidence)}.pdf`;
}

/**
 * 1-indexed pages that exist in a document of `totalPages`, distinct and
 * ascending
 */
export function selectPages(requested: number[], totalPages: number): number[] {
  const indices = new Set<number>();
  for (const page of requested) {
    const index = page - 1;
    if (Number.isInteger(index) && index >= 0 && index < totalPages) {
      indices.add(index);
    }
  }
  return [...indices].sort((a, b) => a - b).map(index => index + 1);
}

/**
 * Append `_2`, `_3`, ... before the extension until the name is unused
 */
function reserveFileName(fileName: string, used: Set<string>): string {
  const ext = path.extname(fileName);
  const base = fileName.slice(0, fileName.length - ext.length);

  let candidate = fileName;
  let counter = 2;
  while (used.has(candidate)) {
    candidate = `${base}_${counter}${ext}`;
    counter++;
  }
  used.add(candidate);
  return candidate;
}

/**
 * Pages claimed by more than one product, ascending
 */
export function findOverlaps(claims: Array<{ product: string; pages: number[] }>): PageOverlap[] {
  const owners = new Map<number, string[]>();
  for (const claim of claims) {
    for (const page of claim.pages) {
      const products = owners.get(page) ?? [];
      if (!products.includes(claim.product)) {
        products.push(claim.product);
      }
      owners.set(page, products);
    }
  }

  return [...owners.entries()]
    .filter(([, products]) => products.length > 1)
    .sort(([a], [b]) => a - b)
    .map(([page, products]) => ({ page, products }));
}

export function sheetsDirFor(sourcePath: string, outputDir: string): string {
  const stem = path.basename(sourcePath, path.extname(sourcePath));
  return path.join(outputDir, `${stem}${SHEETS_DIR_SUFFIX}`);
}

async function writeSheet(source: PDFDocument, pages: number[], product: string, outputPath: string): Promise<void> {
  try {
    const sheet = await PDFDocument.create();
    const copied = await sheet.copyPages(source, pages.map(page => page - 1));
    copied.forEach(page => sheet.addPage(page));
    await fs.writeFile(outputPath, await sheet.save());
  } catch (error) {
    throw new SheetWriteFailure(errorMessage(error), product, outputPath);
  }
}

/**
 * Write one PDF per boundary under `<outputDir>/<stem>_sheets/`.
 *
 * Sheets come back in boundary order. Boundaries with no page inside the
 * document are skipped; a sheet that fails to write is recorded and the rest
 * of the batch continues.
 *
 * @throws DocumentReadError if the source cannot be opened
 */
export async function materialize(
  sourcePath: string,
  boundaries: ProductBoundary[],
  outputDir: string
): Promise<MaterializationResult> {
  const source = await loadPdfDocument(sourcePath);
  const totalPages = source.getPageCount();
  const sheetsDir = sheetsDirFor(sourcePath, outputDir);
  await fs.ensureDir(sheetsDir);

  const sheets: ExtractedSheet[] = [];
  const skipped: SkippedBoundary[] = [];
  const failures: SheetWriteFailureRecord[] = [];
  const claims: Array<{ product: string; pages: number[] }> = [];
  const usedNames = new Set<string>();

  for (const boundary of boundaries) {
    const pages = selectPages(boundary.pages, totalPages);
    const dropped = boundary.pages.length - pages.length;
    if (dropped > 0) {
      log.debug({ product: boundary.product, requested: boundary.pages, kept: pages }, 'Dropped pages outside the document');
    }

    if (pages.length === 0) {
      const reason = `no pages within 1-${totalPages}`;
      log.warn({ product: boundary.product, requested: boundary.pages }, `Skipping boundary: ${reason}`);
      skipped.push({ product: boundary.product, requestedPages: boundary.pages, reason });
      continue;
    }

    claims.push({ product: boundary.product, pages });

    const fileName = reserveFileName(buildSheetFileName(boundary.product, pages, boundary.confidence), usedNames);
    const outputPath = path.join(sheetsDir, fileName);

    try {
      await writeSheet(source, pages, boundary.product, outputPath);
      sheets.push({ product: boundary.product, pages, confidence: boundary.confidence, outputPath });
      log.info({ product: boundary.product, pages, outputPath }, 'Sheet written');
    } catch (error) {
      if (!(error instanceof SheetWriteFailure)) throw error;
      log.error({ err: error, product: boundary.product }, 'Failed to write sheet');
      failures.push({ product: boundary.product, pages, outputPath, error: error.message });
    }
  }

  const overlaps = findOverlaps(claims);
  for (const overlap of overlaps) {
    log.warn(overlap, `Page ${overlap.page} is claimed by more than one product`);
  }

  log.info(
    { sheetsDir, written: sheets.length, skipped: skipped.length, failed: failures.length },
    'Materialization complete'
  );

  return { sheetsDir, sheets, skipped, failures, overlaps };
}
