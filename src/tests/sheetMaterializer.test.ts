/**
 * Tests for SheetMaterializer
 */
import path from 'path';
import fs from 'fs-extra';
import {
  buildSheetFileName,
  findOverlaps,
  formatConfidence,
  formatPageRange,
  materialize,
  sanitizeProductName,
  selectPages,
  sheetsDirFor,
} from '../core/SheetMaterializer';
import { BoundaryResponseParser } from '../core/BoundaryResponseParser';
import { ProductBoundary } from '../models/ProductBoundary';
import { DocumentReadError } from '../utils/errors';
import { createNumberedPdf, makeTempDir, numberedPageWidth, pageWidths } from './helpers/pdfFixtures';

function boundary(product: string, pages: number[], confidence = 0.8): ProductBoundary {
  return { product, pages, confidence, reason: '' };
}

describe('sheet naming', () => {
  test('keeps letters, digits, space, hyphen and underscore', () => {
    expect(sanitizeProductName('Pump X-200 / Série')).toBe('Pump_X-200___Série');
  });

  test('trims before turning spaces into underscores', () => {
    expect(sanitizeProductName('  Valve  ')).toBe('Valve');
  });

  test('truncates long names with an ellipsis', () => {
    const safe = sanitizeProductName('a'.repeat(60));
    expect(safe).toBe(`${'a'.repeat(47)}...`);
    expect(safe.length).toBe(50);
  });

  test('counts astral letters as one character when truncating', () => {
    expect(sanitizeProductName(`${'a'.repeat(46)}\u{1D400}bbbbbb`)).toBe(`${'a'.repeat(46)}\u{1D400}...`);
    expect(sanitizeProductName(`${'a'.repeat(48)}\u{1D400}\u{1D400}`)).toBe(`${'a'.repeat(48)}\u{1D400}\u{1D400}`);
  });

  test('formats single pages and ranges', () => {
    expect(formatPageRange([4])).toBe('p4');
    expect(formatPageRange([3, 4, 5])).toBe('p3-5');
  });

  test('builds the sheet file name', () => {
    expect(buildSheetFileName('Widget 9', [3, 4, 5], 0.8)).toBe('sheet_3_Widget_9_p3-5_conf0.80.pdf');
    expect(buildSheetFileName('T22', [7], 0.5)).toBe('sheet_7_T22_p7_conf0.50.pdf');
  });

  test('rounds exact confidence ties to the even digit', () => {
    expect(buildSheetFileName('A', [1], 0.125)).toBe('sheet_1_A_p1_conf0.12.pdf');
    expect([0.375, 0.625, 0.875].map(formatConfidence)).toEqual(['0.38', '0.62', '0.88']);
    expect(formatConfidence(0.135)).toBe('0.14');
    expect(formatConfidence(1)).toBe('1.00');
  });

  test('places sheets under the catalog stem', () => {
    expect(sheetsDirFor('/data/catalogs/pumps.pdf', '/data/output')).toBe(path.join('/data/output', 'pumps_sheets'));
  });
});

describe('selectPages', () => {
  test('drops out-of-range pages, dedupes and sorts', () => {
    expect(selectPages([5, 3, 99, 4, 3, 0], 10)).toEqual([3, 4, 5]);
  });

  test('returns nothing when no page exists', () => {
    expect(selectPages([11, 99], 10)).toEqual([]);
  });
});

describe('findOverlaps', () => {
  test('lists pages claimed by several products', () => {
    const overlaps = findOverlaps([
      { product: 'A', pages: [1, 2] },
      { product: 'B', pages: [2, 3] },
      { product: 'C', pages: [3] },
    ]);
    expect(overlaps).toEqual([
      { page: 2, products: ['A', 'B'] },
      { page: 3, products: ['B', 'C'] },
    ]);
  });
});

describe('materialize', () => {
  let tempDir: string;
  let catalog: string;
  let outputDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
    catalog = await createNumberedPdf(path.join(tempDir, 'catalog.pdf'), 10);
    outputDir = path.join(tempDir, 'out');
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  test('copies the selected pages in ascending order', async () => {
    const result = await materialize(catalog, [boundary('Widget', [3, 5, 4])], outputDir);

    expect(result.sheetsDir).toBe(path.join(outputDir, 'catalog_sheets'));
    expect(result.sheets).toEqual([
      {
        product: 'Widget',
        pages: [3, 4, 5],
        confidence: 0.8,
        outputPath: path.join(outputDir, 'catalog_sheets', 'sheet_3_Widget_p3-5_conf0.80.pdf'),
      },
    ]);
    expect(await pageWidths(result.sheets[0].outputPath)).toEqual([3, 4, 5].map(numberedPageWidth));
  });

  test('splits the pages named in a parsed response', async () => {
    const fivePages = await createNumberedPdf(path.join(tempDir, 'five.pdf'), 5);
    const boundaries = new BoundaryResponseParser().parse(
      'Here you go:\n[{"product": "T22", "confidence": "0.9", "pages": "[1,2]", "reason": "header match"}]\nThanks!',
      5,
      0.5
    );

    const result = await materialize(fivePages, boundaries, outputDir);

    expect(result.sheets).toHaveLength(1);
    expect(path.basename(result.sheets[0].outputPath)).toBe('sheet_1_T22_p1-2_conf0.90.pdf');
    expect(await pageWidths(result.sheets[0].outputPath)).toEqual([numberedPageWidth(1), numberedPageWidth(2)]);
  });

  test('drops pages outside the document', async () => {
    const result = await materialize(catalog, [boundary('Widget', [2, 99])], outputDir);

    expect(result.sheets[0].pages).toEqual([2]);
    expect(await pageWidths(result.sheets[0].outputPath)).toEqual([numberedPageWidth(2)]);
  });

  test('skips a boundary with no page inside the document', async () => {
    const result = await materialize(catalog, [boundary('Ghost', [99, 100])], outputDir);

    expect(result.sheets).toEqual([]);
    expect(result.skipped).toEqual([{ product: 'Ghost', requestedPages: [99, 100], reason: 'no pages within 1-10' }]);
    expect(await fs.readdir(result.sheetsDir)).toEqual([]);
  });

  test('suffixes colliding file names', async () => {
    const result = await materialize(catalog, [boundary('A/B', [1]), boundary('A?B', [1])], outputDir);

    expect(result.sheets.map(sheet => path.basename(sheet.outputPath))).toEqual([
      'sheet_1_A_B_p1_conf0.80.pdf',
      'sheet_1_A_B_p1_conf0.80_2.pdf',
    ]);
    expect(result.overlaps).toEqual([{ page: 1, products: ['A/B', 'A?B'] }]);
  });

  test('records a failed sheet and continues with the rest', async () => {
    const blocked = path.join(outputDir, 'catalog_sheets', 'sheet_1_Blocked_p1_conf0.80.pdf');
    await fs.ensureDir(blocked);

    const result = await materialize(catalog, [boundary('Blocked', [1]), boundary('Open', [2])], outputDir);

    expect(result.failures).toHaveLength(1);
    expect(result.failures[0].product).toBe('Blocked');
    expect(result.failures[0].outputPath).toBe(blocked);
    expect(result.sheets.map(sheet => sheet.product)).toEqual(['Open']);
  });

  test('keeps boundary order in the result', async () => {
    const result = await materialize(catalog, [boundary('Late', [8]), boundary('Early', [1])], outputDir);
    expect(result.sheets.map(sheet => sheet.product)).toEqual(['Late', 'Early']);
  });

  test('fails with DocumentReadError when the source is missing', async () => {
    await expect(materialize(path.join(tempDir, 'missing.pdf'), [boundary('A', [1])], outputDir)).rejects.toBeInstanceOf(
      DocumentReadError
    );
  });
});
