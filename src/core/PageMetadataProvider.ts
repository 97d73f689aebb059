/**
 * PageMetadataProvider.ts
 *
 * Structural pre-analysis of a catalog: one PageRecord per page with its text,
 * header/footer zones, table and image signals, and a heuristic flag for pages
 * that look like technical sheets. The result is handed to the LLM as context.
 */

import path from 'path';
import fs from 'fs-extra';
import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf';
import { AnalysisOptions, DocumentAnalysis, PageRecord } from '../models/PageRecord';
import { openPdfjsDocument, PdfjsDocument, PdfjsPage } from '../utils/pdfUtils';
import { countTables, groupIntoRows, PositionedText, rowsToText } from '../utils/textLayout';
import { componentLogger } from '../utils/logger';

const log = componentLogger('PageMetadataProvider');

export const DEFAULT_ZONE_HEIGHT = 100;

export const TECHNICAL_INDICATORS: readonly string[] = [
  'technical data',
  'specifications',
  'tech spec',
  'technical sheet',
  'dimensions',
  'material properties',
  'electrical specifications',
  'installation requirements',
  'performance characteristics',
];

const MEASUREMENT_PATTERN = /\b\d+(\.\d+)?\s*(mm|cm|m|in|ft|kg|g|lb|v|hz|w)\b/i;
const MIN_KEYWORD_MATCHES = 2;

const IMAGE_OPS = new Set<number>([
  pdfjsLib.OPS.paintImageXObject,
  pdfjsLib.OPS.paintImageXObjectRepeat,
]);
const INLINE_IMAGE_OPS = new Set<number>([pdfjsLib.OPS.paintInlineImageXObject]);

/**
 * Number of technical-sheet keywords present in the text
 */
export function countTechnicalKeywords(text: string): number {
  const lower = text.toLowerCase();
  return TECHNICAL_INDICATORS.filter(indicator => lower.includes(indicator)).length;
}

export function hasMeasurements(text: string): boolean {
  return MEASUREMENT_PATTERN.test(text);
}

/**
 * A page is likely a technical sheet if it names at least two technical
 * keywords, or carries a table together with unit-tagged numbers.
 */
export function isLikelyTechnicalSheet(text: string, hasTables: boolean): boolean {
  return countTechnicalKeywords(text) >= MIN_KEYWORD_MATCHES || (hasTables && hasMeasurements(text));
}

/**
 * Text of the items whose top edge lies inside the header zone
 */
export function extractHeaderText(items: PositionedText[], pageHeight: number, zoneHeight = DEFAULT_ZONE_HEIGHT): string {
  return items
    .filter(item => pageHeight - (item.y + item.height) < zoneHeight)
    .map(item => item.text)
    .join(' ');
}

/**
 * Text of the items whose bottom edge lies inside the footer zone
 */
export function extractFooterText(items: PositionedText[], pageHeight: number, zoneHeight = DEFAULT_ZONE_HEIGHT): string {
  return items
    .filter(item => pageHeight - item.y > pageHeight - zoneHeight)
    .map(item => item.text)
    .join(' ');
}

async function readTextItems(page: PdfjsPage): Promise<PositionedText[]> {
  const content = await page.getTextContent();
  const items: PositionedText[] = [];

  for (const item of content.items) {
    if (!('str' in item) || item.str.trim().length === 0) continue;
    items.push({
      text: item.str,
      x: Number(item.transform[4]),
      y: Number(item.transform[5]),
      width: item.width,
      height: item.height,
    });
  }

  return items;
}

async function countImages(page: PdfjsPage): Promise<number> {
  const operators = await page.getOperatorList();
  const imageIds = new Set<string>();
  let inlineImages = 0;

  operators.fnArray.forEach((fn, i) => {
    if (INLINE_IMAGE_OPS.has(fn)) {
      inlineImages++;
      return;
    }
    if (IMAGE_OPS.has(fn)) {
      const args: unknown = operators.argsArray[i];
      const id = Array.isArray(args) && typeof args[0] === 'string' ? args[0] : `#${i}`;
      imageIds.add(id);
    }
  });

  return imageIds.size + inlineImages;
}

/**
 * Build the record for a single page
 */
export async function analyzePage(
  page: PdfjsPage,
  pageNumber: number,
  options: AnalysisOptions = {}
): Promise<PageRecord> {
  const { width, height } = page.getViewport({ scale: 1 });
  const items = await readTextItems(page);
  const rows = groupIntoRows(items);
  const textContent = rowsToText(rows);
  const hasTables = countTables(rows, width) > 0;

  return {
    pageNumber,
    width,
    height,
    textContent,
    headerText: extractHeaderText(items, height, options.headerZoneHeight ?? DEFAULT_ZONE_HEIGHT),
    footerText: extractFooterText(items, height, options.footerZoneHeight ?? DEFAULT_ZONE_HEIGHT),
    hasTables,
    imageCount: await countImages(page),
    likelyTechnicalSheet: isLikelyTechnicalSheet(textContent, hasTables),
  };
}

/**
 * Analyze every page of an opened document. Does not close the handle.
 */
export async function analyzeDocument(
  document: PdfjsDocument,
  options: AnalysisOptions = {}
): Promise<DocumentAnalysis> {
  const totalPages = document.numPages;
  const pages: PageRecord[] = [];

  for (let pageNumber = 1; pageNumber <= totalPages; pageNumber++) {
    const page = await document.getPage(pageNumber);
    try {
      pages.push(await analyzePage(page, pageNumber, options));
    } finally {
      page.cleanup();
    }
  }

  return { totalPages, pages };
}

/**
 * Open, analyze and close a PDF file
 * @throws DocumentReadError if the file cannot be opened
 */
export async function analyzePdfFile(pdfPath: string, options: AnalysisOptions = {}): Promise<DocumentAnalysis> {
  const document = await openPdfjsDocument(pdfPath);
  try {
    const analysis = await analyzeDocument(document, options);
    log.info(
      { pdfPath, totalPages: analysis.totalPages, likelyTechnicalSheetPages: likelyTechnicalSheetPages(analysis) },
      'Analyzed PDF structure'
    );
    return analysis;
  } finally {
    await document.destroy();
  }
}

export function likelyTechnicalSheetPages(analysis: DocumentAnalysis): number[] {
  return analysis.pages.filter(page => page.likelyTechnicalSheet).map(page => page.pageNumber);
}

/**
 * Write the analysis as a JSON artifact
 */
export async function saveAnalysis(analysis: DocumentAnalysis, outputPath: string): Promise<string> {
  await fs.ensureDir(path.dirname(outputPath));
  await fs.writeJson(outputPath, analysis, { spaces: 2 });
  log.debug({ outputPath }, 'Document analysis saved');
  return outputPath;
}
