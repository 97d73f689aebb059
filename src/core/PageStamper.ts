/**
 * PageStamper.ts
 *
 * Writes a copy of a catalog with an explicit identity marker on every page:
 * a visible "PAGE-ID: n" label at the top right and a small "<page:n>" tag at
 * the bottom left. The LLM reads these markers, so the page numbers it reports
 * match the physical page order even when the catalog prints its own numbering.
 */

import path from 'path';
import fs from 'fs-extra';
import { rgb, StandardFonts } from 'pdf-lib';
import { loadPdfDocument } from '../utils/pdfUtils';
import { ValidationError } from '../utils/errors';
import { componentLogger } from '../utils/logger';

const log = componentLogger('PageStamper');

const LABEL_OFFSET_RIGHT = 150;
const LABEL_OFFSET_TOP = 20;
const LABEL_SIZE = 8;
const TAG_X = 20;
const TAG_Y = 10;
const TAG_SIZE = 6;

let tempFileCounter = 0;

export function pageLabel(pageNumber: number): string {
  return `PAGE-ID: ${pageNumber}`;
}

export function pageTag(pageNumber: number): string {
  return `<page:${pageNumber}>`;
}

/**
 * Stamp page identifiers onto a copy of `sourcePath` written to `outputPath`.
 *
 * The copy is written to a temporary sibling first and moved into place, so
 * a failure never leaves a half-written file at `outputPath`.
 *
 * @returns the output path
 * @throws DocumentReadError if the source cannot be opened
 * @throws ValidationError if the output would overwrite the source
 */
export async function stampPageIdentifiers(sourcePath: string, outputPath: string): Promise<string> {
  if (path.resolve(sourcePath) === path.resolve(outputPath)) {
    throw new ValidationError('Stamped copy must not overwrite the source PDF', { sourcePath });
  }

  const doc = await loadPdfDocument(sourcePath);
  const labelFont = await doc.embedFont(StandardFonts.Helvetica);
  const tagFont = await doc.embedFont(StandardFonts.Courier);

  doc.getPages().forEach((page, index) => {
    const pageNumber = index + 1;
    const { width, height } = page.getSize();

    page.drawText(pageLabel(pageNumber), {
      x: width - LABEL_OFFSET_RIGHT,
      y: height - LABEL_OFFSET_TOP,
      size: LABEL_SIZE,
      font: labelFont,
      color: rgb(0, 0, 0.8),
    });

    page.drawText(pageTag(pageNumber), {
      x: TAG_X,
      y: TAG_Y,
      size: TAG_SIZE,
      font: tagFont,
      color: rgb(0.7, 0.7, 0.7),
    });
  });

  const bytes = await doc.save();

  await fs.ensureDir(path.dirname(outputPath));
  const tempPath = `${outputPath}.${process.pid}.${++tempFileCounter}.tmp`;
  try {
    await fs.writeFile(tempPath, bytes);
    await fs.move(tempPath, outputPath, { overwrite: true });
  } catch (error) {
    await fs.remove(tempPath);
    throw error;
  }

  log.info({ sourcePath, outputPath, pageCount: doc.getPageCount() }, 'Added page identifiers');
  return outputPath;
}
