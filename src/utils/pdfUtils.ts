// PDF loading helpers shared by the stamper, analyzer and materializer

import fs from 'fs-extra';
import { PDFDocument } from 'pdf-lib';
import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf';
import { DocumentReadError, errorMessage } from './errors';

export type PdfjsDocument = Awaited<ReturnType<typeof pdfjsLib.getDocument>['promise']>;
export type PdfjsPage = Awaited<ReturnType<PdfjsDocument['getPage']>>;

/**
 * Read a PDF file from disk, mapping any failure to DocumentReadError
 */
export async function readPdfBytes(pdfPath: string): Promise<Buffer> {
  try {
    return await fs.readFile(pdfPath);
  } catch (error) {
    throw new DocumentReadError(pdfPath, errorMessage(error));
  }
}

/**
 * Open a PDF for page manipulation (pdf-lib)
 */
export async function loadPdfDocument(pdfPath: string): Promise<PDFDocument> {
  const bytes = await readPdfBytes(pdfPath);
  try {
    return await PDFDocument.load(bytes);
  } catch (error) {
    throw new DocumentReadError(pdfPath, errorMessage(error));
  }
}

/**
 * Open a PDF for text and operator extraction (pdfjs).
 * The caller owns the handle and must `destroy()` it.
 */
export async function openPdfjsDocument(pdfPath: string): Promise<PdfjsDocument> {
  const bytes = await readPdfBytes(pdfPath);
  try {
    // pdfjs takes ownership of (and detaches) the buffer it is given
    const loadingTask = pdfjsLib.getDocument({
      data: new Uint8Array(bytes),
      isEvalSupported: false,
      disableFontFace: true,
      verbosity: 0,
    });
    return await loadingTask.promise;
  } catch (error) {
    throw new DocumentReadError(pdfPath, errorMessage(error));
  }
}
