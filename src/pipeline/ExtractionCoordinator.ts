/**
 * ExtractionCoordinator.ts
 *
 * Orchestrates one catalog run: stamp page identifiers, analyze the layout,
 * ask the detector for boundaries, parse its answer and write one PDF per
 * product sheet.
 */

import path from 'path';
import fs from 'fs-extra';
import { ExtractorConfig } from '../config';
import { BoundaryDetector } from '../models/BoundaryDetector';
import { ExtractionReport } from '../models/ProductBoundary';
import { stampPageIdentifiers } from '../core/PageStamper';
import { analyzePdfFile, likelyTechnicalSheetPages, saveAnalysis } from '../core/PageMetadataProvider';
import { BoundaryResponseParser } from '../core/BoundaryResponseParser';
import { materialize } from '../core/SheetMaterializer';
import { ValidationError } from '../utils/errors';
import { componentLogger } from '../utils/logger';

const log = componentLogger('ExtractionCoordinator');

export const STAMPED_PREFIX = 'enhanced_';

export class ExtractionCoordinator {
  private parser = new BoundaryResponseParser();

  constructor(private config: ExtractorConfig, private detector: BoundaryDetector) {}

  /**
   * Split a catalog into per-product technical sheets
   *
   * @param pdfPath - Catalog to process
   * @param confidenceThreshold - Minimum confidence for a boundary to be kept
   * @throws ValidationError if the threshold is outside [0, 1]
   * @throws DocumentReadError if the catalog cannot be opened
   */
  public async run(
    pdfPath: string,
    confidenceThreshold: number = this.config.confidenceThreshold
  ): Promise<ExtractionReport> {
    if (!Number.isFinite(confidenceThreshold) || confidenceThreshold < 0 || confidenceThreshold > 1) {
      throw new ValidationError('Confidence threshold must be between 0 and 1', { confidenceThreshold });
    }

    const startTime = Date.now();
    const fileName = path.basename(pdfPath);
    const stem = path.parse(fileName).name;

    await fs.ensureDir(this.config.workDir);
    await fs.ensureDir(this.config.outputDir);

    // Per-run directory: same-named catalogs never share a stamped copy
    const runDir = await fs.mkdtemp(path.join(this.config.workDir, `${stem}-`));

    log.info({ pdfPath, confidenceThreshold, runDir }, 'Starting extraction');

    // Step 1: page identifiers
    const stampedPath = await stampPageIdentifiers(pdfPath, path.join(runDir, `${STAMPED_PREFIX}${fileName}`));

    // Step 2: structural analysis of the stamped copy
    const analysis = await analyzePdfFile(stampedPath, {
      headerZoneHeight: this.config.headerZoneHeight,
      footerZoneHeight: this.config.footerZoneHeight,
    });
    let analysisPath: string | undefined;
    if (this.config.saveAnalysis) {
      analysisPath = await saveAnalysis(analysis, path.join(runDir, `${stem}_analysis.json`));
    }

    // Step 3: boundary detection
    const rawResponse = await this.detector.detectBoundaries({ pdfPath: stampedPath, analysis });

    // Step 4: parse
    const parse = this.parser.parseDetailed(rawResponse, analysis.totalPages, confidenceThreshold);
    if (parse.kind === 'malformed') {
      log.warn({ detail: parse.detail }, 'Boundary response could not be understood');
    }
    const boundaries = parse.kind === 'ok' ? parse.boundaries : [];

    // Step 5: split the unstamped original
    const { sheets, skipped, failures, overlaps } = await materialize(pdfPath, boundaries, this.config.outputDir);

    const report: ExtractionReport = {
      catalog: pdfPath,
      totalPages: analysis.totalPages,
      likelyTechnicalSheetPages: likelyTechnicalSheetPages(analysis),
      parse,
      sheets,
      skipped,
      failures,
      overlaps,
      stampedPath,
      analysisPath,
      summaryPath: path.join(this.config.outputDir, `${stem}_summary.json`),
      processingTimeMs: Date.now() - startTime,
    };

    // Drafted in the run directory and moved into place whole
    const summaryDraft = path.join(runDir, `${stem}_summary.json`);
    await fs.writeJson(summaryDraft, report, { spaces: 2 });
    await fs.move(summaryDraft, report.summaryPath, { overwrite: true });

    log.info(
      { pdfPath, sheets: sheets.length, skipped: skipped.length, failed: failures.length, processingTimeMs: report.processingTimeMs },
      'Extraction complete'
    );
    return report;
  }
}

export default ExtractionCoordinator;
