#!/usr/bin/env node
/**
 * cli.ts
 * Command-line entry point: split one catalog into per-product sheets
 *
 * Usage: catalog-sheets <catalog.pdf> [--threshold <n>] [--output <dir>] [--no-analysis]
 */

import 'dotenv/config';
import path from 'path';
import fs from 'fs-extra';
import { Config, loadConfig, toExtractorConfig } from './config';
import { MistralBoundaryDetector } from './core/MistralBoundaryDetector';
import { formatConfidence } from './core/SheetMaterializer';
import { ExtractionCoordinator } from './pipeline/ExtractionCoordinator';
import { ExtractionReport } from './models/ProductBoundary';
import { errorMessage, ValidationError } from './utils/errors';
import { logger, setLogLevel } from './utils/logger';

export const USAGE = 'Usage: catalog-sheets <catalog.pdf> [--threshold <n>] [--output <dir>] [--no-analysis]';

export interface CliOptions {
  pdfPath: string;
  threshold?: number;
  outputDir?: string;
  saveAnalysis?: boolean;
}

/**
 * Parse command line arguments (without the node and script entries)
 * @throws ValidationError on unknown flags or missing values
 */
export function parseArgs(args: string[]): CliOptions {
  let pdfPath: string | undefined;
  const options: Omit<CliOptions, 'pdfPath'> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--threshold': {
        const value = Number(args[++i]);
        if (!Number.isFinite(value)) {
          throw new ValidationError('--threshold expects a number between 0 and 1');
        }
        options.threshold = value;
        break;
      }
      case '--output': {
        const value = args[++i];
        if (!value) {
          throw new ValidationError('--output expects a directory');
        }
        options.outputDir = value;
        break;
      }
      case '--no-analysis':
        options.saveAnalysis = false;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new ValidationError(`Unknown option ${arg}`);
        }
        if (pdfPath !== undefined) {
          throw new ValidationError(`Unexpected argument ${arg}`);
        }
        pdfPath = arg;
    }
  }

  if (pdfPath === undefined) {
    throw new ValidationError('A catalog PDF is required');
  }
  return { pdfPath, ...options };
}

/**
 * A bare file name that does not exist in the working directory is looked up
 * in the catalog directory
 */
export async function resolveCatalogPath(pdfPath: string, catalogDir: string): Promise<string> {
  if (path.basename(pdfPath) !== pdfPath || (await fs.pathExists(pdfPath))) {
    return pdfPath;
  }
  return path.join(catalogDir, pdfPath);
}

export function formatReport(report: ExtractionReport): string {
  const lines = [`${path.basename(report.catalog)}: ${report.sheets.length} sheet(s) from ${report.totalPages} page(s)`];

  for (const sheet of report.sheets) {
    lines.push(`  ${sheet.product} [${sheet.pages.join(', ')}] conf ${formatConfidence(sheet.confidence)} -> ${sheet.outputPath}`);
  }
  for (const skipped of report.skipped) {
    lines.push(`  skipped ${skipped.product}: ${skipped.reason}`);
  }
  for (const failure of report.failures) {
    lines.push(`  failed ${failure.product}: ${failure.error}`);
  }
  for (const overlap of report.overlaps) {
    lines.push(`  page ${overlap.page} shared by ${overlap.products.join(', ')}`);
  }
  if (report.parse.kind === 'malformed') {
    lines.push(`  response not understood: ${report.parse.detail}`);
  }
  lines.push(`Summary: ${report.summaryPath}`);

  return lines.join('\n');
}

/**
 * Apply the configured log level and build a coordinator with the command
 * line overrides
 */
export function createCoordinator(options: CliOptions, config: Config): ExtractionCoordinator {
  setLogLevel(config.logging.level);

  const extractorConfig = toExtractorConfig(config);
  if (options.outputDir !== undefined) {
    extractorConfig.outputDir = options.outputDir;
  }
  if (options.saveAnalysis !== undefined) {
    extractorConfig.saveAnalysis = options.saveAnalysis;
  }

  return new ExtractionCoordinator(extractorConfig, new MistralBoundaryDetector(config.mistral));
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const config = loadConfig();

  const coordinator = createCoordinator(options, config);
  const pdfPath = await resolveCatalogPath(options.pdfPath, config.paths.catalogDir);
  const report = await coordinator.run(pdfPath, options.threshold);

  console.log(formatReport(report));
}

if (require.main === module) {
  main().catch(error => {
    logger.fatal({ err: error }, 'Extraction failed');
    console.error(errorMessage(error));
    if (error instanceof ValidationError) {
      console.error(USAGE);
    }
    process.exit(1);
  });
}
