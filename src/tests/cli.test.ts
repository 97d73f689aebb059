/**
 * Tests for command-line parsing and report formatting
 */
import path from 'path';
import bunyan from 'bunyan';
import fs from 'fs-extra';
import { createCoordinator, formatReport, parseArgs, resolveCatalogPath } from '../cli';
import { loadConfig } from '../config';
import { ExtractionCoordinator } from '../pipeline/ExtractionCoordinator';
import { ExtractionReport } from '../models/ProductBoundary';
import { ValidationError } from '../utils/errors';
import { componentLogger, logger, setLogLevel } from '../utils/logger';
import { makeTempDir } from './helpers/pdfFixtures';

jest.mock('@mistralai/mistralai', () => ({ Mistral: jest.fn() }));

describe('parseArgs', () => {
  test('reads the catalog and options', () => {
    expect(parseArgs(['pumps.pdf', '--threshold', '0.8', '--output', 'sheets', '--no-analysis'])).toEqual({
      pdfPath: 'pumps.pdf',
      threshold: 0.8,
      outputDir: 'sheets',
      saveAnalysis: false,
    });
  });

  test('accepts options before the catalog', () => {
    expect(parseArgs(['--threshold', '0.3', 'pumps.pdf'])).toEqual({ pdfPath: 'pumps.pdf', threshold: 0.3 });
  });

  test.each([
    [[]],
    [['--threshold', 'high', 'pumps.pdf']],
    [['pumps.pdf', '--output']],
    [['pumps.pdf', '--verbose']],
    [['pumps.pdf', 'valves.pdf']],
  ])('rejects %j', args => {
    expect(() => parseArgs(args)).toThrow(ValidationError);
  });
});

describe('resolveCatalogPath', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await makeTempDir();
  });

  afterAll(async () => {
    await fs.remove(tempDir);
  });

  test('looks up a bare missing name in the catalog directory', async () => {
    expect(await resolveCatalogPath('not-here.pdf', tempDir)).toBe(path.join(tempDir, 'not-here.pdf'));
  });

  test('keeps paths with a directory', async () => {
    const explicit = path.join(tempDir, 'pumps.pdf');
    expect(await resolveCatalogPath(explicit, '/elsewhere')).toBe(explicit);
  });
});

describe('createCoordinator', () => {
  afterEach(() => {
    setLogLevel('fatal');
  });

  test('applies the configured log level to the root and component loggers', () => {
    const component = componentLogger('CliTest');
    const config = loadConfig({ MISTRAL_API_KEY: 'test-secret', LOG_LEVEL: 'debug' });

    expect(createCoordinator(parseArgs(['pumps.pdf']), config)).toBeInstanceOf(ExtractionCoordinator);
    expect(logger.level()).toBe(bunyan.DEBUG);
    expect(component.level()).toBe(bunyan.DEBUG);
  });
});

describe('formatReport', () => {
  test('lists sheets, skips, failures and overlaps', () => {
    const report: ExtractionReport = {
      catalog: '/data/catalogs/pumps.pdf',
      totalPages: 10,
      likelyTechnicalSheetPages: [2, 3],
      parse: {
        kind: 'ok',
        boundaries: [],
        diagnostics: {
          elementCount: 3,
          skippedNonObjects: 0,
          belowThreshold: 0,
          duplicatesCollapsed: 0,
          invalidPageValues: 0,
          outOfRangePages: 2,
        },
      },
      sheets: [{ product: 'P-100', pages: [2, 3], confidence: 0.9, outputPath: 'out/sheet.pdf' }],
      skipped: [{ product: 'Ghost', requestedPages: [99], reason: 'no pages within 1-10' }],
      failures: [{ product: 'Locked', pages: [4], outputPath: 'out/locked.pdf', error: 'EACCES' }],
      overlaps: [{ page: 3, products: ['P-100', 'P-200'] }],
      stampedPath: 'work/enhanced_pumps.pdf',
      summaryPath: 'out/pumps_summary.json',
      processingTimeMs: 12,
    };

    expect(formatReport(report).split('\n')).toEqual([
      'pumps.pdf: 1 sheet(s) from 10 page(s)',
      '  P-100 [2, 3] conf 0.90 -> out/sheet.pdf',
      '  skipped Ghost: no pages within 1-10',
      '  failed Locked: EACCES',
      '  page 3 shared by P-100, P-200',
      'Summary: out/pumps_summary.json',
    ]);
  });
});
