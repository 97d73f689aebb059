/**
 * Models for product boundaries and the sheets materialized from them
 */

export interface ProductBoundary {
  readonly product: string;       // Display name or product code, never empty
  readonly pages: number[];       // Distinct 1-indexed pages, in the order given
  readonly confidence: number;    // 0-1
  readonly reason: string;        // Model's justification, may be empty
}

export interface ParseDiagnostics {
  elementCount: number;           // Elements in the decoded array
  skippedNonObjects: number;
  belowThreshold: number;
  duplicatesCollapsed: number;
  invalidPageValues: number;      // Page values that could not become integers
  outOfRangePages: number;        // Integer pages outside [1, totalPages]
}

/**
 * The external response could not be understood at all.
 * Distinct from a valid answer that names no products.
 */
export interface BoundaryParseFailure {
  readonly kind: 'malformed';
  readonly detail: string;
}

export type BoundaryParseOutcome =
  | { readonly kind: 'ok'; readonly boundaries: ProductBoundary[]; readonly diagnostics: ParseDiagnostics }
  | { readonly kind: 'empty'; readonly diagnostics: ParseDiagnostics }
  | BoundaryParseFailure;

export interface ExtractedSheet {
  readonly product: string;
  readonly pages: number[];       // 1-indexed, sorted, as written
  readonly confidence: number;
  readonly outputPath: string;
}

export interface SkippedBoundary {
  readonly product: string;
  readonly requestedPages: number[];
  readonly reason: string;
}

export interface SheetWriteFailureRecord {
  readonly product: string;
  readonly pages: number[];
  readonly outputPath: string;
  readonly error: string;
}

/** A page claimed by more than one product */
export interface PageOverlap {
  readonly page: number;
  readonly products: string[];
}

export interface MaterializationResult {
  sheetsDir: string;
  sheets: ExtractedSheet[];
  skipped: SkippedBoundary[];
  failures: SheetWriteFailureRecord[];
  overlaps: PageOverlap[];
}

export interface ExtractionReport {
  catalog: string;
  totalPages: number;
  likelyTechnicalSheetPages: number[];
  parse: BoundaryParseOutcome;
  sheets: ExtractedSheet[];
  skipped: SkippedBoundary[];
  failures: SheetWriteFailureRecord[];
  overlaps: PageOverlap[];
  stampedPath: string;
  analysisPath?: string;
  summaryPath: string;
  processingTimeMs: number;
}
