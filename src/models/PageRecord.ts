/**
 * Models for per-page structural analysis
 */

export interface PageRecord {
  readonly pageNumber: number;    // 1-indexed position in the document
  readonly width: number;         // Page width in points
  readonly height: number;        // Page height in points
  readonly textContent: string;   // Full page text, one line per visual row
  readonly headerText: string;    // Text inside the header zone
  readonly footerText: string;    // Text inside the footer zone
  readonly hasTables: boolean;    // At least one aligned multi-column block
  readonly imageCount: number;    // Distinct images painted on the page
  readonly likelyTechnicalSheet: boolean;
}

// Whole-document analysis, also the context handed to the LLM
export interface DocumentAnalysis {
  readonly totalPages: number;
  readonly pages: PageRecord[];
}

export interface AnalysisOptions {
  headerZoneHeight?: number;
  footerZoneHeight?: number;
}
