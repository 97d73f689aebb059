import { DocumentAnalysis } from './PageRecord';

export interface BoundaryDetectionRequest {
  /** The stamped copy, so page identifiers are visible to the model */
  pdfPath: string;
  analysis: DocumentAnalysis;
}

/**
 * Source of the raw boundary answer for a catalog.
 * Implementations return the model's text untouched; parsing happens downstream.
 */
export interface BoundaryDetector {
  detectBoundaries(request: BoundaryDetectionRequest): Promise<string>;
}
