export * from './models/PageRecord';
export * from './models/ProductBoundary';
export * from './models/BoundaryDetector';
export { loadConfig, toExtractorConfig, DEFAULT_CONFIG } from './config';
export type { Config, ExtractorConfig } from './config';
export { stampPageIdentifiers, pageLabel, pageTag } from './core/PageStamper';
export {
  analyzeDocument,
  analyzePdfFile,
  likelyTechnicalSheetPages,
  saveAnalysis,
  isLikelyTechnicalSheet,
} from './core/PageMetadataProvider';
export { BoundaryResponseParser } from './core/BoundaryResponseParser';
export { materialize, buildSheetFileName, formatConfidence, sanitizeProductName } from './core/SheetMaterializer';
export { MistralBoundaryDetector } from './core/MistralBoundaryDetector';
export { ExtractionCoordinator } from './pipeline/ExtractionCoordinator';
export { TECHNICAL_SHEET_PROMPT } from './prompts/technicalSheetPrompt';
export * from './utils/errors';
export { logger, createLogger, componentLogger, setLogLevel } from './utils/logger';
