/**
 * Extraction engine exports
 *
 * @module services/extraction
 */

export type {
  Level1,
  Level2,
  Level3,
  ExtractedDocument,
  ExtractionStatistics,
  ExtractionDiagnostics,
  ExtractionResult,
} from '../../models/hierarchy.js';
export type { RawCell, RawRow, RawTable, Page, PageData } from '../../models/page.js';
export { pageFromData } from '../../models/page.js';

export {
  ExtractionEngine,
  extract,
  extractAsync,
  computeStatistics,
  type ExtractOptions,
  type ExtractAsyncOptions,
} from './engine.js';
export {
  getDefaultEngineConfig,
  resolveEngineConfig,
  loadReferenceData,
  LGA_WARD_SIX_COLUMN_LAYOUT,
  type EngineConfig,
  type ColumnLayout,
  type BannerPosition,
} from './config.js';
export {
  ExtractionError,
  UnreadableSourceError,
  ExtractionAbortedError,
  SourceFileError,
  type ExtractionErrorCode,
} from './errors.js';
export { createConsoleLogger, silentLogger, type ExtractionLogger } from './logger.js';
export {
  serializeDocument,
  toExportedDocument,
  parseExportedDocument,
  type ExportedDocument,
  type ExportedState,
  type ExportedLga,
  type ExportedWard,
} from './serializer.js';
export { generateCode, normalizeName, FALLBACK_CODE } from './normalize.js';
