/**
 * Database Module - Public API
 *
 * Re-exports all public types, classes, and functions from the database module.
 */

export { MigrationError } from '../migrations/index.js';

export type {
  DatabaseInfo,
  DatabaseStats,
  StateRow,
  StateWithCount,
  LgaRow,
  LgaWithCount,
  LgaWithState,
  WardRow,
  ExtractionLogRow,
  ExtractionLogStatus,
  CreatedCounts,
  SaveExtractionResult,
  SearchType,
  SearchHit,
  SearchResults,
  ExportData,
} from './types.js';
export { DatabaseErrorCode, DatabaseError } from './types.js';

export { DatabaseService, type SaveExtractionOptions } from './service.js';

export { DEFAULT_STORAGE_PATH } from './helpers.js';
export { SEARCH_LIMIT_PER_TYPE } from './hierarchy-operations.js';
