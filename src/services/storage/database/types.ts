/**
 * Type definitions for DatabaseService
 *
 * Contains all interfaces, enums, and row types used by the database service.
 */

/**
 * Database information interface
 */
export interface DatabaseInfo {
  name: string;
  path: string;
  size_bytes: number;
  created_at: string;
  last_modified_at: string;
  total_states: number;
  total_lgas: number;
  total_wards: number;
  total_extractions: number;
  error?: string;
  corrupt?: boolean;
}

/**
 * Database statistics interface
 */
export interface DatabaseStats {
  name: string;
  total_states: number;
  total_lgas: number;
  total_wards: number;
  total_extractions: number;
  extractions_by_status: Record<ExtractionLogStatus, number>;
  avg_lgas_per_state: number;
  avg_wards_per_lga: number;
  storage_size_bytes: number;
}

/**
 * Error codes for database operations
 */
export enum DatabaseErrorCode {
  DATABASE_NOT_FOUND = 'DATABASE_NOT_FOUND',
  DATABASE_ALREADY_EXISTS = 'DATABASE_ALREADY_EXISTS',
  DATABASE_LOCKED = 'DATABASE_LOCKED',
  STATE_NOT_FOUND = 'STATE_NOT_FOUND',
  LGA_NOT_FOUND = 'LGA_NOT_FOUND',
  EXTRACTION_LOG_NOT_FOUND = 'EXTRACTION_LOG_NOT_FOUND',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  INVALID_NAME = 'INVALID_NAME',
}

/**
 * Custom error class for database operations
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ROWS
// ═══════════════════════════════════════════════════════════════════════════════

export interface MetadataRow {
  database_name: string;
  database_version: string;
  created_at: string;
  last_modified_at: string;
  total_states: number;
  total_lgas: number;
  total_wards: number;
  total_extractions: number;
}

export interface StateRow {
  id: number;
  state_name: string;
  state_code: string;
  created_at: string;
  updated_at: string;
}

export interface StateWithCount extends StateRow {
  lga_count: number;
}

export interface LgaRow {
  id: number;
  lga_name: string;
  lga_code: string;
  state_id: number;
  created_at: string;
  updated_at: string;
}

export interface LgaWithCount extends LgaRow {
  ward_count: number;
}

export interface LgaWithState extends LgaRow {
  state_name: string;
}

export interface WardRow {
  id: number;
  ward_name: string;
  ward_code: string;
  lga_id: number;
  created_at: string;
  updated_at: string;
}

export type ExtractionLogStatus = 'pending' | 'in_progress' | 'success' | 'failed';

export interface ExtractionLogRow {
  id: string;
  filename: string;
  file_hash: string | null;
  status: ExtractionLogStatus;
  total_states_extracted: number;
  total_lgas_extracted: number;
  total_wards_extracted: number;
  states_created: number;
  lgas_created: number;
  wards_created: number;
  diagnostics_json: string | null;
  error_message: string | null;
  created_at: string;
  completed_at: string | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// OPERATION RESULTS
// ═══════════════════════════════════════════════════════════════════════════════

/** Rows inserted by one save; entities already stored are not counted */
export interface CreatedCounts {
  states_created: number;
  lgas_created: number;
  wards_created: number;
}

export interface SaveExtractionResult extends CreatedCounts {
  log_id: string;
  status: 'success';
}

export type SearchType = 'all' | 'state' | 'lga' | 'ward';

export interface SearchHit {
  id: number;
  name: string;
  code: string;
}

export interface SearchResults {
  states: SearchHit[];
  lgas: Array<SearchHit & { state: string }>;
  wards: Array<SearchHit & { lga: string; state: string }>;
}

export interface ExportData {
  export_time: string;
  states: Array<{
    name: string;
    code: string;
    lgas: Array<{
      name: string;
      code: string;
      wards: Array<{ name: string; code: string }>;
    }>;
  }>;
}
