/**
 * SQL Schema Definitions for the Boundary Extractor
 *
 * Contains all table creation SQL, indexes, and database configuration.
 * These are constants used by the migration system.
 *
 * Hierarchy tables mirror the extraction levels:
 *   states (Level1) → lgas (Level2) → wards (Level3)
 *
 * @module migrations/schema-definitions
 */

/** Current schema version */
export const SCHEMA_VERSION = 2;

/**
 * Database configuration pragmas for performance and safety
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA cache_size = -16000',
  'PRAGMA busy_timeout = 30000',
] as const;

/**
 * Schema version table - tracks migration state
 */
export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * Database metadata table - database info, denormalized counts, persisted config
 */
export const CREATE_DATABASE_METADATA_TABLE = `
CREATE TABLE IF NOT EXISTS database_metadata (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  database_name TEXT NOT NULL,
  database_version TEXT NOT NULL,
  created_at TEXT NOT NULL,
  last_modified_at TEXT NOT NULL,
  total_states INTEGER NOT NULL DEFAULT 0,
  total_lgas INTEGER NOT NULL DEFAULT 0,
  total_wards INTEGER NOT NULL DEFAULT 0,
  total_extractions INTEGER NOT NULL DEFAULT 0,
  config_json TEXT DEFAULT '{}'
)
`;

/**
 * States table (Level1)
 */
export const CREATE_STATES_TABLE = `
CREATE TABLE IF NOT EXISTS states (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  state_name TEXT NOT NULL UNIQUE,
  state_code TEXT NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * LGAs table (Level2) - name unique within a state
 */
export const CREATE_LGAS_TABLE = `
CREATE TABLE IF NOT EXISTS lgas (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  lga_name TEXT NOT NULL,
  lga_code TEXT NOT NULL,
  state_id INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  FOREIGN KEY (state_id) REFERENCES states(id) ON DELETE CASCADE,
  UNIQUE (lga_name, state_id)
)
`;

/**
 * Wards table (Level3) - name unique within an LGA
 */
export const CREATE_WARDS_TABLE = `
CREATE TABLE IF NOT EXISTS wards (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  ward_name TEXT NOT NULL,
  ward_code TEXT NOT NULL,
  lga_id INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  FOREIGN KEY (lga_id) REFERENCES lgas(id) ON DELETE CASCADE,
  UNIQUE (ward_name, lga_id)
)
`;

/**
 * Extraction logs - one row per extraction run that was saved
 */
export const CREATE_EXTRACTION_LOGS_TABLE = `
CREATE TABLE IF NOT EXISTS extraction_logs (
  id TEXT PRIMARY KEY,
  filename TEXT NOT NULL,
  file_hash TEXT,
  status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'in_progress', 'success', 'failed')),
  total_states_extracted INTEGER NOT NULL DEFAULT 0,
  total_lgas_extracted INTEGER NOT NULL DEFAULT 0,
  total_wards_extracted INTEGER NOT NULL DEFAULT 0,
  states_created INTEGER NOT NULL DEFAULT 0,
  lgas_created INTEGER NOT NULL DEFAULT 0,
  wards_created INTEGER NOT NULL DEFAULT 0,
  diagnostics_json TEXT,
  error_message TEXT,
  created_at TEXT NOT NULL,
  completed_at TEXT
)
`;

/**
 * All required indexes
 */
export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_states_name ON states(state_name)',
  'CREATE INDEX IF NOT EXISTS idx_lgas_name ON lgas(lga_name)',
  'CREATE INDEX IF NOT EXISTS idx_lgas_state_id ON lgas(state_id)',
  'CREATE INDEX IF NOT EXISTS idx_wards_name ON wards(ward_name)',
  'CREATE INDEX IF NOT EXISTS idx_wards_lga_id ON wards(lga_id)',
  'CREATE INDEX IF NOT EXISTS idx_extraction_logs_created_at ON extraction_logs(created_at)',
  'CREATE INDEX IF NOT EXISTS idx_extraction_logs_file_hash ON extraction_logs(file_hash)',
] as const;

/**
 * Table definitions in dependency order
 */
export const TABLE_DEFINITIONS = [
  { name: 'database_metadata', sql: CREATE_DATABASE_METADATA_TABLE },
  { name: 'states', sql: CREATE_STATES_TABLE },
  { name: 'lgas', sql: CREATE_LGAS_TABLE },
  { name: 'wards', sql: CREATE_WARDS_TABLE },
  { name: 'extraction_logs', sql: CREATE_EXTRACTION_LOGS_TABLE },
] as const;

export const REQUIRED_TABLES = [
  'schema_version',
  'database_metadata',
  'states',
  'lgas',
  'wards',
  'extraction_logs',
] as const;

export const REQUIRED_INDEXES = [
  'idx_states_name',
  'idx_lgas_name',
  'idx_lgas_state_id',
  'idx_wards_name',
  'idx_wards_lga_id',
  'idx_extraction_logs_created_at',
  'idx_extraction_logs_file_hash',
] as const;
