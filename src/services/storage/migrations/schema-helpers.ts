/**
 * Schema Helper Functions for Database Migrations
 *
 * Contains helper functions for configuring pragmas, creating tables,
 * indexes, and initializing database metadata.
 *
 * @module migrations/schema-helpers
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import {
  DATABASE_PRAGMAS,
  CREATE_SCHEMA_VERSION_TABLE,
  CREATE_INDEXES,
  TABLE_DEFINITIONS,
  SCHEMA_VERSION,
} from './schema-definitions.js';

/**
 * Configure database pragmas. Per-connection, so run on every open.
 */
export function configurePragmas(db: Database.Database): void {
  for (const pragma of DATABASE_PRAGMAS) {
    try {
      db.exec(pragma);
    } catch (error) {
      throw new MigrationError(`Failed to set pragma: ${pragma}`, 'pragma', undefined, error);
    }
  }
}

/**
 * Create schema version table and stamp the current version
 */
export function initializeSchemaVersion(db: Database.Database): void {
  try {
    db.exec(CREATE_SCHEMA_VERSION_TABLE);

    const now = new Date().toISOString();
    db.prepare(
      `
      INSERT INTO schema_version (id, version, created_at, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET version = excluded.version, updated_at = excluded.updated_at
    `
    ).run(1, SCHEMA_VERSION, now, now);
  } catch (error) {
    throw new MigrationError(
      'Failed to initialize schema version table',
      'create_table',
      'schema_version',
      error
    );
  }
}

/**
 * Create all tables in dependency order
 */
export function createTables(db: Database.Database): void {
  for (const table of TABLE_DEFINITIONS) {
    try {
      db.exec(table.sql);
    } catch (error) {
      throw new MigrationError(
        `Failed to create table: ${table.name}`,
        'create_table',
        table.name,
        error
      );
    }
  }
}

/**
 * Create all required indexes
 */
export function createIndexes(db: Database.Database): void {
  for (const indexSql of CREATE_INDEXES) {
    try {
      db.exec(indexSql);
    } catch (error) {
      const match = indexSql.match(/CREATE INDEX IF NOT EXISTS (\w+)/);
      const indexName = match ? match[1] : 'unknown';
      throw new MigrationError(
        `Failed to create index: ${indexName}`,
        'create_index',
        indexName,
        error
      );
    }
  }
}

/**
 * Initialize database metadata with default values
 */
export function initializeDatabaseMetadata(db: Database.Database): void {
  try {
    const now = new Date().toISOString();
    db.prepare(
      `
      INSERT OR IGNORE INTO database_metadata (
        id, database_name, database_version, created_at, last_modified_at,
        total_states, total_lgas, total_wards, total_extractions
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `
    ).run(1, 'boundary-extractor', '1.0.0', now, now, 0, 0, 0, 0);
  } catch (error) {
    throw new MigrationError(
      'Failed to initialize database metadata',
      'insert',
      'database_metadata',
      error
    );
  }
}

/**
 * Whether a table already has a column (used by additive migrations)
 */
export function hasColumn(db: Database.Database, table: string, column: string): boolean {
  const columns = db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
  return columns.some((c) => c.name === column);
}
