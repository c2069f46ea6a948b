/**
 * Database Migration Operations
 *
 * Contains the main migration functions: initializeDatabase, migrateToLatest,
 * checkSchemaVersion, and getCurrentSchemaVersion.
 *
 * @module migrations/operations
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import { SCHEMA_VERSION } from './schema-definitions.js';
import {
  configurePragmas,
  createIndexes,
  createTables,
  hasColumn,
  initializeDatabaseMetadata,
  initializeSchemaVersion,
} from './schema-helpers.js';

/**
 * Check the current schema version of the database
 * @returns Current schema version, or 0 if not initialized
 */
export function checkSchemaVersion(db: Database.Database): number {
  try {
    const tableExists = db
      .prepare<[], { name: string }>(
        `
      SELECT name FROM sqlite_master
      WHERE type = 'table' AND name = 'schema_version'
    `
      )
      .get();

    if (!tableExists) {
      return 0;
    }

    const row = db
      .prepare<[number], { version: number }>('SELECT version FROM schema_version WHERE id = ?')
      .get(1);

    return row?.version ?? 0;
  } catch (error) {
    throw new MigrationError('Failed to check schema version', 'query', 'schema_version', error);
  }
}

/**
 * Get the current schema version constant
 */
export function getCurrentSchemaVersion(): number {
  return SCHEMA_VERSION;
}

/**
 * Initialize the database with all tables, indexes, and configuration
 *
 * Idempotent. Schema version is stamped LAST inside the transaction so a
 * crash mid-init leaves version 0 and a clean re-init on the next open.
 *
 * @throws MigrationError if any operation fails
 */
export function initializeDatabase(db: Database.Database): void {
  // Pragmas must run outside a transaction
  configurePragmas(db);

  const initTransaction = db.transaction(() => {
    createTables(db);
    createIndexes(db);
    initializeDatabaseMetadata(db);
    initializeSchemaVersion(db);
  });

  initTransaction();
}

/**
 * Migrate from schema version 1 to version 2
 *
 * Changes in v2:
 * - database_metadata.config_json: persisted tool configuration
 * - extraction_logs.diagnostics_json: engine diagnostics per run
 * - idx_extraction_logs_file_hash: re-extraction lookup by file hash
 */
function migrateV1ToV2(db: Database.Database): void {
  try {
    db.transaction(() => {
      if (!hasColumn(db, 'database_metadata', 'config_json')) {
        db.exec("ALTER TABLE database_metadata ADD COLUMN config_json TEXT DEFAULT '{}'");
      }
      if (!hasColumn(db, 'extraction_logs', 'diagnostics_json')) {
        db.exec('ALTER TABLE extraction_logs ADD COLUMN diagnostics_json TEXT');
      }
      db.exec(
        'CREATE INDEX IF NOT EXISTS idx_extraction_logs_file_hash ON extraction_logs(file_hash)'
      );
    })();
  } catch (error) {
    throw new MigrationError(
      'Failed to migrate from v1 to v2',
      'migrate',
      'extraction_logs',
      error
    );
  }
}

/**
 * Bring a database to SCHEMA_VERSION, applying each step in order
 *
 * @throws MigrationError when the database is newer than this build or a step fails
 */
export function migrateToLatest(db: Database.Database): void {
  const currentVersion = checkSchemaVersion(db);

  if (currentVersion === 0) {
    initializeDatabase(db);
    return;
  }

  if (currentVersion === SCHEMA_VERSION) {
    return;
  }

  if (currentVersion > SCHEMA_VERSION) {
    throw new MigrationError(
      `Database schema version (${String(currentVersion)}) is newer than supported version (${String(SCHEMA_VERSION)}). ` +
        'Please update the application.',
      'version_check',
      undefined
    );
  }

  // Bump after each step so a crash only re-runs the remaining migrations
  const bumpVersion = (targetVersion: number): void => {
    try {
      db.prepare('UPDATE schema_version SET version = ?, updated_at = ? WHERE id = 1').run(
        targetVersion,
        new Date().toISOString()
      );
    } catch (error) {
      throw new MigrationError(
        `Failed to update schema version to ${String(targetVersion)} after migration`,
        'update',
        'schema_version',
        error
      );
    }
  };

  if (currentVersion < 2) {
    migrateV1ToV2(db);
    bumpVersion(2);
  }
}
