/**
 * Schema Verification Functions
 *
 * Contains functions to verify database schema integrity.
 *
 * @module migrations/verification
 */

import type Database from 'better-sqlite3';
import { REQUIRED_TABLES, REQUIRED_INDEXES } from './schema-definitions.js';

// Columns most likely to be missing after a partial migration
const REQUIRED_COLUMNS: Record<string, string[]> = {
  database_metadata: ['id', 'database_name', 'config_json'],
  states: ['id', 'state_name', 'state_code'],
  lgas: ['id', 'lga_name', 'lga_code', 'state_id'],
  wards: ['id', 'ward_name', 'ward_code', 'lga_id'],
  extraction_logs: ['id', 'filename', 'file_hash', 'status', 'diagnostics_json'],
};

/**
 * Verify all required tables, indexes, and columns exist
 */
export function verifySchema(db: Database.Database): {
  valid: boolean;
  missingTables: string[];
  missingIndexes: string[];
  missingColumns: string[];
} {
  const missingTables: string[] = [];
  const missingIndexes: string[] = [];
  const missingColumns: string[] = [];

  const findObject = db.prepare<[string, string], { name: string }>(
    `SELECT name FROM sqlite_master WHERE type = ? AND name = ?`
  );

  for (const tableName of REQUIRED_TABLES) {
    if (!findObject.get('table', tableName)) {
      missingTables.push(tableName);
    }
  }

  for (const indexName of REQUIRED_INDEXES) {
    if (!findObject.get('index', indexName)) {
      missingIndexes.push(indexName);
    }
  }

  for (const [table, requiredCols] of Object.entries(REQUIRED_COLUMNS)) {
    if (!findObject.get('table', table)) {
      continue; // already reported as a missing table
    }
    const columns = db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
    const columnNames = new Set(columns.map((c) => c.name));
    for (const col of requiredCols) {
      if (!columnNames.has(col)) {
        missingColumns.push(`Table "${table}" is missing required column: ${col}`);
      }
    }
  }

  return {
    valid: missingTables.length === 0 && missingIndexes.length === 0 && missingColumns.length === 0,
    missingTables,
    missingIndexes,
    missingColumns,
  };
}
