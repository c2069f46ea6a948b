/**
 * Configuration Persistence Utilities
 *
 * Handles reading/writing config to the database_metadata table's config_json column.
 * Separated from tools/config.ts and server/state.ts to avoid circular dependencies.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module utils/config-persistence
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';

const PersistedConfigSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export type PersistedConfig = z.infer<typeof PersistedConfigSchema>;

function hasConfigColumn(conn: Database.Database): boolean {
  const cols = conn
    .prepare<[], { name: string }>('PRAGMA table_info(database_metadata)')
    .all();
  return cols.some((c) => c.name === 'config_json');
}

function readConfigJson(conn: Database.Database): PersistedConfig {
  const row = conn
    .prepare<[], { config_json: string | null }>(
      'SELECT config_json FROM database_metadata WHERE id = 1'
    )
    .get();
  if (!row?.config_json) return {};
  const raw: unknown = JSON.parse(row.config_json);
  return PersistedConfigSchema.parse(raw);
}

/**
 * Persist a config value to the database_metadata table's config_json column.
 *
 * Idempotently adds the config_json column if it doesn't exist, then merges
 * the new value into what is stored.
 */
export function persistConfigValue(
  conn: Database.Database,
  key: string,
  value: string | number | boolean
): void {
  if (!hasConfigColumn(conn)) {
    conn.exec("ALTER TABLE database_metadata ADD COLUMN config_json TEXT DEFAULT '{}'");
  }

  const existing = readConfigJson(conn);
  existing[key] = value;
  conn
    .prepare('UPDATE database_metadata SET config_json = ? WHERE id = 1')
    .run(JSON.stringify(existing));
}

/**
 * Load persisted config from the database_metadata table.
 *
 * Called when a database is selected to restore config changes
 * that were persisted from a previous session.
 *
 * @returns Persisted key-value pairs, or an empty object
 * @throws Error if the stored JSON is unreadable
 */
export function loadPersistedConfig(conn: Database.Database): PersistedConfig {
  try {
    if (!hasConfigColumn(conn)) {
      return {};
    }
    return readConfigJson(conn);
  } catch (error) {
    console.error(
      `[CONFIG] Failed to load config: ${error instanceof Error ? error.message : String(error)}`
    );
    throw new Error(
      `Failed to load persisted config: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
