/**
 * MCP Server State Management
 *
 * Manages global server state including current database connection and configuration.
 * FAIL FAST: All state access throws immediately if preconditions not met.
 *
 * @module server/state
 */

import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { DatabaseService } from '../services/storage/database/index.js';
import { DEFAULT_STORAGE_PATH } from '../services/storage/database/helpers.js';
import {
  databaseNotSelectedError,
  databaseNotFoundError,
  databaseAlreadyExistsError,
} from './errors.js';
import { loadPersistedConfig } from '../utils/config-persistence.js';
import {
  BannerPositionSchema,
  ConfigKey,
  validateInput,
  type ConfigKeyName,
} from '../utils/validation.js';
import type { ServerState, ServerConfig } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Default directory for JSON exports
 */
export const DEFAULT_OUTPUT_DIR =
  process.env.BOUNDARY_EXTRACTOR_OUTPUT_DIR || join(homedir(), '.boundary-extractor', 'exports');

const defaultConfig: ServerConfig = {
  defaultStoragePath: DEFAULT_STORAGE_PATH,
  outputDir: DEFAULT_OUTPUT_DIR,
  maxFileSizeMb: 50,
  preseedFirstReference: true,
  acceptUnlistedBanners: false,
  bannerPosition: 'after_tables',
  headerMinMatches: 2,
  bannerMinLength: 3,
  bannerMaxLength: 40,
  codeMaxLength: 5,
};

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Global server state
 * Mutable state for current database and configuration
 */
export const state: ServerState = {
  currentDatabase: null,
  currentDatabaseName: null,
  config: { ...defaultConfig },
};

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Services returned from requireDatabase
 */
export interface DatabaseServices {
  db: DatabaseService;
  /** Generation counter for detecting stale references */
  generation: number;
}

/**
 * Generation counter - incremented on every database switch/clear.
 */
let _dbGeneration = 0;

/**
 * Active operation counter - tracks in-flight async database operations.
 * selectDatabase() and clearDatabase() refuse to proceed when > 0.
 */
let _activeOperations = 0;

/**
 * Require database to be selected - FAIL FAST if not
 *
 * @throws MCPError with DATABASE_NOT_SELECTED if no database is selected
 */
export function requireDatabase(): DatabaseServices {
  if (!state.currentDatabase) {
    throw databaseNotSelectedError();
  }
  return { db: state.currentDatabase, generation: _dbGeneration };
}

/**
 * Validate that the database generation matches the expected value.
 *
 * A mismatch means the database was switched between the time a caller
 * obtained the generation and now, so the caller's reference is stale.
 *
 * @throws Error if the current generation does not match
 */
export function validateGeneration(expectedGeneration: number): void {
  if (_dbGeneration !== expectedGeneration) {
    throw new Error(
      `Database generation mismatch: expected ${expectedGeneration}, current ${_dbGeneration}. ` +
        `The database was switched during this operation. Retry with the current database.`
    );
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// OPERATION TRACKING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Begin tracking an in-flight database operation.
 *
 * While any operations are active, selectDatabase() and clearDatabase() throw.
 *
 * @returns Current database generation for later validation
 * @throws MCPError if no database is selected
 */
export function beginDatabaseOperation(): number {
  if (!state.currentDatabase) {
    throw databaseNotSelectedError();
  }
  _activeOperations++;
  return _dbGeneration;
}

/**
 * End tracking an in-flight database operation. Counter never goes below 0.
 */
export function endDatabaseOperation(): void {
  if (_activeOperations > 0) {
    _activeOperations--;
  }
}

export function getActiveOperationCount(): number {
  return _activeOperations;
}

/**
 * Execute an async function within a tracked database operation scope.
 *
 * Extraction reads a PDF across many await points before it writes, so the
 * selected database must not change underneath it. The generation is
 * validated after fn completes.
 *
 * @throws MCPError if no database is selected
 * @throws Error if the database was switched during the operation
 */
export async function withDatabaseOperation<T>(
  fn: (services: DatabaseServices) => Promise<T>
): Promise<T> {
  const generation = beginDatabaseOperation();
  try {
    const services = requireDatabase();
    const result = await fn(services);
    validateGeneration(generation);
    return result;
  } finally {
    endDatabaseOperation();
  }
}

export function hasDatabase(): boolean {
  return state.currentDatabase !== null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG KEYS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate a value for a config key and map it onto ServerConfig
 *
 * @throws ValidationError if the value does not fit the key
 */
export function configUpdateFor(key: ConfigKeyName, value: unknown): Partial<ServerConfig> {
  switch (key) {
    case 'output_dir':
      return { outputDir: validateInput(z.string().min(1), value) };
    case 'max_file_size_mb':
      return { maxFileSizeMb: validateInput(z.number().positive().max(1024), value) };
    case 'preseed_first_reference':
      return { preseedFirstReference: validateInput(z.boolean(), value) };
    case 'accept_unlisted_banners':
      return { acceptUnlistedBanners: validateInput(z.boolean(), value) };
    case 'banner_position':
      return { bannerPosition: validateInput(BannerPositionSchema, value) };
    case 'header_min_matches':
      return { headerMinMatches: validateInput(z.number().int().min(1).max(20), value) };
    case 'banner_min_length':
      return { bannerMinLength: validateInput(z.number().int().min(1).max(200), value) };
    case 'banner_max_length':
      return { bannerMaxLength: validateInput(z.number().int().min(1).max(200), value) };
    case 'code_max_length':
      return { codeMaxLength: validateInput(z.number().int().min(1).max(20), value) };
  }
}

/**
 * Read a config key's current value
 */
export function configValueFor(key: ConfigKeyName): string | number | boolean {
  const config = state.config;
  switch (key) {
    case 'output_dir':
      return config.outputDir;
    case 'max_file_size_mb':
      return config.maxFileSizeMb;
    case 'preseed_first_reference':
      return config.preseedFirstReference;
    case 'accept_unlisted_banners':
      return config.acceptUnlistedBanners;
    case 'banner_position':
      return config.bannerPosition;
    case 'header_min_matches':
      return config.headerMinMatches;
    case 'banner_min_length':
      return config.bannerMinLength;
    case 'banner_max_length':
      return config.bannerMaxLength;
    case 'code_max_length':
      return config.codeMaxLength;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Restore config values saved by boundary_config_set in a previous session.
 * Unknown keys and invalid values are skipped with a log line.
 */
function applyPersistedConfig(db: DatabaseService): void {
  try {
    const persisted = loadPersistedConfig(db.getConnection());
    let updates: Partial<ServerConfig> = {};
    let applied = 0;

    for (const [rawKey, value] of Object.entries(persisted)) {
      const key = ConfigKey.safeParse(rawKey);
      if (!key.success) {
        console.error(`[state] Ignoring unknown persisted config key "${rawKey}"`);
        continue;
      }
      try {
        updates = { ...updates, ...configUpdateFor(key.data, value) };
        applied++;
      } catch (error) {
        console.error(
          `[state] Ignoring persisted ${rawKey}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    if (applied > 0) {
      updateConfig(updates);
      console.error(`[state] Loaded ${applied} persisted config value(s) from database`);
    }
  } catch (error) {
    console.error(
      `[state] Failed to apply persisted config: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Select a database by name - opens connection and sets as current
 *
 * FAIL FAST: Throws immediately if the database doesn't exist or if
 * operations are in-flight. Opens the new database before closing the old
 * one, so a failed open leaves the previous selection usable.
 *
 * @throws MCPError with DATABASE_NOT_FOUND if database doesn't exist
 * @throws Error if database operations are in-flight
 */
export function selectDatabase(name: string, storagePath?: string): void {
  const path = storagePath ?? state.config.defaultStoragePath;

  if (_activeOperations > 0) {
    throw new Error(
      `Cannot switch databases while ${_activeOperations} operation(s) are in-flight. ` +
        `Wait for active operations to complete before switching databases.`
    );
  }

  if (!DatabaseService.exists(name, path)) {
    throw databaseNotFoundError(name, path);
  }

  // Re-opening the same file: release the old connection's WAL/SHM mapping first
  const oldDb = state.currentDatabase;
  const isSameDb = oldDb !== null && state.currentDatabaseName === name;

  if (isSameDb) {
    state.currentDatabase = null;
    state.currentDatabaseName = null;
    oldDb.close();
  }

  const newDb = DatabaseService.open(name, path);

  if (!isSameDb && oldDb) {
    oldDb.close();
  }

  state.currentDatabase = newDb;
  state.currentDatabaseName = name;
  _dbGeneration++;

  applyPersistedConfig(newDb);
}

/**
 * Create a new database and optionally select it
 *
 * @param autoSelect - Whether to select the database after creation (default: true)
 * @throws MCPError with DATABASE_ALREADY_EXISTS if database exists
 */
export function createDatabase(
  name: string,
  description?: string,
  storagePath?: string,
  autoSelect: boolean = true
): DatabaseService {
  const path = storagePath ?? state.config.defaultStoragePath;

  if (DatabaseService.exists(name, path)) {
    throw databaseAlreadyExistsError(name);
  }

  const db = DatabaseService.create(name, description, path);

  if (autoSelect) {
    if (_activeOperations > 0) {
      db.close();
      throw new Error(
        `Cannot auto-select newly created database "${name}" while ${_activeOperations} operation(s) are in-flight. ` +
          `Wait for active operations to complete, then select the database manually.`
      );
    }

    if (state.currentDatabase) {
      state.currentDatabase.close();
    }
    _dbGeneration++;
    state.currentDatabase = db;
    state.currentDatabaseName = name;
  }
  // When autoSelect=false the caller owns the returned open connection

  return db;
}

/**
 * Delete a database, clearing the selection first when it is the current one
 *
 * @throws MCPError with DATABASE_NOT_FOUND if database doesn't exist
 */
export function deleteDatabase(name: string, storagePath?: string): void {
  const path = storagePath ?? state.config.defaultStoragePath;

  if (!DatabaseService.exists(name, path)) {
    throw databaseNotFoundError(name, path);
  }

  if (state.currentDatabaseName === name) {
    clearDatabase();
  }

  DatabaseService.delete(name, path);
}

/**
 * Clear current database selection - closes connection.
 *
 * @param forceClose - Skip the in-flight operation guard (tests, process exit)
 * @throws Error if database operations are in-flight and forceClose is false
 */
export function clearDatabase(forceClose: boolean = false): void {
  if (!forceClose && _activeOperations > 0) {
    throw new Error(
      `Cannot clear database while ${_activeOperations} operation(s) are in-flight. ` +
        `Wait for active operations to complete before clearing the database.`
    );
  }

  if (state.currentDatabase) {
    state.currentDatabase.close();
    state.currentDatabase = null;
    state.currentDatabaseName = null;
    _dbGeneration++;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export function getConfig(): ServerConfig {
  return { ...state.config };
}

export function updateConfig(updates: Partial<ServerConfig>): void {
  state.config = { ...state.config, ...updates };
}

export function resetConfig(): void {
  state.config = { ...defaultConfig };
}

export function getDefaultStoragePath(): string {
  return state.config.defaultStoragePath;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTS)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset all server state - ONLY USE IN TESTS
 */
export function resetState(): void {
  clearDatabase(/* forceClose */ true);
  _dbGeneration = 0;
  _activeOperations = 0;
  state.config = { ...defaultConfig };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS EXIT CLEANUP
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Checkpoint WAL/SHM files by closing the connection on exit
 */
process.on('exit', () => {
  if (state.currentDatabase) {
    try {
      state.currentDatabase.close();
    } catch (error) {
      console.error(
        '[state] database close on exit failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    state.currentDatabase = null;
    state.currentDatabaseName = null;
  }
});
