/**
 * Helper functions for DatabaseService
 *
 * Contains utility functions for name validation and path resolution.
 */

import { homedir } from 'os';
import { join } from 'path';
import { DatabaseError, DatabaseErrorCode } from './types.js';

/**
 * Default storage path for databases
 */
export const DEFAULT_STORAGE_PATH =
  process.env.BOUNDARY_EXTRACTOR_DATABASES_PATH ||
  join(homedir(), '.boundary-extractor', 'databases');

/**
 * Valid database name pattern: alphanumeric, underscores, hyphens
 */
const VALID_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

/**
 * Validate database name format
 */
export function validateName(name: string): void {
  if (!name) {
    throw new DatabaseError('Database name is required', DatabaseErrorCode.INVALID_NAME);
  }
  if (!VALID_NAME_PATTERN.test(name)) {
    throw new DatabaseError(
      `Invalid database name "${name}". Only alphanumeric characters, underscores, and hyphens are allowed.`,
      DatabaseErrorCode.INVALID_NAME
    );
  }
}

/**
 * Get full database path
 */
export function getDatabasePath(name: string, storagePath?: string): string {
  const basePath = storagePath ?? DEFAULT_STORAGE_PATH;
  return join(basePath, `${name}.db`);
}
