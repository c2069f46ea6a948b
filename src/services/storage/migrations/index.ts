/**
 * Database Schema Migrations for the Boundary Extractor
 *
 * Handles SQLite schema initialization and migrations with better-sqlite3.
 *
 * Security: All SQL uses parameterized queries via db.prepare()
 * Performance: WAL mode, proper indexes, foreign key constraints
 *
 * @module migrations
 */

export { MigrationError } from './types.js';

export {
  initializeDatabase,
  migrateToLatest,
  checkSchemaVersion,
  getCurrentSchemaVersion,
} from './operations.js';

export { configurePragmas } from './schema-helpers.js';

export { verifySchema } from './verification.js';

export { SCHEMA_VERSION } from './schema-definitions.js';
