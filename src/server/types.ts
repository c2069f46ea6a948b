/**
 * MCP Server Type Definitions
 *
 * Defines interfaces for tool results, server configuration, and state.
 *
 * @module server/types
 */

import type { DatabaseService } from '../services/storage/database/index.js';
import type { BannerPosition } from '../services/extraction/config.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server configuration options
 */
export interface ServerConfig {
  /** Default path for database storage */
  defaultStoragePath: string;

  /** Directory for JSON exports written by boundary_extract_pdf */
  outputDir: string;

  /** Largest PDF accepted for extraction, in megabytes (default: 50) */
  maxFileSizeMb: number;

  /** Start each run with the first reference state active */
  preseedFirstReference: boolean;

  /** Accept banner lines that name no known state */
  acceptUnlistedBanners: boolean;

  /** Whether a page's banner lines are read before or after its tables */
  bannerPosition: BannerPosition;

  /** Distinct header keywords needed to treat a row as a table header */
  headerMinMatches: number;

  bannerMinLength: number;
  bannerMaxLength: number;

  /** Longest token accepted as an LGA or ward code */
  codeMaxLength: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server state tracking
 */
export interface ServerState {
  /** Currently selected database instance */
  currentDatabase: DatabaseService | null;

  /** Name of the currently selected database */
  currentDatabaseName: string | null;

  /** Server configuration */
  config: ServerConfig;
}
