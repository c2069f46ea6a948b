/**
 * Startup Validation
 *
 * Validates startup dependencies and applies environment-driven config.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import fs from 'fs';
import { loadReferenceData } from '../services/extraction/config.js';
import { configurationError } from './errors.js';
import { getConfig, updateConfig } from './state.js';

/**
 * Validate startup dependencies and apply environment-driven config overrides.
 *
 * The bundled state list is required; an unwritable storage directory is
 * only a warning, since the database tools report it precisely later.
 *
 * @throws MCPError with CONFIGURATION_ERROR if the reference data cannot be loaded
 *   or BOUNDARY_EXTRACTOR_MAX_FILE_SIZE_MB is not a positive number
 */
export function validateStartupDependencies(): void {
  const warnings: string[] = [];

  try {
    const reference = loadReferenceData();
    console.error(`[Config] Reference list: ${reference.states.length} states`);
  } catch (error) {
    throw configurationError(
      `Reference state list could not be loaded: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const maxFileSize = process.env.BOUNDARY_EXTRACTOR_MAX_FILE_SIZE_MB;
  if (maxFileSize) {
    const parsed = Number(maxFileSize);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw configurationError(
        `Invalid numeric env var BOUNDARY_EXTRACTOR_MAX_FILE_SIZE_MB: "${maxFileSize}"`
      );
    }
    updateConfig({ maxFileSizeMb: parsed });
    console.error(`[Config] BOUNDARY_EXTRACTOR_MAX_FILE_SIZE_MB=${parsed}`);
  }

  const { defaultStoragePath } = getConfig();
  try {
    fs.mkdirSync(defaultStoragePath, { recursive: true });
  } catch (error) {
    warnings.push(
      `Storage directory ${defaultStoragePath} is not writable: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (warnings.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      console.error(`  - ${w}`);
    }
    console.error('========================');
  }
}
