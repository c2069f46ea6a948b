/**
 * Configuration Management MCP Tools
 *
 * Tools: boundary_config_get, boundary_config_set
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/config
 */

import { z } from 'zod';
import {
  state,
  getConfig,
  updateConfig,
  hasDatabase,
  requireDatabase,
  configUpdateFor,
  configValueFor,
} from '../server/state.js';
import { persistConfigValue } from '../utils/config-persistence.js';
import { successResult } from '../server/types.js';
import { validateInput, ConfigGetInput, ConfigSetInput, ConfigKey } from '../utils/validation.js';
import { validationError } from '../server/errors.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleConfigGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigGetInput, params);
    const config = getConfig();

    const configNextSteps = [
      { tool: 'boundary_config_set', description: 'Change a configuration setting' },
      { tool: 'boundary_extract_pdf', description: 'Extract with the current settings' },
    ];

    if (input.key) {
      return formatResponse(
        successResult({ key: input.key, value: configValueFor(input.key), next_steps: configNextSteps })
      );
    }

    const values: Record<string, string | number | boolean> = {};
    for (const key of ConfigKey.options) {
      values[key] = configValueFor(key);
    }

    return formatResponse(
      successResult({
        ...values,

        // Informational only
        storage_path: config.defaultStoragePath,
        current_database: state.currentDatabaseName,
        hash_algorithm: 'sha256',

        next_steps: configNextSteps,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleConfigSet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigSetInput, params);
    const update = configUpdateFor(input.key, input.value);

    const next = { ...getConfig(), ...update };
    if (next.bannerMinLength > next.bannerMaxLength) {
      throw validationError(
        `banner_min_length (${next.bannerMinLength}) must not exceed banner_max_length (${next.bannerMaxLength})`,
        { key: input.key, value: input.value }
      );
    }

    updateConfig(update);
    console.error(`[Config] ${input.key}=${String(input.value)}`);

    // Persist to the selected database, if any
    let persisted = false;
    if (hasDatabase()) {
      try {
        const { db } = requireDatabase();
        persistConfigValue(db.getConnection(), input.key, input.value);
        persisted = true;
      } catch (persistErr) {
        throw new Error(
          `Config value set but persistence failed: ${persistErr instanceof Error ? persistErr.message : String(persistErr)}`
        );
      }
    }

    return formatResponse(
      successResult({
        key: input.key,
        value: configValueFor(input.key),
        updated: true,
        persisted,
        next_steps: [
          { tool: 'boundary_config_get', description: 'Verify the updated configuration' },
          { tool: 'boundary_extract_pdf', description: 'Extract with the new settings' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const configTools: Record<string, ToolDefinition> = {
  boundary_config_get: {
    description:
      '[STATUS] Use to view current configuration (export directory, file size limit, banner and code thresholds). Returns all or one specific key.',
    inputSchema: {
      key: ConfigKey.optional().describe('Specific config key to retrieve'),
    },
    handler: handleConfigGet,
  },
  boundary_config_set: {
    description:
      '[CONFIG] Use to change a setting for later extractions. Persisted into the selected database and restored when it is selected again.',
    inputSchema: {
      key: ConfigKey.describe('Configuration key to set'),
      value: z.union([z.string(), z.number(), z.boolean()]).describe('New value'),
    },
    handler: handleConfigSet,
  },
};
