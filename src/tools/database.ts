/**
 * Database Management MCP Tools
 *
 * Tools: boundary_db_create, boundary_db_list, boundary_db_select, boundary_db_stats,
 * boundary_db_delete
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/database
 */

import { z } from 'zod';
import { DatabaseService } from '../services/storage/database/index.js';
import {
  state,
  requireDatabase,
  selectDatabase,
  createDatabase,
  deleteDatabase,
  getDefaultStoragePath,
} from '../server/state.js';
import { successResult } from '../server/types.js';
import {
  validateInput,
  DatabaseCreateInput,
  DatabaseListInput,
  DatabaseSelectInput,
  DatabaseStatsInput,
  DatabaseDeleteInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle boundary_db_create - Create a new database
 */
export async function handleDatabaseCreate(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseCreateInput, params);
    const db = createDatabase(input.name, input.description, input.storage_path);
    const path = db.getPath();

    console.error(`[db] Created database "${input.name}" at ${path}`);

    return formatResponse(
      successResult({
        name: input.name,
        path,
        created: true,
        selected: state.currentDatabaseName === input.name,
        description: input.description,
        next_steps: [
          { tool: 'boundary_extract_pdf', description: 'Extract a boundary PDF into this database' },
          { tool: 'boundary_db_stats', description: 'Check counts for this database' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle boundary_db_list - List all databases
 */
export async function handleDatabaseList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseListInput, params);
    const { limit, offset } = input;
    const storagePath = getDefaultStoragePath();
    const allDatabases = DatabaseService.list(storagePath);

    const totalCount = allDatabases.length;
    const databases = allDatabases.slice(offset, offset + limit);

    const items = databases.map((dbInfo) => ({
      name: dbInfo.name,
      path: dbInfo.path,
      size_bytes: dbInfo.size_bytes,
      created_at: dbInfo.created_at,
      modified_at: dbInfo.last_modified_at,
      ...(dbInfo.error && { error: dbInfo.error, corrupt: dbInfo.corrupt ?? false }),
      ...(input.include_stats && {
        state_count: dbInfo.total_states,
        lga_count: dbInfo.total_lgas,
        ward_count: dbInfo.total_wards,
        extraction_count: dbInfo.total_extractions,
      }),
    }));

    const hasMore = offset + limit < totalCount;

    return formatResponse(
      successResult({
        databases: items,
        total: totalCount,
        returned: items.length,
        offset,
        limit,
        has_more: hasMore,
        storage_path: storagePath,
        current: state.currentDatabaseName,
        next_steps: [
          ...(hasMore
            ? [{ tool: 'boundary_db_list', description: `Get next page (offset=${offset + limit})` }]
            : []),
          { tool: 'boundary_db_select', description: 'Select a database to work with' },
          { tool: 'boundary_db_create', description: 'Create a new database' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle boundary_db_select - Select active database
 */
export async function handleDatabaseSelect(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseSelectInput, params);
    selectDatabase(input.database_name);

    const { db } = requireDatabase();
    const stats = db.getStats();

    return formatResponse(
      successResult({
        name: input.database_name,
        path: db.getPath(),
        selected: true,
        stats: {
          state_count: stats.total_states,
          lga_count: stats.total_lgas,
          ward_count: stats.total_wards,
          extraction_count: stats.total_extractions,
        },
        next_steps: [
          { tool: 'boundary_state_list', description: 'Browse the extracted states' },
          { tool: 'boundary_extract_pdf', description: 'Extract another boundary PDF' },
          { tool: 'boundary_search', description: 'Find a state, LGA or ward by name' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

function buildStatsResponse(db: DatabaseService): Record<string, unknown> {
  const stats = db.getStats();
  const recent = db.getExtractionLogs(5).map((log) => ({
    id: log.id,
    filename: log.filename,
    status: log.status,
    created_at: log.created_at,
  }));

  return {
    name: db.getName(),
    path: db.getPath(),
    size_bytes: stats.storage_size_bytes,
    state_count: stats.total_states,
    lga_count: stats.total_lgas,
    ward_count: stats.total_wards,
    extraction_count: stats.total_extractions,
    extractions_by_status: stats.extractions_by_status,
    avg_lgas_per_state: Number(stats.avg_lgas_per_state.toFixed(2)),
    avg_wards_per_lga: Number(stats.avg_wards_per_lga.toFixed(2)),
    recent_extractions: recent,
  };
}

/**
 * Handle boundary_db_stats - Get database statistics
 */
export async function handleDatabaseStats(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseStatsInput, params);

    const statsNextSteps = [
      { tool: 'boundary_state_list', description: 'Browse the extracted states' },
      { tool: 'boundary_extraction_logs', description: 'Review extraction runs' },
    ];

    // A named database other than the current one is opened just for this call
    if (input.database_name && input.database_name !== state.currentDatabaseName) {
      const db = DatabaseService.open(input.database_name, getDefaultStoragePath());
      try {
        return formatResponse(
          successResult({ ...buildStatsResponse(db), next_steps: statsNextSteps })
        );
      } finally {
        db.close();
      }
    }

    const { db } = requireDatabase();
    return formatResponse(successResult({ ...buildStatsResponse(db), next_steps: statsNextSteps }));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle boundary_db_delete - Delete a database
 */
export async function handleDatabaseDelete(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseDeleteInput, params);
    deleteDatabase(input.database_name);

    console.error(`[db] Deleted database "${input.database_name}"`);

    return formatResponse(
      successResult({
        name: input.database_name,
        deleted: true,
        next_steps: [{ tool: 'boundary_db_list', description: 'List remaining databases' }],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const databaseTools: Record<string, ToolDefinition> = {
  boundary_db_create: {
    description:
      '[SETUP] Use to create a new database before extracting documents. Returns database name and path. The new database is selected automatically.',
    inputSchema: {
      name: z
        .string()
        .min(1)
        .max(64)
        .regex(/^[a-zA-Z0-9_-]+$/)
        .describe('Database name (alphanumeric, underscore, hyphen only)'),
      description: z.string().max(500).optional().describe('Optional description for the database'),
      storage_path: z.string().optional().describe('Optional storage path override'),
    },
    handler: handleDatabaseCreate,
  },
  boundary_db_list: {
    description:
      '[ESSENTIAL] Use first to discover available databases. Returns names, sizes and optionally state/LGA/ward counts. Paginated (default 50 per page).',
    inputSchema: {
      include_stats: z.boolean().default(false).describe('Include state/LGA/ward counts'),
      limit: z
        .number()
        .int()
        .min(1)
        .max(500)
        .default(50)
        .describe('Maximum databases to return (default 50)'),
      offset: z
        .number()
        .int()
        .min(0)
        .default(0)
        .describe('Number of databases to skip for pagination'),
    },
    handler: handleDatabaseList,
  },
  boundary_db_select: {
    description:
      '[ESSENTIAL] Use to switch active database. Hierarchy, search, export and saving extractions all use the selected database.',
    inputSchema: {
      database_name: z.string().min(1).describe('Name of the database to select'),
    },
    handler: handleDatabaseSelect,
  },
  boundary_db_stats: {
    description:
      '[STATUS] Use to check state/LGA/ward counts, extraction outcomes and averages for a database.',
    inputSchema: {
      database_name: z
        .string()
        .optional()
        .describe('Database name (uses current if not specified)'),
    },
    handler: handleDatabaseStats,
  },
  boundary_db_delete: {
    description:
      '[DESTRUCTIVE] Use to permanently delete a database and all its data. Requires confirm=true.',
    inputSchema: {
      database_name: z.string().min(1).describe('Name of the database to delete'),
      confirm: z.literal(true).describe('Must be true to confirm deletion'),
    },
    handler: handleDatabaseDelete,
  },
};
