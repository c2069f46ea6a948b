/**
 * Health Check MCP Tools
 *
 * Tools: boundary_health_check
 *
 * Reports runtime, configuration, and - when a database is selected - its
 * schema state and hierarchy gaps (states without LGAs, LGAs without wards,
 * extraction runs that never finished). Internal-only, no external calls.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/health
 */

import type Database from 'better-sqlite3';
import { getConfig, hasDatabase, requireDatabase, state } from '../server/state.js';
import { successResult } from '../server/types.js';
import { loadReferenceData } from '../services/extraction/config.js';
import {
  checkSchemaVersion,
  getCurrentSchemaVersion,
  verifySchema,
} from '../services/storage/migrations/index.js';
import { validateInput, HealthCheckInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** Gap category with counts and sample names */
interface GapCategory {
  count: number;
  samples: string[];
  fix_tool: string;
  fix_hint: string;
}

const SAMPLE_LIMIT = 10;

/** Runs still in_progress after this long are reported as stale */
const STALE_RUN_MS = 60 * 60 * 1000;

// ═══════════════════════════════════════════════════════════════════════════════
// GAP DETECTION
// ═══════════════════════════════════════════════════════════════════════════════

function findGaps(conn: Database.Database): Record<string, GapCategory> {
  const statesWithoutLgas = conn
    .prepare<[], { name: string }>(
      `SELECT s.state_name AS name FROM states s
       LEFT JOIN lgas l ON l.state_id = s.id
       WHERE l.id IS NULL ORDER BY s.state_name`
    )
    .all();

  const lgasWithoutWards = conn
    .prepare<[], { name: string }>(
      `SELECT s.state_name || ' / ' || l.lga_name AS name FROM lgas l
       JOIN states s ON s.id = l.state_id
       LEFT JOIN wards w ON w.lga_id = l.id
       WHERE w.id IS NULL ORDER BY s.state_name, l.lga_name`
    )
    .all();

  const staleBefore = new Date(Date.now() - STALE_RUN_MS).toISOString();
  const staleRuns = conn
    .prepare<[string], { name: string }>(
      `SELECT filename || ' (' || id || ')' AS name FROM extraction_logs
       WHERE status = 'in_progress' AND created_at < ? ORDER BY created_at`
    )
    .all(staleBefore);

  return {
    states_without_lgas: {
      count: statesWithoutLgas.length,
      samples: statesWithoutLgas.slice(0, SAMPLE_LIMIT).map((r) => r.name),
      fix_tool: 'boundary_extract_pdf',
      fix_hint: 'Re-extract the source; check diagnostics.bannersIgnored and orphanRecords',
    },
    lgas_without_wards: {
      count: lgasWithoutWards.length,
      samples: lgasWithoutWards.slice(0, SAMPLE_LIMIT).map((r) => r.name),
      fix_tool: 'boundary_extract_pdf',
      fix_hint: 'Ward columns may sit elsewhere; retry with column_layout',
    },
    stale_extraction_runs: {
      count: staleRuns.length,
      samples: staleRuns.slice(0, SAMPLE_LIMIT).map((r) => r.name),
      fix_tool: 'boundary_extraction_logs',
      fix_hint: 'The server stopped mid-run; re-run the extraction for these files',
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: boundary_health_check
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleHealthCheck(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(HealthCheckInput, params);
    const config = getConfig();
    const mem = process.memoryUsage();
    const reference = loadReferenceData();

    const runtime = {
      node_version: process.version,
      platform: process.platform,
      uptime_seconds: Math.round(process.uptime()),
      rss_mb: Number((mem.rss / 1024 / 1024).toFixed(1)),
      heap_used_mb: Number((mem.heapUsed / 1024 / 1024).toFixed(1)),
    };

    const environment = {
      databases_path: config.defaultStoragePath,
      output_dir: config.outputDir,
      debug_logging: ['1', 'true'].includes(process.env.BOUNDARY_EXTRACTOR_DEBUG ?? ''),
      reference_states: reference.states.length,
    };

    if (!hasDatabase()) {
      return formatResponse(
        successResult({
          healthy: true,
          database_selected: false,
          runtime,
          environment,
          next_steps: [
            { tool: 'boundary_db_list', description: 'Find a database to select' },
            { tool: 'boundary_db_create', description: 'Create a database for extractions' },
          ],
        })
      );
    }

    const { db } = requireDatabase();
    const conn = db.getConnection();
    const schema = verifySchema(conn);
    const schemaVersion = checkSchemaVersion(conn);
    const stats = db.getStats();
    const gaps = findGaps(conn);
    const totalGaps = Object.values(gaps).reduce((sum, gap) => sum + gap.count, 0);
    const healthy = schema.valid && schemaVersion === getCurrentSchemaVersion();

    return formatResponse(
      successResult({
        healthy,
        database_selected: true,
        database: {
          name: state.currentDatabaseName,
          path: db.getPath(),
          schema_version: schemaVersion,
          expected_schema_version: getCurrentSchemaVersion(),
          schema_valid: schema.valid,
          missing_tables: schema.missingTables,
          missing_indexes: schema.missingIndexes,
          missing_columns: schema.missingColumns,
          state_count: stats.total_states,
          lga_count: stats.total_lgas,
          ward_count: stats.total_wards,
          extractions_by_status: stats.extractions_by_status,
        },
        gaps,
        total_gaps: totalGaps,
        runtime,
        environment,
        next_steps: [
          ...(totalGaps > 0
            ? [{ tool: 'boundary_extraction_logs', description: 'Inspect runs behind the gaps' }]
            : []),
          { tool: 'boundary_db_stats', description: 'Detailed database statistics' },
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

export const healthTools: Record<string, ToolDefinition> = {
  boundary_health_check: {
    description:
      '[STATUS] Use to check server health: runtime, configured paths, and for the selected database its schema, counts, and hierarchy gaps (states without LGAs, LGAs without wards, unfinished runs).',
    inputSchema: {},
    handler: handleHealthCheck,
  },
};
