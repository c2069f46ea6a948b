/**
 * Boundary Extraction MCP Tools
 *
 * Tools: boundary_extract_pdf, boundary_extract_pages, boundary_extraction_logs
 *
 * Engine thresholds come from the server configuration (boundary_config_set);
 * column layout and the reference state list can be overridden per call.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/extraction
 */

import { z } from 'zod';
import { pageFromData } from '../models/page.js';
import { getConfig, hasDatabase, requireDatabase, withDatabaseOperation } from '../server/state.js';
import { successResult } from '../server/types.js';
import { databaseNotSelectedError } from '../server/errors.js';
import {
  ExtractionService,
  type ExtractionRunResult,
  type ExtractPagesOptions,
} from '../services/extraction-service.js';
import {
  LGA_WARD_SIX_COLUMN_LAYOUT,
  type ColumnLayout,
  type EngineConfig,
} from '../services/extraction/config.js';
import { toExportedDocument } from '../services/extraction/serializer.js';
import type { DatabaseService } from '../services/storage/database/index.js';
import { computeHash } from '../utils/hash.js';
import {
  validateInput,
  sanitizePath,
  ColumnLayoutInput,
  ExtractPdfInput,
  ExtractPagesInput,
  ExtractionLogsInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function toColumnLayout(input: z.infer<typeof ColumnLayoutInput>): ColumnLayout {
  if (input === 'lga_ward_six_column') {
    return { ...LGA_WARD_SIX_COLUMN_LAYOUT };
  }
  return {
    level2Name: input.level2_name,
    level2Code: input.level2_code,
    level3Name: input.level3_name,
    level3Code: input.level3_code,
  };
}

/**
 * Engine overrides built from the server configuration plus per-call options
 */
export function buildEngineOverrides(input: {
  column_layout?: z.infer<typeof ColumnLayoutInput>;
  reference_states?: string[] | null;
}): Partial<EngineConfig> {
  const config = getConfig();
  return {
    preseedFirstReference: config.preseedFirstReference,
    acceptUnlistedBanners: config.acceptUnlistedBanners,
    bannerPosition: config.bannerPosition,
    headerMinMatches: config.headerMinMatches,
    bannerMinLength: config.bannerMinLength,
    bannerMaxLength: config.bannerMaxLength,
    codeMaxLength: config.codeMaxLength,
    ...(input.column_layout !== undefined && { columnLayout: toColumnLayout(input.column_layout) }),
    ...(input.reference_states !== undefined && { referenceLevel1: input.reference_states }),
  };
}

function createService(): ExtractionService {
  return new ExtractionService({ maxFileSizeMb: getConfig().maxFileSizeMb });
}

/**
 * Run against the selected database when saving, tracked so the selection
 * cannot switch mid-run
 */
async function runWithOptionalDatabase(
  saveToDb: boolean,
  run: (database: DatabaseService | null) => Promise<ExtractionRunResult>
): Promise<ExtractionRunResult> {
  if (!saveToDb) {
    return run(null);
  }
  if (!hasDatabase()) {
    throw databaseNotSelectedError();
  }
  return withDatabaseOperation(({ db }) => run(db));
}

function summarize(result: ExtractionRunResult, includeDocument: boolean): Record<string, unknown> {
  const saved = result.database_log_id !== null;
  return {
    run_id: result.run_id,
    filename: result.filename,
    file_hash: result.file_hash,
    statistics: {
      state_count: result.statistics.level1Count,
      lga_count: result.statistics.level2Count,
      ward_count: result.statistics.level3Count,
      states: result.statistics.level1Names,
    },
    diagnostics: result.diagnostics,
    json_file: result.json_file,
    database_log_id: result.database_log_id,
    ...(saved && {
      states_created: result.states_created,
      lgas_created: result.lgas_created,
      wards_created: result.wards_created,
    }),
    ...(includeDocument && { document: toExportedDocument(result.document) }),
    next_steps: saved
      ? [
          { tool: 'boundary_state_list', description: 'Browse the saved states' },
          { tool: 'boundary_search', description: 'Find a state, LGA or ward by name' },
        ]
      : [
          { tool: 'boundary_db_select', description: 'Select a database, then re-run with save_to_db' },
        ],
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle boundary_extract_pdf - Extract the state/LGA/ward hierarchy from a PDF
 */
export async function handleExtractPdf(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ExtractPdfInput, params);
    const filePath = sanitizePath(input.file_path);
    const outputDir = input.output_dir ? sanitizePath(input.output_dir) : getConfig().outputDir;
    const service = createService();
    const engine = buildEngineOverrides(input);

    console.error(`[INFO] Extracting boundaries from: ${filePath}`);

    const result = await runWithOptionalDatabase(input.save_to_db, (database) =>
      service.extractFile(filePath, {
        engine,
        database,
        saveToJson: input.save_to_json,
        outputDir,
      })
    );

    return formatResponse(successResult(summarize(result, input.include_document)));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle boundary_extract_pages - Extract from tables and text supplied as JSON
 */
export async function handleExtractPages(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ExtractPagesInput, params);
    const outputDir = input.output_dir ? sanitizePath(input.output_dir) : getConfig().outputDir;
    const service = createService();
    const pages = input.pages.map((page) => pageFromData(page));
    const options: ExtractPagesOptions = {
      engine: buildEngineOverrides(input),
      filename: input.filename,
      fileHash: computeHash(JSON.stringify(input.pages)),
      saveToJson: input.save_to_json,
      outputDir,
    };

    const result = await runWithOptionalDatabase(input.save_to_db, (database) =>
      service.extractPages(pages, { ...options, database })
    );

    return formatResponse(successResult(summarize(result, input.include_document)));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle boundary_extraction_logs - Recent extraction runs, newest first
 */
export async function handleExtractionLogs(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ExtractionLogsInput, params);
    const { db } = requireDatabase();
    const logs = db.getExtractionLogs(input.limit).map(({ diagnostics_json, ...log }) => {
      const diagnostics: unknown = diagnostics_json ? JSON.parse(diagnostics_json) : null;
      return { ...log, diagnostics };
    });

    return formatResponse(
      successResult({
        logs,
        returned: logs.length,
        limit: input.limit,
        next_steps: [{ tool: 'boundary_db_stats', description: 'See totals across all runs' }],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

const columnLayoutSchema = ColumnLayoutInput.optional().describe(
  'Fixed column positions {level2_name, level2_code, level3_name, level3_code}, or "lga_ward_six_column"; omitted means rows are classified by shape'
);

const referenceStatesSchema = z
  .array(z.string().min(1))
  .nullable()
  .optional()
  .describe(
    'Ordered state names; an LGA code dropping back (e.g. 03 then 01) moves to the next state. null disables this, omitted uses the bundled Nigerian list'
  );

export const extractionTools: Record<string, ToolDefinition> = {
  boundary_extract_pdf: {
    description:
      '[CORE] Use to extract the state → LGA → ward hierarchy from a boundary PDF. Saves to the selected database and writes a JSON export by default. Returns counts, diagnostics and file paths.',
    inputSchema: {
      file_path: z.string().min(1).describe('Absolute path to the PDF'),
      save_to_db: z.boolean().default(true).describe('Save into the selected database'),
      save_to_json: z.boolean().default(true).describe('Write a JSON export file'),
      output_dir: z.string().optional().describe('Directory for the JSON export (default: config output_dir)'),
      column_layout: columnLayoutSchema,
      reference_states: referenceStatesSchema,
      include_document: z.boolean().default(false).describe('Include the full hierarchy in the response'),
    },
    handler: handleExtractPdf,
  },
  boundary_extract_pages: {
    description:
      '[CORE] Use when tables were already extracted elsewhere. Takes pages as {tables: (string|null)[][][], text} and runs the same hierarchy extraction.',
    inputSchema: {
      pages: z
        .array(
          z.object({
            tables: z.array(z.array(z.array(z.string().nullable()))).default([]),
            text: z.string().default(''),
          })
        )
        .min(1)
        .describe('Pages in document order'),
      filename: z.string().optional().describe('Name recorded in the extraction log'),
      save_to_db: z.boolean().default(false).describe('Save into the selected database'),
      save_to_json: z.boolean().default(false).describe('Write a JSON export file'),
      output_dir: z.string().optional().describe('Directory for the JSON export'),
      column_layout: columnLayoutSchema,
      reference_states: referenceStatesSchema,
      include_document: z.boolean().default(true).describe('Include the full hierarchy in the response'),
    },
    handler: handleExtractPages,
  },
  boundary_extraction_logs: {
    description:
      '[STATUS] Use to review past extraction runs in the selected database: file, status, counts, diagnostics and errors. Newest first.',
    inputSchema: {
      limit: z.number().int().min(1).max(500).default(20).describe('Maximum logs to return'),
    },
    handler: handleExtractionLogs,
  },
};
