/**
 * Hierarchy Browsing MCP Tools
 *
 * Tools: boundary_state_list, boundary_lga_list, boundary_ward_list,
 * boundary_search, boundary_export
 *
 * All tools read the selected database.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/hierarchy
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { requireDatabase } from '../server/state.js';
import { successResult } from '../server/types.js';
import { lgaNotFoundError, stateNotFoundError } from '../server/errors.js';
import {
  validateInput,
  sanitizePath,
  StateListInput,
  LgaListInput,
  WardListInput,
  SearchInput,
  ExportInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HIERARCHY TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle boundary_state_list - All states, ordered by name, with LGA counts
 */
export async function handleStateList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(StateListInput, params);
    const { db } = requireDatabase();
    const states = db.listStates();

    return formatResponse(
      successResult({
        states,
        total: states.length,
        next_steps: [
          { tool: 'boundary_lga_list', description: 'List the LGAs of a state (by state_id)' },
          ...(states.length === 0
            ? [{ tool: 'boundary_extract_pdf', description: 'Extract a boundary PDF first' }]
            : []),
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle boundary_lga_list - LGAs of one state with ward counts
 */
export async function handleLgaList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(LgaListInput, params);
    const { db } = requireDatabase();

    const state = db.getState(input.state_id);
    if (!state) {
      throw stateNotFoundError(input.state_id);
    }
    const lgas = db.listLgasByState(state.id);

    return formatResponse(
      successResult({
        state: { id: state.id, name: state.state_name, code: state.state_code },
        lgas,
        total: lgas.length,
        next_steps: [
          { tool: 'boundary_ward_list', description: 'List the wards of an LGA (by lga_id)' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle boundary_ward_list - Wards of one LGA
 */
export async function handleWardList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(WardListInput, params);
    const { db } = requireDatabase();

    const lga = db.getLga(input.lga_id);
    if (!lga) {
      throw lgaNotFoundError(input.lga_id);
    }
    const wards = db.listWardsByLga(lga.id);

    return formatResponse(
      successResult({
        lga: {
          id: lga.id,
          name: lga.lga_name,
          code: lga.lga_code,
          state_id: lga.state_id,
          state_name: lga.state_name,
        },
        wards,
        total: wards.length,
        next_steps: [
          { tool: 'boundary_lga_list', description: 'Back to the LGAs of this state' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle boundary_search - Substring search on state, LGA and ward names
 */
export async function handleSearch(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(SearchInput, params);
    const { db } = requireDatabase();
    const results = db.search(input.query, input.type);

    return formatResponse(
      successResult({
        query: input.query,
        type: input.type,
        ...results,
        total: results.states.length + results.lgas.length + results.wards.length,
        next_steps: [
          { tool: 'boundary_lga_list', description: 'Open a matched state by its id' },
          { tool: 'boundary_ward_list', description: 'Open a matched LGA by its id' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle boundary_export - Whole hierarchy, inline or written to a JSON file
 */
export async function handleExport(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ExportInput, params);
    const { db } = requireDatabase();
    const data = db.exportAll();

    if (input.output_path) {
      const target = sanitizePath(input.output_path);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, JSON.stringify(data, null, 2), 'utf-8');
      console.error(`[INFO] Exported ${data.states.length} state(s) to ${target}`);

      return formatResponse(
        successResult({
          output_path: target,
          export_time: data.export_time,
          state_count: data.states.length,
          next_steps: [{ tool: 'boundary_db_stats', description: 'Check database totals' }],
        })
      );
    }

    return formatResponse(successResult({ ...data, state_count: data.states.length }));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const hierarchyTools: Record<string, ToolDefinition> = {
  boundary_state_list: {
    description:
      '[BROWSE] Use to list every state in the selected database with its LGA count, ordered by name.',
    inputSchema: {},
    handler: handleStateList,
  },
  boundary_lga_list: {
    description: '[BROWSE] Use to list the LGAs of a state with their codes and ward counts.',
    inputSchema: {
      state_id: z.number().int().positive().describe('State id from boundary_state_list'),
    },
    handler: handleLgaList,
  },
  boundary_ward_list: {
    description: '[BROWSE] Use to list the wards of an LGA with their codes.',
    inputSchema: {
      lga_id: z.number().int().positive().describe('LGA id from boundary_lga_list'),
    },
    handler: handleWardList,
  },
  boundary_search: {
    description:
      '[SEARCH] Use to find states, LGAs or wards by name (case-insensitive substring, up to 20 per type). LGA hits include their state; ward hits their LGA and state.',
    inputSchema: {
      query: z.string().min(2).describe('At least 2 characters'),
      type: z.enum(['all', 'state', 'lga', 'ward']).default('all').describe('Entity type to search'),
    },
    handler: handleSearch,
  },
  boundary_export: {
    description:
      '[EXPORT] Use to export the full state → LGA → ward hierarchy of the selected database as JSON, inline or to output_path.',
    inputSchema: {
      output_path: z.string().optional().describe('JSON file to write instead of returning inline'),
    },
    handler: handleExport,
  },
};
