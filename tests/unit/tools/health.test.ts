/**
 * Unit Tests for the Health Check MCP Tool
 *
 * @module tests/unit/tools/health
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { handleHealthCheck, healthTools } from '../../../src/tools/health.js';
import { handleExtractPages } from '../../../src/tools/extraction.js';
import {
  clearDatabase,
  createDatabase,
  requireDatabase,
  resetState,
  updateConfig,
} from '../../../src/server/state.js';

interface ToolResponse {
  success: boolean;
  data?: Record<string, unknown>;
  error?: { category: string; message: string };
}

function parseResponse(response: { content: Array<{ type: string; text: string }> }): ToolResponse {
  return JSON.parse(response.content[0].text);
}

describe('healthTools exports', () => {
  it('exports boundary_health_check', () => {
    expect(Object.keys(healthTools)).toEqual(['boundary_health_check']);
  });
});

describe('handleHealthCheck', () => {
  let tempDir: string;

  beforeEach(() => {
    resetState();
    tempDir = mkdtempSync(join(tmpdir(), 'boundary-tools-'));
    updateConfig({ defaultStoragePath: tempDir, outputDir: join(tempDir, 'exports') });
  });

  afterEach(() => {
    clearDatabase(true);
    resetState();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('reports runtime and environment without a database', async () => {
    const result = parseResponse(await handleHealthCheck({}));

    expect(result.success).toBe(true);
    expect(result.data).toMatchObject({
      healthy: true,
      database_selected: false,
      environment: {
        databases_path: tempDir,
        output_dir: join(tempDir, 'exports'),
        reference_states: 37,
      },
    });
    expect(result.data?.runtime).toMatchObject({ node_version: process.version });
  });

  it('reports schema state and no gaps after a clean extraction', async () => {
    createDatabase('health');
    const extracted = parseResponse(
      await handleExtractPages({
        pages: [{ tables: [[['Aba North', '01', 'Ariaria', '', '', '001']]] }],
        reference_states: ['ALPHA'],
        save_to_db: true,
      })
    );
    expect(extracted.success).toBe(true);

    const result = parseResponse(await handleHealthCheck({}));

    expect(result.success).toBe(true);
    expect(result.data).toMatchObject({
      healthy: true,
      database_selected: true,
      database: {
        name: 'health',
        schema_version: 2,
        expected_schema_version: 2,
        schema_valid: true,
        missing_tables: [],
        state_count: 1,
        lga_count: 1,
        ward_count: 1,
      },
      total_gaps: 0,
    });
  });

  it('counts LGAs without wards and states without LGAs', async () => {
    createDatabase('health');
    const conn = requireDatabase().db.getConnection();
    const now = new Date().toISOString();
    conn
      .prepare(
        'INSERT INTO states (state_name, state_code, created_at, updated_at) VALUES (?, ?, ?, ?)'
      )
      .run('GAMMA', 'G', now, now);
    conn
      .prepare(
        'INSERT INTO states (state_name, state_code, created_at, updated_at) VALUES (?, ?, ?, ?)'
      )
      .run('DELTA', 'D', now, now);
    conn
      .prepare(
        `INSERT INTO lgas (lga_name, lga_code, state_id, created_at, updated_at)
         VALUES (?, ?, (SELECT id FROM states WHERE state_name = ?), ?, ?)`
      )
      .run('IKOT', '01', 'GAMMA', now, now);

    const result = parseResponse(await handleHealthCheck({}));

    expect(result.data?.total_gaps).toBe(2);
    expect(result.data?.gaps).toMatchObject({
      states_without_lgas: { count: 1, samples: ['DELTA'] },
      lgas_without_wards: { count: 1, samples: ['GAMMA / IKOT'] },
      stale_extraction_runs: { count: 0, samples: [] },
    });
    expect(result.data?.next_steps).toContainEqual({
      tool: 'boundary_extraction_logs',
      description: 'Inspect runs behind the gaps',
    });
  });
});
