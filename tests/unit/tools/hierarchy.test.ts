/**
 * Unit Tests for Hierarchy Browsing MCP Tools
 *
 * Tools: boundary_state_list, boundary_lga_list, boundary_ward_list,
 *        boundary_search, boundary_export
 *
 * The database is filled through boundary_extract_pages so the browsing
 * tools read what an extraction actually stores.
 *
 * @module tests/unit/tools/hierarchy
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  handleExport,
  handleLgaList,
  handleSearch,
  handleStateList,
  handleWardList,
  hierarchyTools,
} from '../../../src/tools/hierarchy.js';
import { handleExtractPages } from '../../../src/tools/extraction.js';
import {
  clearDatabase,
  createDatabase,
  requireDatabase,
  resetState,
  updateConfig,
} from '../../../src/server/state.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

interface ToolResponse {
  success: boolean;
  data?: Record<string, unknown>;
  error?: {
    category: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

function parseResponse(response: { content: Array<{ type: string; text: string }> }): ToolResponse {
  return JSON.parse(response.content[0].text);
}

async function seedHierarchy(): Promise<void> {
  const response = parseResponse(
    await handleExtractPages({
      pages: [
        {
          tables: [
            [
              ['Aba North', '01', 'Ariaria', '', '', '001'],
              [null, null, 'Eziama', '', '', '002'],
              ['Aba South', '02', 'Asa', '', '', '001'],
              ['Bende', '01', 'Umuola', '', '', '001'],
            ],
          ],
        },
      ],
      reference_states: ['ALPHA', 'BETA'],
      save_to_db: true,
      include_document: false,
    })
  );
  expect(response.success).toBe(true);
}

function stateId(name: string): number {
  const row = requireDatabase()
    .db.listStates()
    .find((s) => s.state_name === name);
  if (!row) throw new Error(`state ${name} not seeded`);
  return row.id;
}

function lgaId(stateName: string, lgaName: string): number {
  const row = requireDatabase()
    .db.listLgasByState(stateId(stateName))
    .find((l) => l.lga_name === lgaName);
  if (!row) throw new Error(`LGA ${lgaName} not seeded`);
  return row.id;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL EXPORTS VERIFICATION
// ═══════════════════════════════════════════════════════════════════════════════

describe('hierarchyTools exports', () => {
  it('exports the 5 browsing tools', () => {
    expect(Object.keys(hierarchyTools).sort()).toEqual([
      'boundary_export',
      'boundary_lga_list',
      'boundary_search',
      'boundary_state_list',
      'boundary_ward_list',
    ]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('hierarchy tool handlers', () => {
  let tempDir: string;

  beforeEach(() => {
    resetState();
    tempDir = mkdtempSync(join(tmpdir(), 'boundary-export-'));
    updateConfig({ defaultStoragePath: tempDir });
  });

  afterEach(() => {
    clearDatabase(true);
    resetState();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('requires a selected database', async () => {
    const result = parseResponse(await handleStateList({}));

    expect(result.success).toBe(false);
    expect(result.error?.category).toBe('DATABASE_NOT_SELECTED');
  });

  describe('handleStateList', () => {
    it('suggests extracting when the database is empty', async () => {
      createDatabase('hierarchy');
      const result = parseResponse(await handleStateList({}));

      expect(result.success).toBe(true);
      expect(result.data?.total).toBe(0);
      expect(result.data?.next_steps).toContainEqual({
        tool: 'boundary_extract_pdf',
        description: 'Extract a boundary PDF first',
      });
    });

    it('lists states by name with LGA counts', async () => {
      createDatabase('hierarchy');
      await seedHierarchy();

      const result = parseResponse(await handleStateList({}));

      expect(result.data?.total).toBe(2);
      expect(result.data?.states).toEqual([
        expect.objectContaining({ state_name: 'ALPHA', state_code: 'A', lga_count: 2 }),
        expect.objectContaining({ state_name: 'BETA', state_code: 'B', lga_count: 1 }),
      ]);
    });
  });

  describe('handleLgaList', () => {
    it('lists the LGAs of a state with ward counts', async () => {
      createDatabase('hierarchy');
      await seedHierarchy();
      const id = stateId('ALPHA');

      const result = parseResponse(await handleLgaList({ state_id: id }));

      expect(result.success).toBe(true);
      expect(result.data?.state).toEqual({ id, name: 'ALPHA', code: 'A' });
      expect(result.data?.lgas).toEqual([
        expect.objectContaining({ lga_name: 'ABA NORTH', lga_code: '01', ward_count: 2 }),
        expect.objectContaining({ lga_name: 'ABA SOUTH', lga_code: '02', ward_count: 1 }),
      ]);
    });

    it('reports an unknown state id', async () => {
      createDatabase('hierarchy');
      const result = parseResponse(await handleLgaList({ state_id: 999 }));

      expect(result.success).toBe(false);
      expect(result.error?.category).toBe('STATE_NOT_FOUND');
    });

    it('rejects a non-positive id', async () => {
      createDatabase('hierarchy');
      const result = parseResponse(await handleLgaList({ state_id: 0 }));

      expect(result.success).toBe(false);
      expect(result.error?.category).toBe('VALIDATION_ERROR');
    });
  });

  describe('handleWardList', () => {
    it('lists the wards of an LGA', async () => {
      createDatabase('hierarchy');
      await seedHierarchy();
      const id = lgaId('ALPHA', 'ABA NORTH');

      const result = parseResponse(await handleWardList({ lga_id: id }));

      expect(result.success).toBe(true);
      expect(result.data?.lga).toMatchObject({
        id,
        name: 'ABA NORTH',
        code: '01',
        state_name: 'ALPHA',
      });
      expect(result.data?.wards).toEqual([
        expect.objectContaining({ ward_name: 'ARIARIA', ward_code: '001' }),
        expect.objectContaining({ ward_name: 'EZIAMA', ward_code: '002' }),
      ]);
    });

    it('reports an unknown LGA id', async () => {
      createDatabase('hierarchy');
      const result = parseResponse(await handleWardList({ lga_id: 999 }));

      expect(result.success).toBe(false);
      expect(result.error?.category).toBe('LGA_NOT_FOUND');
      expect(result.error?.message).toBe(
        'LGA not found: 999. Use boundary_lga_list to browse LGAs of a state.'
      );
    });
  });

  describe('handleSearch', () => {
    it('finds LGAs with their state', async () => {
      createDatabase('hierarchy');
      await seedHierarchy();

      const result = parseResponse(await handleSearch({ query: 'aba', type: 'lga' }));

      expect(result.success).toBe(true);
      expect(result.data?.total).toBe(2);
      expect(result.data?.lgas).toEqual([
        expect.objectContaining({ name: 'ABA NORTH', code: '01', state: 'ALPHA' }),
        expect.objectContaining({ name: 'ABA SOUTH', code: '02', state: 'ALPHA' }),
      ]);
      expect(result.data?.states).toEqual([]);
      expect(result.data?.wards).toEqual([]);
    });

    it('finds wards with their LGA and state', async () => {
      createDatabase('hierarchy');
      await seedHierarchy();

      const result = parseResponse(await handleSearch({ query: 'umuo', type: 'ward' }));

      expect(result.data?.wards).toEqual([
        expect.objectContaining({ name: 'UMUOLA', code: '001', lga: 'BENDE', state: 'BETA' }),
      ]);
    });

    it('rejects a one-character query', async () => {
      createDatabase('hierarchy');
      const result = parseResponse(await handleSearch({ query: 'a' }));

      expect(result.success).toBe(false);
      expect(result.error?.category).toBe('VALIDATION_ERROR');
    });
  });

  describe('handleExport', () => {
    it('returns the nested hierarchy inline', async () => {
      createDatabase('hierarchy');
      await seedHierarchy();

      const result = parseResponse(await handleExport({}));

      expect(result.success).toBe(true);
      expect(result.data?.state_count).toBe(2);
      expect(result.data?.states).toEqual([
        {
          name: 'ALPHA',
          code: 'A',
          lgas: [
            {
              name: 'ABA NORTH',
              code: '01',
              wards: [
                { name: 'ARIARIA', code: '001' },
                { name: 'EZIAMA', code: '002' },
              ],
            },
            { name: 'ABA SOUTH', code: '02', wards: [{ name: 'ASA', code: '001' }] },
          ],
        },
        {
          name: 'BETA',
          code: 'B',
          lgas: [{ name: 'BENDE', code: '01', wards: [{ name: 'UMUOLA', code: '001' }] }],
        },
      ]);
    });

    it('writes the hierarchy to output_path', async () => {
      createDatabase('hierarchy');
      await seedHierarchy();
      const target = join(tempDir, 'nested', 'export.json');

      const result = parseResponse(await handleExport({ output_path: target }));

      expect(result.success).toBe(true);
      expect(result.data).toMatchObject({ output_path: target, state_count: 2 });
      expect(existsSync(target)).toBe(true);

      const written = JSON.parse(readFileSync(target, 'utf-8'));
      expect(written.states).toHaveLength(2);
      expect(written.states[1].lgas[0].wards).toEqual([{ name: 'UMUOLA', code: '001' }]);
    });
  });
});
