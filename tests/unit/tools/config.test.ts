/**
 * Unit Tests for Config MCP Tools
 *
 * Tests the config tool handlers in src/tools/config.ts
 * Tools: handleConfigGet, handleConfigSet
 *
 * NO MOCK DATA - Uses real state configuration.
 * FAIL FAST - Tests verify errors surface immediately with correct error categories.
 *
 * @module tests/unit/tools/config
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { handleConfigGet, handleConfigSet, configTools } from '../../../src/tools/config.js';
import {
  state,
  resetState,
  updateConfig,
  getConfig,
  clearDatabase,
  createDatabase,
  selectDatabase,
  resetConfig,
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

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL EXPORTS VERIFICATION
// ═══════════════════════════════════════════════════════════════════════════════

describe('configTools exports', () => {
  it('exports all 2 config tools', () => {
    expect(Object.keys(configTools)).toHaveLength(2);
    expect(configTools).toHaveProperty('boundary_config_get');
    expect(configTools).toHaveProperty('boundary_config_set');
  });

  it('each tool has description, inputSchema, and handler', () => {
    for (const [name, tool] of Object.entries(configTools)) {
      expect(typeof tool.description, `${name} missing description`).toBe('string');
      expect(tool.inputSchema, `${name} missing inputSchema`).toBeDefined();
      expect(typeof tool.handler).toBe('function');
    }
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// handleConfigGet TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('handleConfigGet', () => {
  beforeEach(() => {
    resetState();
  });

  afterEach(() => {
    clearDatabase();
    resetState();
  });

  it('returns all config when no key specified', async () => {
    const result = parseResponse(await handleConfigGet({}));

    expect(result.success).toBe(true);
    expect(result.data).toMatchObject({
      max_file_size_mb: 50,
      preseed_first_reference: true,
      accept_unlisted_banners: false,
      banner_position: 'after_tables',
      header_min_matches: 2,
      banner_min_length: 3,
      banner_max_length: 40,
      code_max_length: 5,
      output_dir: getConfig().outputDir,
      storage_path: getConfig().defaultStoragePath,
      current_database: null,
      hash_algorithm: 'sha256',
    });
  });

  it('returns a single key', async () => {
    updateConfig({ codeMaxLength: 3 });
    const result = parseResponse(await handleConfigGet({ key: 'code_max_length' }));

    expect(result.success).toBe(true);
    expect(result.data?.key).toBe('code_max_length');
    expect(result.data?.value).toBe(3);
  });

  it('rejects an unknown key', async () => {
    const result = parseResponse(await handleConfigGet({ key: 'chunk_size' }));

    expect(result.success).toBe(false);
    expect(result.error?.category).toBe('VALIDATION_ERROR');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// handleConfigSet TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('handleConfigSet', () => {
  let tempDir: string;

  beforeEach(() => {
    resetState();
    tempDir = mkdtempSync(join(tmpdir(), 'boundary-tools-'));
    updateConfig({ defaultStoragePath: tempDir });
  });

  afterEach(() => {
    clearDatabase(true);
    resetState();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('updates the in-memory config without a database', async () => {
    const result = parseResponse(
      await handleConfigSet({ key: 'banner_position', value: 'before_tables' })
    );

    expect(result.success).toBe(true);
    expect(result.data).toMatchObject({
      key: 'banner_position',
      value: 'before_tables',
      updated: true,
      persisted: false,
    });
    expect(getConfig().bannerPosition).toBe('before_tables');
  });

  it('rejects a value of the wrong type', async () => {
    const result = parseResponse(
      await handleConfigSet({ key: 'header_min_matches', value: 'two' })
    );

    expect(result.success).toBe(false);
    expect(result.error?.category).toBe('VALIDATION_ERROR');
    expect(getConfig().headerMinMatches).toBe(2);
  });

  it('rejects an unknown banner position', async () => {
    const result = parseResponse(await handleConfigSet({ key: 'banner_position', value: 'middle' }));

    expect(result.success).toBe(false);
    expect(result.error?.category).toBe('VALIDATION_ERROR');
  });

  it('rejects a banner minimum above the maximum', async () => {
    const result = parseResponse(await handleConfigSet({ key: 'banner_min_length', value: 41 }));

    expect(result.success).toBe(false);
    expect(result.error?.category).toBe('VALIDATION_ERROR');
    expect(result.error?.message).toBe(
      'banner_min_length (41) must not exceed banner_max_length (40)'
    );
    expect(getConfig().bannerMinLength).toBe(3);
  });

  it('persists into the selected database and restores on select', async () => {
    createDatabase('tools-config');

    const result = parseResponse(await handleConfigSet({ key: 'code_max_length', value: 4 }));
    expect(result.success).toBe(true);
    expect(result.data?.persisted).toBe(true);

    clearDatabase();
    resetConfig();
    updateConfig({ defaultStoragePath: tempDir });
    expect(getConfig().codeMaxLength).toBe(5);

    selectDatabase('tools-config');
    expect(state.currentDatabaseName).toBe('tools-config');
    expect(getConfig().codeMaxLength).toBe(4);
  });
});
