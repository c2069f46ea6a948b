/**
 * Unit tests for MCP Server State Management
 *
 * Tests database selection, operation tracking and configuration, including
 * config persisted into a database and restored when it is selected again.
 * Uses REAL DatabaseService instances with temporary databases - NO MOCKS.
 *
 * @module tests/unit/server/state
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  state,
  requireDatabase,
  hasDatabase,
  selectDatabase,
  createDatabase,
  deleteDatabase,
  clearDatabase,
  getConfig,
  updateConfig,
  resetConfig,
  resetState,
  configUpdateFor,
  configValueFor,
  withDatabaseOperation,
  getActiveOperationCount,
} from '../../../src/server/state.js';
import { MCPError } from '../../../src/server/errors.js';
import { ValidationError } from '../../../src/utils/validation.js';
import { persistConfigValue } from '../../../src/utils/config-persistence.js';

describe('Server State', () => {
  let tempDir: string;

  beforeEach(() => {
    resetState();
    tempDir = mkdtempSync(join(tmpdir(), 'boundary-state-'));
    updateConfig({ defaultStoragePath: tempDir });
  });

  afterEach(() => {
    resetState();
    rmSync(tempDir, { recursive: true, force: true });
  });

  // ═════════════════════════════════════════════════════════════════════════════
  // DATABASE SELECTION
  // ═════════════════════════════════════════════════════════════════════════════

  describe('database selection', () => {
    it('requireDatabase fails fast without a selection', () => {
      expect(hasDatabase()).toBe(false);
      try {
        requireDatabase();
        expect.unreachable('requireDatabase should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(MCPError);
        expect(error).toHaveProperty('category', 'DATABASE_NOT_SELECTED');
      }
    });

    it('createDatabase selects the new database', () => {
      createDatabase('fresh');

      expect(hasDatabase()).toBe(true);
      expect(state.currentDatabaseName).toBe('fresh');
      expect(requireDatabase().db.getName()).toBe('fresh');
    });

    it('createDatabase rejects an existing name', () => {
      createDatabase('dup');
      expect(() => createDatabase('dup')).toThrow('Database "dup" already exists');
    });

    it('selectDatabase switches between databases', () => {
      createDatabase('first');
      createDatabase('second');
      selectDatabase('first');

      expect(state.currentDatabaseName).toBe('first');
    });

    it('selectDatabase reports unknown names', () => {
      try {
        selectDatabase('nowhere');
        expect.unreachable('selectDatabase should throw');
      } catch (error) {
        expect(error).toHaveProperty('category', 'DATABASE_NOT_FOUND');
      }
    });

    it('deleteDatabase clears the selection when deleting the current one', () => {
      createDatabase('current');
      deleteDatabase('current');

      expect(hasDatabase()).toBe(false);
      expect(state.currentDatabaseName).toBeNull();
    });
  });

  // ═════════════════════════════════════════════════════════════════════════════
  // OPERATION TRACKING
  // ═════════════════════════════════════════════════════════════════════════════

  describe('withDatabaseOperation', () => {
    it('blocks switching while an operation is in flight', async () => {
      createDatabase('busy');
      createDatabase('other');

      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const operation = withDatabaseOperation(async ({ db }) => {
        await gate;
        return db.getName();
      });

      expect(getActiveOperationCount()).toBe(1);
      expect(() => selectDatabase('busy')).toThrow('Cannot switch databases while 1 operation(s)');
      expect(() => clearDatabase()).toThrow('Cannot clear database while 1 operation(s)');

      release();
      await expect(operation).resolves.toBe('other');
      expect(getActiveOperationCount()).toBe(0);
    });

    it('rejects results from a database that was switched underneath', async () => {
      createDatabase('switched');

      await expect(
        withDatabaseOperation(async () => {
          clearDatabase(true);
          return 1;
        })
      ).rejects.toThrow('Database generation mismatch');
      expect(getActiveOperationCount()).toBe(0);
    });

    it('fails fast without a selection', async () => {
      await expect(withDatabaseOperation(async () => 1)).rejects.toBeInstanceOf(MCPError);
    });
  });

  // ═════════════════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═════════════════════════════════════════════════════════════════════════════

  describe('configuration', () => {
    it('starts from the defaults', () => {
      const config = getConfig();
      expect(config.maxFileSizeMb).toBe(50);
      expect(config.preseedFirstReference).toBe(true);
      expect(config.acceptUnlistedBanners).toBe(false);
      expect(config.bannerPosition).toBe('after_tables');
      expect(config.headerMinMatches).toBe(2);
      expect(config.bannerMinLength).toBe(3);
      expect(config.bannerMaxLength).toBe(40);
      expect(config.codeMaxLength).toBe(5);
    });

    it('getConfig returns a copy', () => {
      const config = getConfig();
      config.maxFileSizeMb = 1;
      expect(getConfig().maxFileSizeMb).toBe(50);
    });

    it('configUpdateFor validates values per key', () => {
      expect(configUpdateFor('banner_position', 'before_tables')).toEqual({
        bannerPosition: 'before_tables',
      });
      expect(() => configUpdateFor('banner_position', 'middle')).toThrow(ValidationError);
      expect(() => configUpdateFor('max_file_size_mb', -1)).toThrow(ValidationError);
      expect(() => configUpdateFor('preseed_first_reference', 'yes')).toThrow(ValidationError);
    });

    it('configValueFor reads the current value', () => {
      updateConfig({ codeMaxLength: 7 });
      expect(configValueFor('code_max_length')).toBe(7);
      resetConfig();
      expect(configValueFor('code_max_length')).toBe(5);
    });

    it('restores valid persisted values on select and skips the rest', () => {
      const db = createDatabase('persisted');
      const conn = db.getConnection();
      persistConfigValue(conn, 'banner_position', 'before_tables');
      persistConfigValue(conn, 'header_min_matches', 0);
      persistConfigValue(conn, 'retired_key', true);

      selectDatabase('persisted', tempDir);

      expect(getConfig().bannerPosition).toBe('before_tables');
      expect(getConfig().headerMinMatches).toBe(2);
    });
  });
});
