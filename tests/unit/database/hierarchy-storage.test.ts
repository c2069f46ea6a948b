/**
 * Unit tests for DatabaseService hierarchy storage
 *
 * Uses REAL DatabaseService instances with temporary databases - NO MOCKS.
 *
 * @module tests/unit/database/hierarchy-storage
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { DatabaseService } from '../../../src/services/storage/database/index.js';
import { DatabaseError, DatabaseErrorCode } from '../../../src/services/storage/database/types.js';
import { createDiagnostics, type ExtractedDocument } from '../../../src/models/hierarchy.js';

const DOCUMENT: ExtractedDocument = {
  level1: [
    {
      name: 'ALPHA',
      level2: [
        {
          name: 'ABA NORTH',
          code: '01',
          level3: [
            { name: 'EZIAMA', code: '002' },
            { name: 'ARIARIA', code: '001' },
          ],
        },
        { name: 'ABA SOUTH', code: '02', level3: [{ name: 'ASA', code: '001' }] },
      ],
    },
    { name: 'BETA', level2: [] },
    {
      name: 'GAMMA',
      level2: [{ name: 'UMU', code: '01', level3: [{ name: 'OGBOR', code: '001' }] }],
    },
  ],
};

describe('DatabaseService hierarchy storage', () => {
  let tempDir: string;
  let db: DatabaseService;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'boundary-db-'));
    db = DatabaseService.create('hierarchy', 'test database', tempDir);
  });

  afterEach(() => {
    db.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  // ═════════════════════════════════════════════════════════════════════════════
  // SAVE
  // ═════════════════════════════════════════════════════════════════════════════

  describe('saveExtraction', () => {
    it('stores populated states and logs the run', () => {
      const diagnostics = { ...createDiagnostics(), pagesProcessed: 3 };
      const result = db.saveExtraction(DOCUMENT, 'sample.pdf', {
        fileHash: 'sha256:abc',
        diagnostics,
      });

      expect(result).toMatchObject({
        status: 'success',
        states_created: 2,
        lgas_created: 3,
        wards_created: 4,
      });

      const log = db.getExtractionLog(result.log_id);
      expect(log).toMatchObject({
        filename: 'sample.pdf',
        file_hash: 'sha256:abc',
        status: 'success',
        total_states_extracted: 2,
        total_lgas_extracted: 3,
        total_wards_extracted: 4,
        error_message: null,
      });
      expect(JSON.parse(log?.diagnostics_json ?? 'null')).toEqual(diagnostics);
      expect(db.getStateByName('BETA')).toBeNull();
    });

    it('counts only newly inserted rows on a repeat save', () => {
      db.saveExtraction(DOCUMENT, 'first.pdf');
      const second = db.saveExtraction(DOCUMENT, 'second.pdf');

      expect(second.states_created).toBe(0);
      expect(second.lgas_created).toBe(0);
      expect(second.wards_created).toBe(0);
      expect(db.getExtractionLogs().map((log) => log.filename)).toEqual(['second.pdf', 'first.pdf']);
    });

    it('keeps one LGA per name within a state', () => {
      const result = db.saveExtraction(
        {
          level1: [
            {
              name: 'ALPHA',
              level2: [
                { name: 'ABA NORTH', code: '01', level3: [{ name: 'ARIARIA', code: '001' }] },
                { name: 'ABA NORTH', code: '05', level3: [{ name: 'OGBOR', code: '001' }] },
              ],
            },
          ],
        },
        'variants.pdf'
      );

      expect(result.lgas_created).toBe(1);
      expect(result.wards_created).toBe(2);
    });

    it('completes a log opened earlier', () => {
      const logId = db.beginExtractionLog('pending.pdf', null);
      expect(db.getExtractionLog(logId)?.status).toBe('in_progress');

      const result = db.saveExtraction(DOCUMENT, 'pending.pdf', { logId });

      expect(result.log_id).toBe(logId);
      expect(db.getExtractionLog(logId)?.status).toBe('success');
      expect(db.getExtractionLogs()).toHaveLength(1);
    });

    it('records failures', () => {
      const logId = db.beginExtractionLog('broken.pdf', null);
      db.failExtractionLog(logId, 'Cannot parse PDF: bad header');

      expect(db.getExtractionLog(logId)).toMatchObject({
        status: 'failed',
        error_message: 'Cannot parse PDF: bad header',
      });
      expect(db.getStats().extractions_by_status).toEqual({
        pending: 0,
        in_progress: 0,
        success: 0,
        failed: 1,
      });
    });
  });

  // ═════════════════════════════════════════════════════════════════════════════
  // READ
  // ═════════════════════════════════════════════════════════════════════════════

  describe('lookups', () => {
    beforeEach(() => {
      db.saveExtraction(DOCUMENT, 'sample.pdf');
    });

    it('lists states by name with LGA counts', () => {
      expect(db.listStates().map((s) => [s.state_name, s.state_code, s.lga_count])).toEqual([
        ['ALPHA', 'A', 2],
        ['GAMMA', 'G', 1],
      ]);
    });

    it('walks state → LGA → ward', () => {
      const alpha = db.getStateByName('ALPHA');
      expect(alpha).not.toBeNull();
      if (!alpha) return;

      const lgas = db.listLgasByState(alpha.id);
      expect(lgas.map((l) => [l.lga_name, l.lga_code, l.ward_count])).toEqual([
        ['ABA NORTH', '01', 2],
        ['ABA SOUTH', '02', 1],
      ]);

      const lga = db.getLga(lgas[0].id);
      expect(lga?.state_name).toBe('ALPHA');
      expect(db.listWardsByLga(lgas[0].id).map((w) => w.ward_name)).toEqual(['ARIARIA', 'EZIAMA']);
    });

    it('returns null for unknown ids', () => {
      expect(db.getState(9999)).toBeNull();
      expect(db.getLga(9999)).toBeNull();
    });

    it('reports counts and averages', () => {
      const stats = db.getStats();
      expect(stats.total_states).toBe(2);
      expect(stats.total_lgas).toBe(3);
      expect(stats.total_wards).toBe(4);
      expect(stats.total_extractions).toBe(1);
      expect(stats.avg_lgas_per_state).toBe(1.5);
      expect(stats.avg_wards_per_lga).toBeCloseTo(4 / 3);
    });
  });

  describe('search', () => {
    beforeEach(() => {
      db.saveExtraction(DOCUMENT, 'sample.pdf');
    });

    it('matches LGA names case-insensitively with their state', () => {
      const results = db.search('aba');
      expect(results.states).toEqual([]);
      expect(results.lgas.map((l) => [l.name, l.code, l.state])).toEqual([
        ['ABA NORTH', '01', 'ALPHA'],
        ['ABA SOUTH', '02', 'ALPHA'],
      ]);
      expect(results.wards).toEqual([]);
    });

    it('restricts to one entity type', () => {
      const results = db.search('ar', 'ward');
      expect(results.states).toEqual([]);
      expect(results.lgas).toEqual([]);
      expect(results.wards.map((w) => [w.name, w.lga, w.state])).toEqual([
        ['ARIARIA', 'ABA NORTH', 'ALPHA'],
      ]);
    });

    it('treats LIKE wildcards literally', () => {
      const results = db.search('a_a');
      expect(results.lgas).toEqual([]);
      expect(results.states).toEqual([]);
    });
  });

  describe('exportAll', () => {
    it('nests the stored hierarchy ordered by name', () => {
      db.saveExtraction(DOCUMENT, 'sample.pdf');
      const data = db.exportAll();

      expect(typeof data.export_time).toBe('string');
      expect(data.states).toEqual([
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
          name: 'GAMMA',
          code: 'G',
          lgas: [{ name: 'UMU', code: '01', wards: [{ name: 'OGBOR', code: '001' }] }],
        },
      ]);
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// LIFECYCLE
// ═══════════════════════════════════════════════════════════════════════════════

describe('DatabaseService lifecycle', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'boundary-db-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function expectDatabaseError(fn: () => unknown, code: DatabaseErrorCode): void {
    try {
      fn();
    } catch (error) {
      expect(error).toBeInstanceOf(DatabaseError);
      expect(error).toHaveProperty('code', code);
      return;
    }
    throw new Error(`Expected DatabaseError ${code}`);
  }

  it('lists databases with metadata counts', () => {
    const db = DatabaseService.create('listed', undefined, tempDir);
    db.saveExtraction(DOCUMENT, 'sample.pdf');
    db.close();

    const list = DatabaseService.list(tempDir);
    expect(list).toHaveLength(1);
    expect(list[0]).toMatchObject({
      name: 'listed',
      total_states: 2,
      total_lgas: 3,
      total_wards: 4,
      total_extractions: 1,
    });
  });

  it('reopens an existing database', () => {
    DatabaseService.create('reopen', undefined, tempDir).close();
    const db = DatabaseService.open('reopen', tempDir);
    expect(db.getName()).toBe('reopen');
    db.close();
  });

  it('rejects duplicate, missing and invalid names', () => {
    DatabaseService.create('taken', undefined, tempDir).close();

    expectDatabaseError(
      () => DatabaseService.create('taken', undefined, tempDir),
      DatabaseErrorCode.DATABASE_ALREADY_EXISTS
    );
    expectDatabaseError(
      () => DatabaseService.open('missing', tempDir),
      DatabaseErrorCode.DATABASE_NOT_FOUND
    );
    expectDatabaseError(
      () => DatabaseService.create('bad name!', undefined, tempDir),
      DatabaseErrorCode.INVALID_NAME
    );
  });

  it('deletes a database file', () => {
    DatabaseService.create('doomed', undefined, tempDir).close();
    expect(DatabaseService.exists('doomed', tempDir)).toBe(true);

    DatabaseService.delete('doomed', tempDir);
    expect(DatabaseService.exists('doomed', tempDir)).toBe(false);
  });
});
