/**
 * State / LGA / ward operations for DatabaseService
 *
 * Saving is insert-or-ignore against what earlier runs stored: an entity
 * already present (same state name; same LGA name in the state; same ward
 * name in the LGA) is reused and not counted as created.
 */

import type Database from 'better-sqlite3';
import type { ExtractedDocument } from '../../../models/hierarchy.js';
import { generateCode } from '../../extraction/normalize.js';
import { escapeLikePattern } from '../../../utils/validation.js';
import {
  CreatedCounts,
  DatabaseError,
  DatabaseErrorCode,
  ExportData,
  LgaWithCount,
  LgaWithState,
  SearchResults,
  SearchType,
  StateRow,
  StateWithCount,
  WardRow,
} from './types.js';

/** Results per entity type returned by search */
export const SEARCH_LIMIT_PER_TYPE = 20;

// ═══════════════════════════════════════════════════════════════════════════════
// WRITE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Persist the populated part of a document. Caller wraps this in a transaction.
 * Level1 entries without any Level2 are not stored.
 */
export function saveHierarchy(db: Database.Database, document: ExtractedDocument): CreatedCounts {
  const now = new Date().toISOString();
  const counts: CreatedCounts = { states_created: 0, lgas_created: 0, wards_created: 0 };

  const insertState = db.prepare<[string, string, string, string]>(
    'INSERT OR IGNORE INTO states (state_name, state_code, created_at, updated_at) VALUES (?, ?, ?, ?)'
  );
  const selectState = db.prepare<[string], { id: number }>(
    'SELECT id FROM states WHERE state_name = ?'
  );
  const insertLga = db.prepare<[string, string, number, string, string]>(
    'INSERT OR IGNORE INTO lgas (lga_name, lga_code, state_id, created_at, updated_at) VALUES (?, ?, ?, ?, ?)'
  );
  const selectLga = db.prepare<[string, number], { id: number }>(
    'SELECT id FROM lgas WHERE lga_name = ? AND state_id = ?'
  );
  const insertWard = db.prepare<[string, string, number, string, string]>(
    'INSERT OR IGNORE INTO wards (ward_name, ward_code, lga_id, created_at, updated_at) VALUES (?, ?, ?, ?, ?)'
  );

  for (const level1 of document.level1) {
    if (level1.level2.length === 0) {
      continue;
    }
    counts.states_created += insertState.run(level1.name, generateCode(level1.name), now, now).changes;
    const state = selectState.get(level1.name);
    if (!state) {
      throw new DatabaseError(
        `State "${level1.name}" missing after insert`,
        DatabaseErrorCode.STATE_NOT_FOUND
      );
    }

    for (const level2 of level1.level2) {
      counts.lgas_created += insertLga.run(level2.name, level2.code, state.id, now, now).changes;
      const lga = selectLga.get(level2.name, state.id);
      if (!lga) {
        throw new DatabaseError(
          `LGA "${level2.name}" missing after insert`,
          DatabaseErrorCode.LGA_NOT_FOUND
        );
      }

      for (const level3 of level2.level3) {
        counts.wards_created += insertWard.run(level3.name, level3.code, lga.id, now, now).changes;
      }
    }
  }

  return counts;
}

// ═══════════════════════════════════════════════════════════════════════════════
// READ
// ═══════════════════════════════════════════════════════════════════════════════

export function listStates(db: Database.Database): StateWithCount[] {
  return db
    .prepare<[], StateWithCount>(
      `
    SELECT s.*, (SELECT COUNT(*) FROM lgas WHERE state_id = s.id) AS lga_count
    FROM states s
    ORDER BY s.state_name
  `
    )
    .all();
}

export function getState(db: Database.Database, id: number): StateRow | null {
  return db.prepare<[number], StateRow>('SELECT * FROM states WHERE id = ?').get(id) ?? null;
}

export function getStateByName(db: Database.Database, name: string): StateRow | null {
  return (
    db.prepare<[string], StateRow>('SELECT * FROM states WHERE state_name = ?').get(name) ?? null
  );
}

export function listLgasByState(db: Database.Database, stateId: number): LgaWithCount[] {
  return db
    .prepare<[number], LgaWithCount>(
      `
    SELECT l.*, (SELECT COUNT(*) FROM wards WHERE lga_id = l.id) AS ward_count
    FROM lgas l
    WHERE l.state_id = ?
    ORDER BY l.lga_name
  `
    )
    .all(stateId);
}

export function getLga(db: Database.Database, id: number): LgaWithState | null {
  return (
    db
      .prepare<[number], LgaWithState>(
        `
    SELECT l.*, s.state_name
    FROM lgas l JOIN states s ON l.state_id = s.id
    WHERE l.id = ?
  `
      )
      .get(id) ?? null
  );
}

export function listWardsByLga(db: Database.Database, lgaId: number): WardRow[] {
  return db
    .prepare<[number], WardRow>('SELECT * FROM wards WHERE lga_id = ? ORDER BY ward_name')
    .all(lgaId);
}

function likePattern(query: string): string {
  return `%${escapeLikePattern(query)}%`;
}

/**
 * Case-insensitive substring search by name
 */
export function search(
  db: Database.Database,
  query: string,
  type: SearchType = 'all',
  limit: number = SEARCH_LIMIT_PER_TYPE
): SearchResults {
  const pattern = likePattern(query);
  const results: SearchResults = { states: [], lgas: [], wards: [] };

  if (type === 'all' || type === 'state') {
    results.states = db
      .prepare<[string, number], SearchResults['states'][number]>(
        `
      SELECT id, state_name AS name, state_code AS code
      FROM states
      WHERE state_name LIKE ? ESCAPE '\\'
      ORDER BY state_name
      LIMIT ?
    `
      )
      .all(pattern, limit);
  }

  if (type === 'all' || type === 'lga') {
    results.lgas = db
      .prepare<[string, number], SearchResults['lgas'][number]>(
        `
      SELECT l.id, l.lga_name AS name, l.lga_code AS code, s.state_name AS state
      FROM lgas l JOIN states s ON l.state_id = s.id
      WHERE l.lga_name LIKE ? ESCAPE '\\'
      ORDER BY l.lga_name
      LIMIT ?
    `
      )
      .all(pattern, limit);
  }

  if (type === 'all' || type === 'ward') {
    results.wards = db
      .prepare<[string, number], SearchResults['wards'][number]>(
        `
      SELECT w.id, w.ward_name AS name, w.ward_code AS code, l.lga_name AS lga, s.state_name AS state
      FROM wards w
      JOIN lgas l ON w.lga_id = l.id
      JOIN states s ON l.state_id = s.id
      WHERE w.ward_name LIKE ? ESCAPE '\\'
      ORDER BY w.ward_name
      LIMIT ?
    `
      )
      .all(pattern, limit);
  }

  return results;
}

/**
 * Whole stored hierarchy, every level ordered by name
 */
export function exportAll(db: Database.Database): ExportData {
  const states = db
    .prepare<[], StateRow>('SELECT * FROM states ORDER BY state_name')
    .all();
  const lgasByState = db.prepare<[number], { id: number; lga_name: string; lga_code: string }>(
    'SELECT id, lga_name, lga_code FROM lgas WHERE state_id = ? ORDER BY lga_name'
  );
  const wardsByLga = db.prepare<[number], { ward_name: string; ward_code: string }>(
    'SELECT ward_name, ward_code FROM wards WHERE lga_id = ? ORDER BY ward_name'
  );

  return {
    export_time: new Date().toISOString(),
    states: states.map((state) => ({
      name: state.state_name,
      code: state.state_code,
      lgas: lgasByState.all(state.id).map((lga) => ({
        name: lga.lga_name,
        code: lga.lga_code,
        wards: wardsByLga.all(lga.id).map((ward) => ({
          name: ward.ward_name,
          code: ward.ward_code,
        })),
      })),
    })),
  };
}
