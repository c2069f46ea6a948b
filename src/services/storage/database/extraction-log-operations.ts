/**
 * Extraction log operations for DatabaseService
 *
 * A log row is opened (in_progress) before a save and closed as success or
 * failed, so an interrupted save leaves a visible trace.
 */

import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { ExtractionDiagnostics, ExtractionStatistics } from '../../../models/hierarchy.js';
import type { CreatedCounts, ExtractionLogRow } from './types.js';

export function beginExtractionLog(
  db: Database.Database,
  filename: string,
  fileHash: string | null
): string {
  const id = uuidv4();
  db.prepare<[string, string, string | null, string]>(
    `
    INSERT INTO extraction_logs (id, filename, file_hash, status, created_at)
    VALUES (?, ?, ?, 'in_progress', ?)
  `
  ).run(id, filename, fileHash, new Date().toISOString());
  return id;
}

export function completeExtractionLog(
  db: Database.Database,
  id: string,
  statistics: ExtractionStatistics,
  created: CreatedCounts,
  diagnostics: ExtractionDiagnostics | null
): void {
  db.prepare(
    `
    UPDATE extraction_logs
    SET status = 'success',
        total_states_extracted = ?,
        total_lgas_extracted = ?,
        total_wards_extracted = ?,
        states_created = ?,
        lgas_created = ?,
        wards_created = ?,
        diagnostics_json = ?,
        completed_at = ?
    WHERE id = ?
  `
  ).run(
    statistics.level1Count,
    statistics.level2Count,
    statistics.level3Count,
    created.states_created,
    created.lgas_created,
    created.wards_created,
    diagnostics ? JSON.stringify(diagnostics) : null,
    new Date().toISOString(),
    id
  );
}

export function failExtractionLog(db: Database.Database, id: string, errorMessage: string): void {
  db.prepare(
    `
    UPDATE extraction_logs
    SET status = 'failed', error_message = ?, completed_at = ?
    WHERE id = ?
  `
  ).run(errorMessage, new Date().toISOString(), id);
}

export function getExtractionLog(db: Database.Database, id: string): ExtractionLogRow | null {
  return (
    db.prepare<[string], ExtractionLogRow>('SELECT * FROM extraction_logs WHERE id = ?').get(id) ??
    null
  );
}

/**
 * Most recent logs first
 */
export function getExtractionLogs(db: Database.Database, limit = 100): ExtractionLogRow[] {
  return db
    .prepare<[number], ExtractionLogRow>(
      'SELECT * FROM extraction_logs ORDER BY created_at DESC, rowid DESC LIMIT ?'
    )
    .all(limit);
}
