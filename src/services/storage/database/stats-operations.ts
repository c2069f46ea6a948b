/**
 * Statistics operations for DatabaseService
 *
 * Handles database statistics retrieval and the denormalized metadata counts.
 */

import type Database from 'better-sqlite3';
import { statSync } from 'fs';
import { DatabaseStats } from './types.js';

interface CountRow {
  total_states: number;
  total_lgas: number;
  total_wards: number;
  total_extractions: number;
}

const COUNTS_SQL = `
  SELECT
    (SELECT COUNT(*) FROM states) AS total_states,
    (SELECT COUNT(*) FROM lgas) AS total_lgas,
    (SELECT COUNT(*) FROM wards) AS total_wards,
    (SELECT COUNT(*) FROM extraction_logs) AS total_extractions
`;

function readCounts(db: Database.Database): CountRow {
  const row = db.prepare<[], CountRow>(COUNTS_SQL).get();
  return row ?? { total_states: 0, total_lgas: 0, total_wards: 0, total_extractions: 0 };
}

/**
 * Get database statistics
 *
 * @returns Live statistics from the database
 */
export function getStats(db: Database.Database, name: string, path: string): DatabaseStats {
  const counts = readCounts(db);

  const byStatus = db
    .prepare<[], { pending: number; in_progress: number; success: number; failed: number }>(
      `
    SELECT
      COUNT(*) FILTER (WHERE status = 'pending') AS pending,
      COUNT(*) FILTER (WHERE status = 'in_progress') AS in_progress,
      COUNT(*) FILTER (WHERE status = 'success') AS success,
      COUNT(*) FILTER (WHERE status = 'failed') AS failed
    FROM extraction_logs
  `
    )
    .get() ?? { pending: 0, in_progress: 0, success: 0, failed: 0 };

  const stats = statSync(path);

  return {
    name,
    total_states: counts.total_states,
    total_lgas: counts.total_lgas,
    total_wards: counts.total_wards,
    total_extractions: counts.total_extractions,
    extractions_by_status: byStatus,
    avg_lgas_per_state: counts.total_states > 0 ? counts.total_lgas / counts.total_states : 0,
    avg_wards_per_lga: counts.total_lgas > 0 ? counts.total_wards / counts.total_lgas : 0,
    storage_size_bytes: stats.size,
  };
}

/**
 * Refresh the denormalized counts and modification time in database_metadata
 */
export function updateMetadataCounts(db: Database.Database): void {
  const counts = readCounts(db);
  db.prepare(
    `
    UPDATE database_metadata
    SET total_states = ?, total_lgas = ?, total_wards = ?, total_extractions = ?,
        last_modified_at = ?
    WHERE id = 1
  `
  ).run(
    counts.total_states,
    counts.total_lgas,
    counts.total_wards,
    counts.total_extractions,
    new Date().toISOString()
  );
}
