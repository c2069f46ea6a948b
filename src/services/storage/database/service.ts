/**
 * DatabaseService class for all database operations
 *
 * Persists extracted state/LGA/ward hierarchies, extraction logs, and
 * serves lookups, search and export. Uses prepared statements throughout.
 */

import Database from 'better-sqlite3';
import type {
  ExtractedDocument,
  ExtractionDiagnostics,
} from '../../../models/hierarchy.js';
import { computeStatistics } from '../../extraction/engine.js';
import {
  DatabaseInfo,
  DatabaseStats,
  ExportData,
  ExtractionLogRow,
  LgaWithCount,
  LgaWithState,
  SaveExtractionResult,
  SearchResults,
  SearchType,
  StateRow,
  StateWithCount,
  WardRow,
} from './types.js';
import {
  createDatabase,
  openDatabase,
  listDatabases,
  deleteDatabase,
  databaseExists,
} from './static-operations.js';
import { getStats, updateMetadataCounts } from './stats-operations.js';
import * as hierarchyOps from './hierarchy-operations.js';
import * as logOps from './extraction-log-operations.js';

export interface SaveExtractionOptions {
  fileHash?: string | null;
  diagnostics?: ExtractionDiagnostics | null;
  /** Complete a log opened earlier with beginExtractionLog instead of opening one */
  logId?: string;
}

/**
 * DatabaseService class for all database operations
 */
export class DatabaseService {
  private db: Database.Database;
  private readonly name: string;
  private readonly path: string;

  private constructor(db: Database.Database, name: string, path: string) {
    this.db = db;
    this.name = name;
    this.path = path;
  }

  static create(name: string, description?: string, storagePath?: string): DatabaseService {
    const result = createDatabase(name, description, storagePath);
    return new DatabaseService(result.db, result.name, result.path);
  }

  static open(name: string, storagePath?: string): DatabaseService {
    const result = openDatabase(name, storagePath);
    return new DatabaseService(result.db, result.name, result.path);
  }

  static list(storagePath?: string): DatabaseInfo[] {
    return listDatabases(storagePath);
  }

  static delete(name: string, storagePath?: string): void {
    deleteDatabase(name, storagePath);
  }

  static exists(name: string, storagePath?: string): boolean {
    return databaseExists(name, storagePath);
  }

  getStats(): DatabaseStats {
    return getStats(this.db, this.name, this.path);
  }

  close(): void {
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error(
        '[DatabaseService] pragma optimize failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    this.db.close();
  }

  getName(): string {
    return this.name;
  }

  getPath(): string {
    return this.path;
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  getConnection(): Database.Database {
    return this.db;
  }

  // ==================== EXTRACTION OPERATIONS ====================

  /**
   * Save a document in one transaction, recorded by an extraction log.
   * On failure the log is marked failed with the message and the error rethrown.
   */
  saveExtraction(
    document: ExtractedDocument,
    filename: string,
    options: SaveExtractionOptions = {}
  ): SaveExtractionResult {
    const logId = options.logId ?? this.beginExtractionLog(filename, options.fileHash ?? null);

    try {
      const created = this.transaction(() => {
        const counts = hierarchyOps.saveHierarchy(this.db, document);
        logOps.completeExtractionLog(
          this.db,
          logId,
          computeStatistics(document),
          counts,
          options.diagnostics ?? null
        );
        return counts;
      });
      updateMetadataCounts(this.db);
      console.error(
        `[DatabaseService] Saved ${filename}: ${created.states_created} state(s), ` +
          `${created.lgas_created} LGA(s), ${created.wards_created} ward(s) created`
      );
      return { log_id: logId, ...created, status: 'success' };
    } catch (error) {
      this.failExtractionLog(logId, error instanceof Error ? error.message : String(error));
      throw error;
    }
  }

  beginExtractionLog(filename: string, fileHash: string | null): string {
    return logOps.beginExtractionLog(this.db, filename, fileHash);
  }

  failExtractionLog(id: string, errorMessage: string): void {
    logOps.failExtractionLog(this.db, id, errorMessage);
    updateMetadataCounts(this.db);
  }

  getExtractionLog(id: string): ExtractionLogRow | null {
    return logOps.getExtractionLog(this.db, id);
  }

  getExtractionLogs(limit?: number): ExtractionLogRow[] {
    return logOps.getExtractionLogs(this.db, limit);
  }

  // ==================== HIERARCHY OPERATIONS ====================

  listStates(): StateWithCount[] {
    return hierarchyOps.listStates(this.db);
  }

  getState(id: number): StateRow | null {
    return hierarchyOps.getState(this.db, id);
  }

  getStateByName(name: string): StateRow | null {
    return hierarchyOps.getStateByName(this.db, name);
  }

  listLgasByState(stateId: number): LgaWithCount[] {
    return hierarchyOps.listLgasByState(this.db, stateId);
  }

  getLga(id: number): LgaWithState | null {
    return hierarchyOps.getLga(this.db, id);
  }

  listWardsByLga(lgaId: number): WardRow[] {
    return hierarchyOps.listWardsByLga(this.db, lgaId);
  }

  search(query: string, type?: SearchType): SearchResults {
    return hierarchyOps.search(this.db, query, type);
  }

  exportAll(): ExportData {
    return hierarchyOps.exportAll(this.db);
  }
}
