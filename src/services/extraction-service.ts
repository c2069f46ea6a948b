/**
 * Extraction Orchestrator
 *
 * Pipeline: source file -> checks -> hash -> pages -> engine -> JSON export -> database
 * FAIL-FAST: a rejected file or an unreadable page stops the run. When a
 * database is given, the extraction log is opened before any page is read,
 * so every failure after that point leaves a `failed` log behind.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 */

import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type {
  ExtractedDocument,
  ExtractionDiagnostics,
  ExtractionStatistics,
} from '../models/hierarchy.js';
import type { Page } from '../models/page.js';
import {
  ExtractionEngine,
  SourceFileError,
  createConsoleLogger,
  serializeDocument,
  type EngineConfig,
  type ExtractionLogger,
} from './extraction/index.js';
import { readPdfPages, type PageReader } from './pdf/index.js';
import type { DatabaseService } from './storage/database/index.js';
import { hashFile } from '../utils/hash.js';

/** Default upper bound on accepted PDF size */
export const DEFAULT_MAX_FILE_SIZE_MB = 50;

const SUPPORTED_EXTENSIONS = new Set(['.pdf']);

export interface ExtractionServiceOptions {
  /** Source of pages for extractFile; defaults to the pdfjs reader */
  pageReader?: PageReader;
  /** Used for both service and engine output; tagged console loggers otherwise */
  logger?: ExtractionLogger;
  maxFileSizeMb?: number;
}

export interface ExtractRunOptions {
  /** Overrides merged onto the default engine configuration */
  engine?: Partial<EngineConfig>;
  /** Save the document (and an extraction log) into this database */
  database?: DatabaseService | null;
  /** Write the JSON export into outputDir */
  saveToJson?: boolean;
  outputDir?: string;
  signal?: AbortSignal;
}

export interface ExtractPagesOptions extends ExtractRunOptions {
  /** Name recorded in the log and used for the export file */
  filename?: string;
  fileHash?: string | null;
}

export interface ExtractionRunResult {
  run_id: string;
  filename: string;
  file_hash: string | null;
  statistics: ExtractionStatistics;
  diagnostics: ExtractionDiagnostics;
  json_file: string | null;
  database_log_id: string | null;
  states_created: number;
  lgas_created: number;
  wards_created: number;
  document: ExtractedDocument;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function exportTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * `<base>_extracted_<YYYYMMDD_HHMMSS>.json`, base being the filename without its extension
 */
export function exportFileName(filename: string, date: Date = new Date()): string {
  const base = path.basename(filename, path.extname(filename)) || 'document';
  return `${base}_extracted_${exportTimestamp(date)}.json`;
}

export class ExtractionService {
  private readonly pageReader: PageReader;
  private readonly log: ExtractionLogger;
  private readonly engineLogger: ExtractionLogger;
  private readonly maxFileSizeBytes: number;

  constructor(options: ExtractionServiceOptions = {}) {
    this.pageReader = options.pageReader ?? readPdfPages;
    this.log = options.logger ?? createConsoleLogger('ExtractionService');
    this.engineLogger = options.logger ?? createConsoleLogger();
    this.maxFileSizeBytes = (options.maxFileSizeMb ?? DEFAULT_MAX_FILE_SIZE_MB) * 1024 * 1024;
  }

  /**
   * Extract a PDF file
   *
   * @throws SourceFileError when the path is missing, not a .pdf, or too large
   * @throws UnreadableSourceError when the PDF or one of its pages cannot be read
   * @throws ExtractionAbortedError when options.signal fires
   */
  async extractFile(filePath: string, options: ExtractRunOptions = {}): Promise<ExtractionRunResult> {
    const resolved = path.resolve(filePath);
    this.checkSourceFile(resolved);

    const fileHash = await hashFile(resolved);
    return this.run(path.basename(resolved), fileHash, () => this.pageReader(resolved), options);
  }

  /**
   * Extract already-materialized pages (tables and text supplied by the caller)
   */
  async extractPages(
    pages: Iterable<Page> | AsyncIterable<Page>,
    options: ExtractPagesOptions = {}
  ): Promise<ExtractionRunResult> {
    return this.run(options.filename ?? 'pages', options.fileHash ?? null, () => pages, options);
  }

  private checkSourceFile(filePath: string): void {
    let stats: fs.Stats;
    try {
      stats = fs.statSync(filePath);
    } catch (error) {
      throw new SourceFileError(`Path does not exist: ${filePath}`, 'PATH_NOT_FOUND', filePath, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
    if (!stats.isFile()) {
      throw new SourceFileError(`Path is not a file: ${filePath}`, 'PATH_NOT_FOUND', filePath);
    }

    const extension = path.extname(filePath).toLowerCase();
    if (!SUPPORTED_EXTENSIONS.has(extension)) {
      throw new SourceFileError(
        `Unsupported file type "${extension || '(none)'}": ${filePath}. Only .pdf files are supported.`,
        'UNSUPPORTED_FILE_TYPE',
        filePath,
        { extension }
      );
    }

    if (stats.size > this.maxFileSizeBytes) {
      throw new SourceFileError(
        `File exceeds the ${Math.round(this.maxFileSizeBytes / (1024 * 1024))} MB limit: ${filePath}`,
        'FILE_TOO_LARGE',
        filePath,
        { sizeBytes: stats.size, maxBytes: this.maxFileSizeBytes }
      );
    }
  }

  private async run(
    filename: string,
    fileHash: string | null,
    openPages: () => Iterable<Page> | AsyncIterable<Page>,
    options: ExtractRunOptions
  ): Promise<ExtractionRunResult> {
    const runId = uuidv4();
    const database = options.database ?? null;
    const logId = database ? database.beginExtractionLog(filename, fileHash) : null;
    const startTime = Date.now();

    this.log.info(`Run ${runId}: extracting ${filename}`);

    try {
      const engine = new ExtractionEngine({ config: options.engine, logger: this.engineLogger });
      const result = await engine.extractAsync(openPages(), options.signal);

      let jsonFile: string | null = null;
      if (options.saveToJson) {
        if (!options.outputDir) {
          throw new Error('outputDir is required when saveToJson is set');
        }
        jsonFile = this.writeExport(result.document, filename, options.outputDir);
      }

      let created = { states_created: 0, lgas_created: 0, wards_created: 0 };
      if (database && logId) {
        const saved = database.saveExtraction(result.document, filename, {
          fileHash,
          diagnostics: result.diagnostics,
          logId,
        });
        created = {
          states_created: saved.states_created,
          lgas_created: saved.lgas_created,
          wards_created: saved.wards_created,
        };
      }

      this.log.info(
        `Run ${runId}: ${filename} done in ${Date.now() - startTime}ms ` +
          `(${result.statistics.level1Count} states, ${result.statistics.level2Count} LGAs, ` +
          `${result.statistics.level3Count} wards)`
      );

      return {
        run_id: runId,
        filename,
        file_hash: fileHash,
        statistics: result.statistics,
        diagnostics: result.diagnostics,
        json_file: jsonFile,
        database_log_id: logId,
        ...created,
        document: result.document,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.warn(`Run ${runId}: ${filename} failed: ${message}`);
      if (database && logId) {
        const existing = database.getExtractionLog(logId);
        // saveExtraction already marks its own failures
        if (existing?.status === 'in_progress') {
          database.failExtractionLog(logId, message);
        }
      }
      throw error;
    }
  }

  private writeExport(document: ExtractedDocument, filename: string, outputDir: string): string {
    fs.mkdirSync(outputDir, { recursive: true });
    const target = path.join(path.resolve(outputDir), exportFileName(filename));
    fs.writeFileSync(target, serializeDocument(document), 'utf-8');
    this.log.info(`Wrote ${target}`);
    return target;
  }
}
