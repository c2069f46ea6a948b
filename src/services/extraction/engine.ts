/**
 * Hierarchical Extraction Engine
 *
 * Walks pages in document order and returns one deduplicated
 * state → LGA → ward document with statistics and diagnostics.
 *
 * Every run owns a fresh ExtractionContext and DocumentBuilder, so
 * independent documents can be extracted concurrently. The engine performs
 * no I/O: pages arrive already materialized from a reader.
 *
 * Only an unreadable page (UnreadableSourceError) or a cancelled run
 * (ExtractionAbortedError) fails a run. Malformed and orphan rows are
 * absorbed and show up in the diagnostics.
 *
 * @module services/extraction/engine
 */

import {
  createDiagnostics,
  type ExtractedDocument,
  type ExtractionDiagnostics,
  type ExtractionResult,
  type ExtractionStatistics,
} from '../../models/hierarchy.js';
import type { Page } from '../../models/page.js';
import { resolveEngineConfig, type EngineConfig } from './config.js';
import { ExtractionContext } from './context.js';
import { DocumentBuilder } from './document-builder.js';
import { ExtractionAbortedError, ExtractionError, UnreadableSourceError } from './errors.js';
import { createConsoleLogger, type ExtractionLogger } from './logger.js';
import { PageProcessor } from './page-processor.js';

export interface ExtractOptions {
  /** Overrides merged onto the default configuration */
  config?: Partial<EngineConfig>;
  logger?: ExtractionLogger;
}

export interface ExtractAsyncOptions extends ExtractOptions {
  /** Checked before each page */
  signal?: AbortSignal;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATISTICS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Aggregate counts. Level1 entries without any Level2 are excluded from
 * level1Count and level1Names.
 */
export function computeStatistics(document: ExtractedDocument): ExtractionStatistics {
  const populated = document.level1.filter((level1) => level1.level2.length > 0);
  let level2Count = 0;
  let level3Count = 0;
  for (const level1 of document.level1) {
    level2Count += level1.level2.length;
    for (const level2 of level1.level2) {
      level3Count += level2.level3.length;
    }
  }
  return {
    level1Count: populated.length,
    level2Count,
    level3Count,
    level1Names: populated.map((level1) => level1.name),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// RUN
// ═══════════════════════════════════════════════════════════════════════════════

class ExtractionRun {
  private readonly context = new ExtractionContext();
  private readonly builder = new DocumentBuilder(this.context);
  private readonly diagnostics: ExtractionDiagnostics = createDiagnostics();
  private readonly processor: PageProcessor;
  private pageNumber = 0;

  constructor(
    config: EngineConfig,
    private readonly logger: ExtractionLogger
  ) {
    this.processor = new PageProcessor(
      config,
      this.context,
      this.builder,
      this.diagnostics,
      logger
    );
    this.processor.initialize();
  }

  get pagesProcessed(): number {
    return this.diagnostics.pagesProcessed;
  }

  get nextPageNumber(): number {
    return this.pageNumber + 1;
  }

  processPage(page: Page): void {
    this.pageNumber++;
    this.processor.processPage(page, this.pageNumber);
  }

  finish(): ExtractionResult {
    const statistics = computeStatistics(this.builder.document);
    this.logger.info(
      `Extracted ${statistics.level1Count} state(s), ${statistics.level2Count} LGA(s), ` +
        `${statistics.level3Count} ward(s) from ${this.diagnostics.pagesProcessed} page(s)`
    );
    if (this.diagnostics.orphanRecords > 0 || this.diagnostics.exhaustedRecords > 0) {
      this.logger.warn(
        `Dropped ${this.diagnostics.orphanRecords} orphan and ` +
          `${this.diagnostics.exhaustedRecords} post-exhaustion record(s)`
      );
    }
    return {
      document: this.builder.document,
      statistics,
      diagnostics: { ...this.diagnostics },
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export class ExtractionEngine {
  readonly config: EngineConfig;
  private readonly logger: ExtractionLogger;

  constructor(options: ExtractOptions = {}) {
    this.config = resolveEngineConfig(options.config);
    this.logger = options.logger ?? createConsoleLogger();
  }

  /**
   * Extract from already-materialized pages, in order
   *
   * @throws UnreadableSourceError when a page cannot be read
   */
  extract(pages: Iterable<Page>): ExtractionResult {
    const run = new ExtractionRun(this.config, this.logger);
    for (const page of pages) {
      run.processPage(page);
    }
    return run.finish();
  }

  /**
   * Extract from a lazy page source (e.g. a PDF reader), checking the
   * abort signal between pages
   *
   * @throws ExtractionAbortedError when the signal fires
   * @throws UnreadableSourceError when the source or a page cannot be read
   */
  async extractAsync(
    pages: Iterable<Page> | AsyncIterable<Page>,
    signal?: AbortSignal
  ): Promise<ExtractionResult> {
    const run = new ExtractionRun(this.config, this.logger);
    const iterator = (async function* () {
      yield* pages;
    })();

    try {
      for (;;) {
        if (signal?.aborted) {
          throw new ExtractionAbortedError(run.pagesProcessed);
        }
        let step: IteratorResult<Page>;
        try {
          step = await iterator.next();
        } catch (error) {
          if (error instanceof ExtractionError) {
            throw error;
          }
          const message = error instanceof Error ? error.message : String(error);
          throw new UnreadableSourceError(
            `Failed to read page ${run.nextPageNumber}: ${message}`,
            run.nextPageNumber,
            error
          );
        }
        if (step.done) {
          break;
        }
        run.processPage(step.value);
      }
    } finally {
      await iterator.return(undefined);
    }

    return run.finish();
  }
}

/**
 * One-shot synchronous extraction
 */
export function extract(pages: Iterable<Page>, options: ExtractOptions = {}): ExtractionResult {
  return new ExtractionEngine(options).extract(pages);
}

/**
 * One-shot extraction over a sync or async page source
 */
export function extractAsync(
  pages: Iterable<Page> | AsyncIterable<Page>,
  options: ExtractAsyncOptions = {}
): Promise<ExtractionResult> {
  return new ExtractionEngine(options).extractAsync(pages, options.signal);
}
