/**
 * Page Processor
 *
 * Drives one page: table rows through the classifier into the context and
 * builder, then text lines through the banner path only. Table rows are
 * never re-derived from text.
 *
 * Boundary signals, in priority order:
 *   1. Banner line naming a different Level1 → that Level1 becomes current.
 *   2. Level2 numeric code lower than the last one, while the current Level1
 *      came from the reference ordering → advance to the next reference entry.
 *
 * A banner clears the last code, so a lower code right after a banner never
 * causes a second transition. When tables run before text, the page's first
 * accepted banner naming another Level1 is held while its tables are read: a
 * code drop on that page enters the banner's Level1 instead of the next
 * reference entry.
 *
 * @module services/extraction/page-processor
 */

import type { ExtractionDiagnostics } from '../../models/hierarchy.js';
import type { Page, RawRow, RawTable } from '../../models/page.js';
import type { EngineConfig } from './config.js';
import type { ExtractionContext } from './context.js';
import type { DocumentBuilder } from './document-builder.js';
import { ExtractionError, UnreadableSourceError } from './errors.js';
import type { ExtractionLogger } from './logger.js';
import {
  classifyRow,
  type RegionBannerClassification,
  classifyTextLine,
  isNumericCode,
  type Level2RecordClassification,
  type RecordFields,
} from './row-classifier.js';

interface HeldBanner {
  name: string;
  applied: boolean;
}

export class PageProcessor {
  private heldBanner: HeldBanner | null = null;

  constructor(
    private readonly config: EngineConfig,
    private readonly context: ExtractionContext,
    private readonly builder: DocumentBuilder,
    private readonly diagnostics: ExtractionDiagnostics,
    private readonly logger: ExtractionLogger
  ) {}

  /**
   * Initial state: first reference entry active when pre-seeding, otherwise none
   */
  initialize(): void {
    const reference = this.config.referenceLevel1;
    if (this.config.preseedFirstReference && reference !== null && reference.length > 0) {
      const { entity } = this.builder.findOrCreateLevel1(reference[0]);
      this.context.enterLevel1(entity, 'reference', 0);
      this.logger.debug(`Pre-seeded ${entity.name}`);
    }
  }

  /**
   * Process one page. pageNumber is 1-based and only used in traces and errors.
   *
   * @throws UnreadableSourceError when the page's tables or text cannot be read
   */
  processPage(page: Page, pageNumber: number): void {
    const tables = readPage(() => page.tables(), pageNumber, 'tables');
    const text = readPage(() => page.text(), pageNumber, 'text');
    this.logger.debug(`Page ${pageNumber}: ${tables.length} table(s)`);

    const lines = text.split(/\r?\n/);

    if (this.config.bannerPosition === 'before_tables') {
      this.processText(lines);
      this.processTables(tables, pageNumber);
    } else {
      this.heldBanner = this.findPageBanner(lines);
      try {
        this.processTables(tables, pageNumber);
        this.processText(lines);
      } finally {
        this.heldBanner = null;
      }
    }

    this.diagnostics.pagesProcessed++;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Tables
  // ─────────────────────────────────────────────────────────────────────────────

  private processTables(tables: RawTable[], pageNumber: number): void {
    for (const table of tables) {
      for (const row of table) {
        this.processRow(row, pageNumber);
      }
    }
  }

  processRow(row: RawRow, pageNumber: number): void {
    this.diagnostics.rowsSeen++;
    const classification = classifyRow(row, this.config);

    switch (classification.kind) {
      case 'noise':
        this.diagnostics.noiseRows++;
        this.logger.debug(`Page ${pageNumber}: noise row (${classification.reason})`);
        return;
      case 'table_header':
        this.diagnostics.headerRows++;
        this.logger.debug(`Page ${pageNumber}: header row`);
        return;
      case 'level2_record':
        if (classification.ambiguous && this.context.currentLevel2 !== null) {
          this.handleLevel3(classification.name, classification.code, pageNumber);
        } else {
          this.handleLevel2(classification, pageNumber);
        }
        return;
      case 'level3_record':
        this.handleLevel3(classification.name, classification.code, pageNumber);
        return;
    }
  }

  private handleLevel2(record: Level2RecordClassification, pageNumber: number): void {
    if (this.context.exhausted) {
      this.dropExhausted(record.child ? 2 : 1);
      return;
    }

    const numericCode =
      record.code !== null && isNumericCode(record.code) ? Number.parseInt(record.code, 10) : null;

    const held = this.heldBanner;
    if (
      numericCode !== null &&
      held !== null &&
      !held.applied &&
      this.isCodeDrop(record, numericCode)
    ) {
      held.applied = true;
      this.logger.info(
        `Page ${pageNumber}: code ${numericCode} dropped on a page naming ${held.name}, banner wins`
      );
      this.applyBanner(held.name);
    } else if (numericCode !== null && this.isCodeReset(record, numericCode)) {
      this.advanceReference(numericCode, pageNumber);
      if (this.context.exhausted) {
        this.dropExhausted(record.child ? 2 : 1);
        return;
      }
    }

    const level1 = this.context.currentLevel1;
    if (!level1) {
      this.dropOrphan(`Level2 "${record.name}" has no current Level1`, pageNumber, record.child ? 2 : 1);
      return;
    }

    const { entity, created } = this.builder.findOrCreateLevel2(level1, record.name, record.code);
    if (!created) {
      this.diagnostics.duplicateRecords++;
    }
    this.context.setCurrentLevel2(entity, numericCode);

    if (record.child) {
      this.attachLevel3(record.child);
    }
  }

  private isCodeReset(record: Level2RecordClassification, numericCode: number): boolean {
    return (
      this.config.referenceLevel1 !== null &&
      this.context.level1Source === 'reference' &&
      this.isCodeDrop(record, numericCode)
    );
  }

  /**
   * Numeric code lower than the last one under the current Level1
   */
  private isCodeDrop(record: Level2RecordClassification, numericCode: number): boolean {
    const level1 = this.context.currentLevel1;
    const lastCode = this.context.lastLevel2Code;
    if (level1 === null || lastCode === null || numericCode >= lastCode) {
      return false;
    }
    // A repeated row for an entity already seen here is a continuation, not a boundary
    return !this.builder.hasLevel2(level1, record.name, record.code);
  }

  private advanceReference(numericCode: number, pageNumber: number): void {
    const reference = this.config.referenceLevel1;
    if (reference === null) return;

    const previous = this.context.currentLevel1?.name ?? '(none)';
    const next = (this.context.referenceIndex ?? -1) + 1;
    this.diagnostics.boundaryResets++;

    if (next >= reference.length) {
      this.context.markExhausted();
      this.logger.warn(
        `Page ${pageNumber}: code reset after ${previous} ran past the last reference entry; ` +
          `dropping records until a banner names a known region`
      );
      return;
    }

    const { entity } = this.builder.findOrCreateLevel1(reference[next]);
    this.context.enterLevel1(entity, 'reference', next);
    this.logger.info(
      `Page ${pageNumber}: code ${numericCode} reset the sequence, ${previous} → ${entity.name}`
    );
  }

  private handleLevel3(name: string, code: string | null, pageNumber: number): void {
    if (this.context.exhausted) {
      this.dropExhausted(1);
      return;
    }
    if (!this.context.currentLevel2) {
      this.dropOrphan(`Level3 "${name}" has no current Level2`, pageNumber, 1);
      return;
    }
    this.attachLevel3({ name, code: code ?? '' });
  }

  private attachLevel3(record: RecordFields): void {
    const level2 = this.context.currentLevel2;
    if (!level2) return;
    const { created } = this.builder.findOrCreateLevel3(
      level2,
      record.name,
      record.code.length > 0 ? record.code : null
    );
    if (!created) {
      this.diagnostics.duplicateRecords++;
    }
  }

  private dropOrphan(message: string, pageNumber: number, count: number): void {
    this.diagnostics.orphanRecords += count;
    this.logger.warn(`Page ${pageNumber}: dropped orphan record: ${message}`);
  }

  private dropExhausted(count: number): void {
    this.diagnostics.exhaustedRecords += count;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Text
  // ─────────────────────────────────────────────────────────────────────────────

  private processText(lines: string[]): void {
    for (const line of lines) {
      this.processTextLine(line);
    }
  }

  processTextLine(line: string): void {
    const classification = classifyTextLine(line, this.config);
    if (classification.kind === 'noise') {
      return;
    }

    if (!this.isAccepted(classification)) {
      this.diagnostics.bannersIgnored++;
      this.logger.debug(`Ignored unlisted banner "${classification.name}"`);
      return;
    }

    const held = this.heldBanner;
    if (held !== null && held.applied && held.name === classification.name) {
      // Already entered at the code drop
      this.heldBanner = null;
      return;
    }

    this.applyBanner(classification.name);
  }

  private isAccepted(banner: RegionBannerClassification): boolean {
    return (
      banner.listed || this.config.referenceLevel1 === null || this.config.acceptUnlistedBanners
    );
  }

  /**
   * First accepted banner on the page naming a Level1 other than the current one
   */
  private findPageBanner(lines: string[]): HeldBanner | null {
    const current = this.context.currentLevel1?.name ?? null;
    for (const line of lines) {
      const classification = classifyTextLine(line, this.config);
      if (
        classification.kind === 'region_banner' &&
        this.isAccepted(classification) &&
        classification.name !== current
      ) {
        return { name: classification.name, applied: false };
      }
    }
    return null;
  }

  private applyBanner(name: string): void {
    this.diagnostics.bannersAccepted++;
    const current = this.context.currentLevel1;
    if (current !== null && current.name === name) {
      // Same region: the banner confirms it, no new transition
      this.context.level1Source = 'banner';
      return;
    }

    const reference = this.config.referenceLevel1;
    const index = reference !== null ? reference.indexOf(name) : -1;
    const { entity } = this.builder.findOrCreateLevel1(name);
    this.context.enterLevel1(entity, 'banner', index >= 0 ? index : null);
    this.logger.info(`Banner: ${entity.name}`);
  }
}

function readPage<T>(read: () => T, pageNumber: number, part: 'tables' | 'text'): T {
  try {
    return read();
  } catch (error) {
    if (error instanceof ExtractionError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new UnreadableSourceError(
      `Failed to read ${part} of page ${pageNumber}: ${message}`,
      pageNumber,
      error
    );
  }
}
