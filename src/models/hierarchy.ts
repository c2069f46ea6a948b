/**
 * Hierarchy Models for Boundary Extraction
 *
 * Three-level administrative hierarchy reconstructed from boundary documents:
 * Level1 (state) → Level2 (LGA) → Level3 (ward).
 *
 * Entities are created once per extraction run, mutated only by appending
 * children, and never removed.
 *
 * @module models/hierarchy
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ENTITIES
// ═══════════════════════════════════════════════════════════════════════════════

/** Sub-sub-region (ward). Owned by exactly one Level2. */
export interface Level3 {
  name: string;
  code: string;
}

/** Sub-region (LGA). Owned by exactly one Level1. */
export interface Level2 {
  name: string;
  code: string;
  level3: Level3[];
}

/** Top-level region (state). */
export interface Level1 {
  name: string;
  level2: Level2[];
}

/**
 * Nested output of one extraction run.
 * Level1 entries appear in first-recognized order.
 */
export interface ExtractedDocument {
  level1: Level1[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATISTICS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Aggregate counts derived from an ExtractedDocument.
 * level1Count and level1Names only include Level1 entries with at least one Level2.
 */
export interface ExtractionStatistics {
  level1Count: number;
  level2Count: number;
  level3Count: number;
  level1Names: string[];
}

/**
 * Counters for rows and lines the engine absorbed instead of emitting.
 * A successful run with low Level2/Level3 counts should be read alongside these.
 */
export interface ExtractionDiagnostics {
  pagesProcessed: number;
  rowsSeen: number;
  noiseRows: number;
  headerRows: number;
  duplicateRecords: number;
  orphanRecords: number;
  exhaustedRecords: number;
  bannersAccepted: number;
  bannersIgnored: number;
  boundaryResets: number;
}

/** Full result of one extraction run */
export interface ExtractionResult {
  document: ExtractedDocument;
  statistics: ExtractionStatistics;
  diagnostics: ExtractionDiagnostics;
}

/**
 * Create a zeroed diagnostics record
 */
export function createDiagnostics(): ExtractionDiagnostics {
  return {
    pagesProcessed: 0,
    rowsSeen: 0,
    noiseRows: 0,
    headerRows: 0,
    duplicateRecords: 0,
    orphanRecords: 0,
    exhaustedRecords: 0,
    bannersAccepted: 0,
    bannersIgnored: 0,
    boundaryResets: 0,
  };
}
