/**
 * Extraction Context
 *
 * Mutable cursor for one extraction run: which Level1/Level2 is current,
 * the last Level2 numeric code seen, where the current Level1 came from,
 * the position in the reference ordering, and the per-level identity
 * indexes used for duplicate rejection.
 *
 * One context per extract() call; nothing here is module state.
 *
 * State machine:
 *   NoLevel1Active --(banner | pre-seed | reset advance)--> Level1Active
 *   Level1Active   --(level2 record)--> Level2Active
 *   Level2Active   --(level3 records)*--> Level2Active
 *   any            --(banner | reset)--> Level1Active (new Level1, no Level2)
 *   reset past the end of the reference --> Exhausted (until a banner)
 *
 * @module services/extraction/context
 */

import type { Level1, Level2, Level3 } from '../../models/hierarchy.js';

/** How the current Level1 became current */
export type Level1Source = 'banner' | 'reference';

export type ContextState = 'no_level1' | 'level1_active' | 'level2_active' | 'exhausted';

export class ExtractionContext {
  currentLevel1: Level1 | null = null;
  currentLevel2: Level2 | null = null;
  lastLevel2Code: number | null = null;
  level1Source: Level1Source | null = null;

  /** Position of the current Level1 in the reference ordering, null when unlisted */
  referenceIndex: number | null = null;

  /** Set once a code reset runs past the end of the reference ordering */
  exhausted = false;

  /** Composite key → entity, one index per level */
  readonly level1Index = new Map<string, Level1>();
  readonly level2Index = new Map<string, Level2>();
  readonly level3Index = new Map<string, Level3>();

  get state(): ContextState {
    if (this.exhausted) return 'exhausted';
    if (!this.currentLevel1) return 'no_level1';
    return this.currentLevel2 ? 'level2_active' : 'level1_active';
  }

  /**
   * Make a Level1 current. Clears the Level2 cursor, the last code and exhaustion.
   */
  enterLevel1(level1: Level1, source: Level1Source, referenceIndex: number | null): void {
    this.currentLevel1 = level1;
    this.currentLevel2 = null;
    this.lastLevel2Code = null;
    this.level1Source = source;
    this.referenceIndex = referenceIndex;
    this.exhausted = false;
  }

  /**
   * Record that the reference ordering ran out. Records are dropped until a banner.
   */
  markExhausted(): void {
    this.currentLevel1 = null;
    this.currentLevel2 = null;
    this.lastLevel2Code = null;
    this.level1Source = null;
    this.exhausted = true;
  }

  setCurrentLevel2(level2: Level2, numericCode: number | null): void {
    this.currentLevel2 = level2;
    if (numericCode !== null) {
      this.lastLevel2Code = numericCode;
    }
  }
}
