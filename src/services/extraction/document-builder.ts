/**
 * Document Builder
 *
 * Owns the output tree and performs find-or-create insertion keyed by
 * composite identity. Names are normalized before keying; missing codes are
 * generated from the name's initials.
 *
 * Identity keys:
 *   Level1: name
 *   Level2: (Level1 name, name, code)
 *   Level3: (Level1 name, Level2 name, Level2 code, name, code)
 *
 * @module services/extraction/document-builder
 */

import type { ExtractedDocument, Level1, Level2, Level3 } from '../../models/hierarchy.js';
import type { ExtractionContext } from './context.js';
import { compositeKey, generateCode, normalizeName } from './normalize.js';

export interface FindOrCreateResult<T> {
  entity: T;
  created: boolean;
}

export class DocumentBuilder {
  readonly document: ExtractedDocument = { level1: [] };

  /** Composite key of every Level2 built here, for keying its children */
  private readonly level2Keys = new WeakMap<Level2, string>();

  constructor(private readonly context: ExtractionContext) {}

  findOrCreateLevel1(name: string): FindOrCreateResult<Level1> {
    const normalized = normalizeName(name);
    const key = compositeKey(normalized);
    const existing = this.context.level1Index.get(key);
    if (existing) {
      return { entity: existing, created: false };
    }

    const level1: Level1 = { name: normalized, level2: [] };
    this.document.level1.push(level1);
    this.context.level1Index.set(key, level1);
    return { entity: level1, created: true };
  }

  findOrCreateLevel2(level1: Level1, name: string, code: string | null): FindOrCreateResult<Level2> {
    const normalized = normalizeName(name);
    const resolvedCode = resolveCode(normalized, code);
    const key = compositeKey(level1.name, normalized, resolvedCode);
    const existing = this.context.level2Index.get(key);
    if (existing) {
      return { entity: existing, created: false };
    }

    const level2: Level2 = { name: normalized, code: resolvedCode, level3: [] };
    level1.level2.push(level2);
    this.context.level2Index.set(key, level2);
    this.level2Keys.set(level2, key);
    return { entity: level2, created: true };
  }

  /**
   * Whether findOrCreateLevel2 would return an existing entity
   */
  hasLevel2(level1: Level1, name: string, code: string | null): boolean {
    const normalized = normalizeName(name);
    return this.context.level2Index.has(
      compositeKey(level1.name, normalized, resolveCode(normalized, code))
    );
  }

  findOrCreateLevel3(level2: Level2, name: string, code: string | null): FindOrCreateResult<Level3> {
    const parentKey = this.level2Keys.get(level2);
    if (parentKey === undefined) {
      throw new Error(`Level2 "${level2.name}" was not created by this builder`);
    }

    const normalized = normalizeName(name);
    const resolvedCode = resolveCode(normalized, code);
    const key = compositeKey(parentKey, normalized, resolvedCode);
    const existing = this.context.level3Index.get(key);
    if (existing) {
      return { entity: existing, created: false };
    }

    const level3: Level3 = { name: normalized, code: resolvedCode };
    level2.level3.push(level3);
    this.context.level3Index.set(key, level3);
    return { entity: level3, created: true };
  }
}

function resolveCode(name: string, code: string | null): string {
  const trimmed = code === null ? '' : normalizeName(code);
  return trimmed.length > 0 ? trimmed : generateCode(name);
}
