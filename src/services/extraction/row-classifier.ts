/**
 * Row Classifier
 *
 * Pure decision table for one table row or one text line. Every rule is an
 * exported predicate so it can be tested on its own; classifyRow and
 * classifyTextLine apply them in a fixed order and return the first match.
 *
 * Table rows:  noise → table_header → (positional | shape) record rules → noise
 * Text lines:  listed Level1 name → heuristic banner → noise
 *
 * @module services/extraction/row-classifier
 */

import type { RawRow } from '../../models/page.js';
import type { EngineConfig } from './config.js';
import { normalizeCell, normalizeName } from './normalize.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CLASSIFICATION TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type RowCategory =
  | 'noise'
  | 'table_header'
  | 'region_banner'
  | 'level2_record'
  | 'level3_record';

export type NoiseReason =
  | 'empty'
  | 'too_few_cells'
  | 'unrecognized_shape'
  | 'length_out_of_bounds'
  | 'contains_digits'
  | 'rejected_keyword'
  | 'case_ratio'
  | 'alpha_ratio'
  | 'unlisted_name'
  | 'header_line';

/** Name/code pair of a record */
export interface RecordFields {
  name: string;
  code: string;
}

export interface NoiseClassification {
  kind: 'noise';
  reason: NoiseReason;
}

export interface TableHeaderClassification {
  kind: 'table_header';
}

export interface RegionBannerClassification {
  kind: 'region_banner';
  /** Canonical Level1 name (aliases applied, banner keywords stripped) */
  name: string;
  /** Whether the name is in the reference ordering */
  listed: boolean;
}

export interface Level2RecordClassification {
  kind: 'level2_record';
  name: string;
  /** null when the layout carries a name without a code */
  code: string | null;
  /** Two-cell name+code row that could equally be a Level3 record */
  ambiguous: boolean;
  /** Level3 record carried on the same row */
  child: RecordFields | null;
}

export interface Level3RecordClassification {
  kind: 'level3_record';
  name: string;
  code: string;
}

export type RowClassification =
  | NoiseClassification
  | TableHeaderClassification
  | Level2RecordClassification
  | Level3RecordClassification;

export type LineClassification = NoiseClassification | RegionBannerClassification;

type ClassifierConfig = Pick<
  EngineConfig,
  | 'headerKeywords'
  | 'headerMinMatches'
  | 'codeMaxLength'
  | 'columnLayout'
  | 'referenceLevel1'
  | 'level1Aliases'
  | 'bannerKeywords'
  | 'bannerRejectKeywords'
  | 'bannerMinLength'
  | 'bannerMaxLength'
  | 'bannerUpperRatio'
  | 'bannerAlphaRatio'
>;

// ═══════════════════════════════════════════════════════════════════════════════
// PREDICATES
// ═══════════════════════════════════════════════════════════════════════════════

const ALPHANUMERIC = /^[A-Za-z0-9]+$/;
const HAS_DIGIT = /\d/;
const HAS_LETTER = /[A-Za-z]/;
const NUMERIC = /^\d+$/;

/**
 * Short token that is purely numeric, or alphanumeric with at least one digit
 */
export function isPlausibleCode(value: string, maxLength: number): boolean {
  return (
    value.length > 0 &&
    value.length <= maxLength &&
    ALPHANUMERIC.test(value) &&
    HAS_DIGIT.test(value)
  );
}

/**
 * Purely numeric code, the signal used for boundary detection
 */
export function isNumericCode(value: string): boolean {
  return NUMERIC.test(value);
}

/**
 * A cell usable as an entity name: has a letter and is not itself a code
 */
export function isNameCell(value: string, codeMaxLength: number): boolean {
  return HAS_LETTER.test(value) && !isPlausibleCode(value, codeMaxLength);
}

/**
 * Count of cells with content after trimming
 */
export function countNonEmptyCells(row: RawRow): number {
  return row.map(normalizeCell).filter((cell) => cell.length > 0).length;
}

/**
 * Row is noise when fewer than two cells carry content
 */
export function isNoiseRow(row: RawRow): boolean {
  return countNonEmptyCells(row) < 2;
}

/**
 * Header when the row text contains at least headerMinMatches distinct column keywords
 */
export function isTableHeader(
  row: RawRow,
  config: Pick<EngineConfig, 'headerKeywords' | 'headerMinMatches'>
): boolean {
  const text = normalizeName(row.map(normalizeCell).join(' '));
  let matches = 0;
  for (const keyword of new Set(config.headerKeywords)) {
    if (keyword.length > 0 && text.includes(keyword)) {
      matches++;
    }
  }
  return matches >= config.headerMinMatches;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function containsWord(text: string, word: string): boolean {
  if (word.length === 0) return false;
  return new RegExp(`(^|[^A-Z0-9])${escapeRegExp(word)}($|[^A-Z0-9])`).test(text);
}

/**
 * Canonical Level1 name for a banner candidate: aliases applied before and
 * after stripping banner keywords ("FEDERAL CAPITAL TERRITORY" → "FCT",
 * "KANO STATE" → "KANO").
 */
export function resolveLevel1Name(
  value: string,
  config: Pick<EngineConfig, 'level1Aliases' | 'bannerKeywords'>
): string {
  const normalized = normalizeName(value);
  const direct = config.level1Aliases[normalized];
  if (direct) return direct;

  let stripped = normalized;
  for (const keyword of config.bannerKeywords) {
    if (keyword.length === 0) continue;
    stripped = stripped.replace(
      new RegExp(`(^|[^A-Z0-9])${escapeRegExp(keyword)}(?=$|[^A-Z0-9])`, 'g'),
      '$1'
    );
  }
  stripped = normalizeName(stripped);
  return config.level1Aliases[stripped] ?? stripped;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TABLE ROWS
// ═══════════════════════════════════════════════════════════════════════════════

function classifyPositional(cells: string[], config: ClassifierConfig): RowClassification {
  const layout = config.columnLayout;
  if (!layout) {
    return { kind: 'noise', reason: 'unrecognized_shape' };
  }
  const at = (index: number): string => cells[index] ?? '';
  const level2Name = at(layout.level2Name);
  const level2Code = at(layout.level2Code);
  const level3Name = at(layout.level3Name);
  const level3Code = at(layout.level3Code);

  const child =
    isNameCell(level3Name, config.codeMaxLength) &&
    isPlausibleCode(level3Code, config.codeMaxLength)
      ? { name: normalizeName(level3Name), code: normalizeName(level3Code) }
      : null;

  if (
    isNameCell(level2Name, config.codeMaxLength) &&
    (level2Code.length === 0 || isPlausibleCode(level2Code, config.codeMaxLength))
  ) {
    return {
      kind: 'level2_record',
      name: normalizeName(level2Name),
      code: level2Code.length > 0 ? normalizeName(level2Code) : null,
      ambiguous: false,
      child,
    };
  }

  if (child) {
    return { kind: 'level3_record', name: child.name, code: child.code };
  }

  return { kind: 'noise', reason: 'unrecognized_shape' };
}

function classifyByShape(filled: string[], config: ClassifierConfig): RowClassification {
  const isName = (value: string): boolean => isNameCell(value, config.codeMaxLength);
  const isCode = (value: string): boolean => isPlausibleCode(value, config.codeMaxLength);
  const n = filled.length;
  const [first, second] = filled;

  if (n === 2) {
    if (isName(first) && isCode(second)) {
      return {
        kind: 'level2_record',
        name: normalizeName(first),
        code: normalizeName(second),
        ambiguous: true,
        child: null,
      };
    }
    return { kind: 'noise', reason: 'unrecognized_shape' };
  }

  const trailingName = filled[n - 2];
  const trailingCode = filled[n - 1];
  const hasTrailingPair = isName(trailingName) && isCode(trailingCode);

  if (isName(first) && isCode(second)) {
    return {
      kind: 'level2_record',
      name: normalizeName(first),
      code: normalizeName(second),
      ambiguous: false,
      child:
        n >= 4 && hasTrailingPair
          ? { name: normalizeName(trailingName), code: normalizeName(trailingCode) }
          : null,
    };
  }

  if (hasTrailingPair) {
    return {
      kind: 'level3_record',
      name: normalizeName(trailingName),
      code: normalizeName(trailingCode),
    };
  }

  return { kind: 'noise', reason: 'unrecognized_shape' };
}

/**
 * Classify one table row.
 *
 * Level2 records are read as (name = first cell, code = second cell); Level3
 * records as the trailing name/code pair. With a column layout configured the
 * designated positions are used instead.
 */
export function classifyRow(row: RawRow, config: ClassifierConfig): RowClassification {
  const cells = row.map(normalizeCell);
  const filled = cells.filter((cell) => cell.length > 0);

  if (isNoiseRow(cells)) {
    return { kind: 'noise', reason: filled.length === 0 ? 'empty' : 'too_few_cells' };
  }
  if (isTableHeader(cells, config)) {
    return { kind: 'table_header' };
  }
  if (config.columnLayout) {
    return classifyPositional(cells, config);
  }
  return classifyByShape(filled, config);
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEXT LINES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Classify one free-text line as a region banner or noise.
 *
 * A line naming a reference Level1 is always a banner. A table header line
 * never is. Otherwise the line must pass the length, digit, reject-keyword and
 * case/alpha ratio checks.
 */
export function classifyTextLine(line: string, config: ClassifierConfig): LineClassification {
  const trimmed = line.replace(/\s+/g, ' ').trim();
  if (trimmed.length === 0) {
    return { kind: 'noise', reason: 'empty' };
  }
  if (isTableHeader([trimmed], config)) {
    return { kind: 'noise', reason: 'header_line' };
  }

  const name = resolveLevel1Name(trimmed, config);
  const reference = config.referenceLevel1;
  const listed = reference !== null && reference.includes(name);
  if (listed) {
    return { kind: 'region_banner', name, listed: true };
  }

  if (trimmed.length < config.bannerMinLength || trimmed.length > config.bannerMaxLength) {
    return { kind: 'noise', reason: 'length_out_of_bounds' };
  }
  if (HAS_DIGIT.test(trimmed)) {
    return { kind: 'noise', reason: 'contains_digits' };
  }
  const upperLine = normalizeName(trimmed);
  if (config.bannerRejectKeywords.some((keyword) => containsWord(upperLine, keyword))) {
    return { kind: 'noise', reason: 'rejected_keyword' };
  }

  const nonSpace = trimmed.replace(/\s/g, '');
  const upperLetters = (trimmed.match(/[A-Z]/g) ?? []).length;
  if (upperLetters / nonSpace.length < config.bannerUpperRatio) {
    return { kind: 'noise', reason: 'case_ratio' };
  }
  const alphaOrSpace = (trimmed.match(/[A-Za-z ]/g) ?? []).length;
  if (alphaOrSpace / trimmed.length < config.bannerAlphaRatio) {
    return { kind: 'noise', reason: 'alpha_ratio' };
  }

  if (name.length === 0) {
    return { kind: 'noise', reason: 'unlisted_name' };
  }
  return { kind: 'region_banner', name, listed: false };
}
