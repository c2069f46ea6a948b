/**
 * Name, cell and key normalization shared by the classifier and the builder.
 *
 * @module services/extraction/normalize
 */

import type { RawCell } from '../../models/page.js';

/** Sentinel code for names without a usable word */
export const FALLBACK_CODE = 'XX';

const KEY_SEPARATOR = '\u001f';

/**
 * Trim, collapse inner whitespace, upper-case
 */
export function normalizeName(value: string): string {
  return value.replace(/\s+/g, ' ').trim().toUpperCase();
}

/**
 * Normalize a raw table cell: null/undefined become '', whitespace collapses
 */
export function normalizeCell(cell: RawCell): string {
  if (cell === null || cell === undefined) {
    return '';
  }
  return cell.replace(/\s+/g, ' ').trim();
}

/**
 * Deterministic fallback code from the initials of a name's words.
 *
 * @example
 * generateCode('North East') // 'NE'
 * generateCode('--')         // 'XX'
 */
export function generateCode(name: string): string {
  const initials = normalizeName(name)
    .split(/[^A-Z0-9]+/)
    .filter((word) => word.length > 0)
    .map((word) => word[0])
    .join('');
  return initials.length > 0 ? initials : FALLBACK_CODE;
}

/**
 * Composite identity key from already-normalized parts
 */
export function compositeKey(...parts: string[]): string {
  return parts.join(KEY_SEPARATOR);
}
