/**
 * Extraction Engine Configuration
 *
 * Thresholds and keyword sets used by the row classifier and the boundary
 * detector. Source documents vary, so every threshold here is configurable;
 * the defaults match the state/LGA/ward tables of Nigerian boundary documents.
 *
 * @module services/extraction/config
 */

import { readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { normalizeName } from './normalize.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Fixed column positions for tables whose layout is known in advance.
 * Indices refer to raw cell positions, empty cells included.
 */
export interface ColumnLayout {
  level2Name: number;
  level2Code: number;
  level3Name: number;
  level3Code: number;
}

/** Whether the banner pass of a page runs before or after its tables */
export type BannerPosition = 'after_tables' | 'before_tables';

export interface EngineConfig {
  /** Ordered Level1 names; enables pre-seeding and the code-reset heuristic. null disables both. */
  referenceLevel1: string[] | null;

  /** Alternate spellings mapped to canonical Level1 names */
  level1Aliases: Record<string, string>;

  /** Start with the first reference entry active instead of waiting for a banner */
  preseedFirstReference: boolean;

  /** Accept heuristic banners missing from the reference list (always true without a list) */
  acceptUnlistedBanners: boolean;

  /** Words stripped from banner lines before matching ("KANO STATE" → "KANO") */
  bannerKeywords: string[];

  /** Words that disqualify a line as a banner (section dividers, captions) */
  bannerRejectKeywords: string[];

  /** Column-label keywords identifying header rows */
  headerKeywords: string[];

  /** Minimum distinct header keywords for a row to count as a header */
  headerMinMatches: number;

  bannerMinLength: number;
  bannerMaxLength: number;

  /** Minimum share of non-space characters that are upper-case letters */
  bannerUpperRatio: number;

  /** Minimum share of characters that are letters or spaces */
  bannerAlphaRatio: number;

  /** Longest token accepted as a plausible code */
  codeMaxLength: number;

  /** Positional classification when set; shape-based classification otherwise */
  columnLayout: ColumnLayout | null;

  bannerPosition: BannerPosition;
}

// ═══════════════════════════════════════════════════════════════════════════════
// REFERENCE DATA
// ═══════════════════════════════════════════════════════════════════════════════

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Resolves from both src/services/extraction and dist/services/extraction */
export const REFERENCE_DATA_PATH = path.resolve(
  __dirname,
  '..',
  '..',
  '..',
  'data',
  'nigerian-states.json'
);

const ReferenceDataSchema = z.object({
  description: z.string().optional(),
  states: z.array(z.string().min(1)).min(1),
  aliases: z.record(z.string()).default({}),
});

export interface ReferenceData {
  states: string[];
  aliases: Record<string, string>;
}

let _referenceData: ReferenceData | null = null;

/**
 * Load the bundled Level1 reference ordering and aliases (cached after first read)
 *
 * @throws Error if the data file is missing or malformed
 */
export function loadReferenceData(): ReferenceData {
  if (_referenceData) {
    return _referenceData;
  }
  const raw: unknown = JSON.parse(readFileSync(REFERENCE_DATA_PATH, 'utf-8'));
  const parsed = ReferenceDataSchema.parse(raw);
  _referenceData = { states: parsed.states, aliases: parsed.aliases };
  return _referenceData;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════════

export const DEFAULT_HEADER_KEYWORDS = [
  'S/N',
  'LGA NAME',
  'LGA CODE',
  'WARD NAME',
  'WARD CODE',
  'REGISTRATION AREA',
  'RA CODE',
];

export const DEFAULT_BANNER_KEYWORDS = ['STATE'];

export const DEFAULT_BANNER_REJECT_KEYWORDS = [
  'TABLE',
  'PAGE',
  'TOTAL',
  'SUMMARY',
  'LIST OF',
  'CONTINUED',
  'WARDS',
  'LOCAL GOVERNMENT',
  'COMMISSION',
];

/** Layout of the six-column LGA/ward tables: name, code, ward, -, -, ward code */
export const LGA_WARD_SIX_COLUMN_LAYOUT: ColumnLayout = {
  level2Name: 0,
  level2Code: 1,
  level3Name: 2,
  level3Code: 5,
};

/**
 * Default engine configuration, including the bundled reference ordering
 */
export function getDefaultEngineConfig(): EngineConfig {
  const reference = loadReferenceData();
  return {
    referenceLevel1: [...reference.states],
    level1Aliases: { ...reference.aliases },
    preseedFirstReference: true,
    acceptUnlistedBanners: false,
    bannerKeywords: [...DEFAULT_BANNER_KEYWORDS],
    bannerRejectKeywords: [...DEFAULT_BANNER_REJECT_KEYWORDS],
    headerKeywords: [...DEFAULT_HEADER_KEYWORDS],
    headerMinMatches: 2,
    bannerMinLength: 3,
    bannerMaxLength: 40,
    bannerUpperRatio: 0.8,
    bannerAlphaRatio: 0.7,
    codeMaxLength: 5,
    columnLayout: null,
    bannerPosition: 'after_tables',
  };
}

/**
 * Merge overrides onto the defaults and normalize every name and keyword
 * the way row text is normalized, so comparisons are plain string equality.
 */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const merged: EngineConfig = { ...getDefaultEngineConfig(), ...overrides };

  const aliases: Record<string, string> = {};
  for (const [alias, canonical] of Object.entries(merged.level1Aliases)) {
    aliases[normalizeName(alias)] = normalizeName(canonical);
  }

  const reference = merged.referenceLevel1
    ? merged.referenceLevel1.map(normalizeName).filter((name) => name.length > 0)
    : null;

  return {
    ...merged,
    referenceLevel1: reference && reference.length > 0 ? reference : null,
    level1Aliases: aliases,
    bannerKeywords: merged.bannerKeywords.map(normalizeName),
    bannerRejectKeywords: merged.bannerRejectKeywords.map(normalizeName),
    headerKeywords: merged.headerKeywords.map(normalizeName),
  };
}
