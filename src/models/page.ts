/**
 * Page Models
 *
 * The engine consumes pages already materialized by a document reader.
 * A page exposes its tables (authoritative structure) and its full text
 * (used only for region banners).
 *
 * @module models/page
 */

/** One table cell as produced by a table extractor; absent cells are null */
export type RawCell = string | null | undefined;

/** One table row: ordered cells, possibly empty */
export type RawRow = RawCell[];

/** One table: ordered rows */
export type RawTable = RawRow[];

/**
 * A single page of a source document.
 *
 * Either accessor may throw when the underlying source is unreadable;
 * the engine propagates that as a fatal error.
 */
export interface Page {
  tables(): RawTable[];
  text(): string;
}

/**
 * Plain-data page, as received from tool input or test fixtures
 */
export interface PageData {
  tables: RawTable[];
  text: string;
}

/**
 * Wrap plain page data in the Page interface
 */
export function pageFromData(data: PageData): Page {
  return {
    tables: () => data.tables,
    text: () => data.text,
  };
}
