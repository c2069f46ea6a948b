/**
 * PDF reading exports
 *
 * @module services/pdf
 */

export { readPdfPages, type PageReader } from './page-reader.js';
export {
  layoutPage,
  groupIntoLines,
  buildTables,
  columnAnchors,
  DEFAULT_LAYOUT_OPTIONS,
  type LayoutOptions,
  type PositionedText,
  type TextLine,
  type LineCell,
} from './layout.js';
