/**
 * Page layout reconstruction
 *
 * Turns positioned text fragments (PDF user-space coordinates, y grows
 * upwards) into lines, cells and tables:
 *
 *   1. Fragments are bucketed into lines by y (top of the page first).
 *   2. Within a line, fragments separated by more than cellGap become
 *      separate cells.
 *   3. Runs of consecutive lines with two or more cells form a table. The
 *      x positions of the run's cells are clustered into column anchors and
 *      each row is laid out on those anchors, empty slots as null.
 *
 * Page text is every line, cells joined with a space, one line per row.
 *
 * @module services/pdf/layout
 */

import type { PageData, RawCell, RawTable } from '../../models/page.js';

export interface PositionedText {
  text: string;
  x: number;
  y: number;
  width: number;
}

export interface LayoutOptions {
  /** Fragments within this distance below a line's top share the line */
  yTolerance: number;
  /** Horizontal gap that separates two cells */
  cellGap: number;
  /** Cells starting within this distance share a column */
  columnTolerance: number;
}

export const DEFAULT_LAYOUT_OPTIONS: LayoutOptions = {
  yTolerance: 2,
  cellGap: 6,
  columnTolerance: 8,
};

export interface LineCell {
  text: string;
  x: number;
  right: number;
}

export interface TextLine {
  y: number;
  cells: LineCell[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// LINES
// ═══════════════════════════════════════════════════════════════════════════════

function joinCells(fragments: PositionedText[], cellGap: number): LineCell[] {
  const sorted = [...fragments].sort((a, b) => a.x - b.x);
  const cells: LineCell[] = [];

  for (const fragment of sorted) {
    const token = fragment.text.replace(/\s+/g, ' ').trim();
    if (!token) {
      continue;
    }
    const right = fragment.x + fragment.width;
    const last = cells.length > 0 ? cells[cells.length - 1] : undefined;

    if (last && fragment.x - last.right <= cellGap) {
      const gap = fragment.x - last.right;
      last.text += gap > 0.5 ? ` ${token}` : token;
      last.right = Math.max(last.right, right);
    } else {
      cells.push({ text: token, x: fragment.x, right });
    }
  }

  return cells;
}

export function groupIntoLines(
  fragments: PositionedText[],
  options: LayoutOptions = DEFAULT_LAYOUT_OPTIONS
): TextLine[] {
  const sorted = fragments.filter((fragment) => fragment.text.trim()).sort((a, b) => b.y - a.y);
  const groups: Array<{ y: number; fragments: PositionedText[] }> = [];

  for (const fragment of sorted) {
    const current = groups.length > 0 ? groups[groups.length - 1] : undefined;
    if (current && current.y - fragment.y <= options.yTolerance) {
      current.fragments.push(fragment);
    } else {
      groups.push({ y: fragment.y, fragments: [fragment] });
    }
  }

  return groups
    .map((group) => ({ y: group.y, cells: joinCells(group.fragments, options.cellGap) }))
    .filter((line) => line.cells.length > 0);
}

// ═══════════════════════════════════════════════════════════════════════════════
// TABLES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Cluster cell start positions into sorted column anchors
 */
export function columnAnchors(lines: TextLine[], columnTolerance: number): number[] {
  const starts = lines.flatMap((line) => line.cells.map((cell) => cell.x)).sort((a, b) => a - b);
  const anchors: number[] = [];
  let clusterStart = Number.NEGATIVE_INFINITY;

  for (const x of starts) {
    if (x - clusterStart > columnTolerance) {
      anchors.push(x);
      clusterStart = x;
    }
  }
  return anchors;
}

function nearestAnchor(anchors: number[], x: number): number {
  let best = 0;
  for (let i = 1; i < anchors.length; i++) {
    if (Math.abs(anchors[i] - x) < Math.abs(anchors[best] - x)) {
      best = i;
    }
  }
  return best;
}

function layoutRows(lines: TextLine[], columnTolerance: number): RawTable {
  const anchors = columnAnchors(lines, columnTolerance);
  return lines.map((line) => {
    const row: RawCell[] = anchors.map(() => null);
    for (const cell of line.cells) {
      const slot = nearestAnchor(anchors, cell.x);
      const existing = row[slot];
      row[slot] = existing ? `${existing} ${cell.text}` : cell.text;
    }
    return row;
  });
}

export function buildTables(
  lines: TextLine[],
  options: LayoutOptions = DEFAULT_LAYOUT_OPTIONS
): RawTable[] {
  const tables: RawTable[] = [];
  let run: TextLine[] = [];

  const flush = (): void => {
    if (run.length > 0) {
      tables.push(layoutRows(run, options.columnTolerance));
      run = [];
    }
  };

  for (const line of lines) {
    if (line.cells.length >= 2) {
      run.push(line);
    } else {
      flush();
    }
  }
  flush();
  return tables;
}

/**
 * Plain page data (tables + text) from one page's positioned text
 */
export function layoutPage(
  fragments: PositionedText[],
  options: LayoutOptions = DEFAULT_LAYOUT_OPTIONS
): PageData {
  const lines = groupIntoLines(fragments, options);
  const text = lines.map((line) => line.cells.map((cell) => cell.text).join(' ')).join('\n');
  return { tables: buildTables(lines, options), text };
}

