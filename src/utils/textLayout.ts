/**
 * Layout heuristics over positioned text items.
 *
 * Algorithm for table detection:
 * 1. Group text items into rows by baseline
 * 2. Split each row into column segments on wide horizontal gaps
 * 3. A table is a run of consecutive rows with the same number of columns
 *    (at least two) whose column starts line up
 */

/** A run of text with its PDF-space position (origin bottom-left) */
export interface PositionedText {
  text: string;
  x: number;
  /** Baseline, measured from the bottom of the page */
  y: number;
  width: number;
  /** Font height in user space */
  height: number;
}

export interface TextRow {
  y: number;
  items: PositionedText[];
}

interface ColumnSegment {
  x: number;
  text: string;
}

const DEFAULT_FONT_SIZE = 10;
const MIN_COLUMNS = 2;
const MIN_TABLE_ROWS = 3;
const COLUMN_TOLERANCE_RATIO = 0.03; // 3% of page width
const COLUMN_GAP_FACTOR = 1.5;       // gap wider than 1.5 em starts a new column

function fontSizeOf(item: PositionedText): number {
  return item.height > 0 ? item.height : DEFAULT_FONT_SIZE;
}

/**
 * Group items into visual rows, top of the page first, each row left to right.
 * Whitespace-only items are dropped.
 */
export function groupIntoRows(items: PositionedText[]): TextRow[] {
  const sorted = items
    .filter(item => item.text.trim().length > 0)
    .sort((a, b) => b.y - a.y || a.x - b.x);

  const rows: TextRow[] = [];
  let current: TextRow | null = null;

  for (const item of sorted) {
    const tolerance = Math.max(2, fontSizeOf(item) * 0.5);
    if (current && Math.abs(current.y - item.y) <= tolerance) {
      current.items.push(item);
    } else {
      current = { y: item.y, items: [item] };
      rows.push(current);
    }
  }

  for (const row of rows) {
    row.items.sort((a, b) => a.x - b.x);
  }
  return rows;
}

/**
 * Render rows as plain text, one line per row
 */
export function rowsToText(rows: TextRow[]): string {
  return rows
    .map(row => row.items.map(item => item.text.trim()).join(' '))
    .join('\n');
}

function splitIntoColumns(row: TextRow): ColumnSegment[] {
  const segments: ColumnSegment[] = [];
  let previous: PositionedText | null = null;

  for (const item of row.items) {
    const last = segments[segments.length - 1];
    const gap = previous ? item.x - (previous.x + previous.width) : 0;

    if (!last || !previous || gap > fontSizeOf(item) * COLUMN_GAP_FACTOR) {
      segments.push({ x: item.x, text: item.text.trim() });
    } else {
      last.text = `${last.text} ${item.text.trim()}`;
    }
    previous = item;
  }

  return segments;
}

function columnsAligned(a: ColumnSegment[], b: ColumnSegment[], tolerance: number): boolean {
  if (a.length !== b.length) return false;
  return a.every((segment, i) => Math.abs(segment.x - b[i].x) <= tolerance);
}

/**
 * Count table-like blocks among the rows of a page
 */
export function countTables(rows: TextRow[], pageWidth: number): number {
  const tolerance = pageWidth * COLUMN_TOLERANCE_RATIO;
  const columns = rows.map(splitIntoColumns);

  let tables = 0;
  let i = 0;
  while (i < columns.length) {
    const start = columns[i];
    if (start.length < MIN_COLUMNS) {
      i++;
      continue;
    }

    let end = i + 1;
    while (end < columns.length && columnsAligned(start, columns[end], tolerance)) {
      end++;
    }

    if (end - i >= MIN_TABLE_ROWS) {
      tables++;
      i = end;
    } else {
      i++;
    }
  }

  return tables;
}
