import type { DiffLine, FileDiff } from '../model/diff.js';

export interface LayoutOptions {
  imageWidth: number;
  /** Page capacity in visual (wrapped) lines */
  maxRowsPerPage: number;
  fontSize: number;
  lineHeight: number;
}

export type CellKind = 'context' | 'removed' | 'added' | 'blank';

export interface Cell {
  kind: CellKind;
  lineNo?: number;
  /** Display text split to the column width; at least one entry */
  wrapped: string[];
}

export interface Row {
  hunkIndex: number;
  /** First row of its hunk; painted with a divider above it */
  hunkStart: boolean;
  left: Cell;
  right: Cell;
  /** Omission marker text; spans both columns when set */
  marker?: string;
  /** Visual lines this row occupies */
  height: number;
}

export interface LayoutMetrics {
  width: number;
  columnWidth: number;
  gutterWidth: number;
  signWidth: number;
  padding: number;
  charWidth: number;
  textColumns: number;
  fontSize: number;
  lineHeight: number;
  headerHeight: number;
  footerHeight: number;
}

const GUTTER_WIDTH = 56;
const SIGN_WIDTH = 14;
const CELL_PADDING = 8;
const HEADER_HEIGHT = 28;
const FOOTER_HEIGHT = 8;
const TAB = '    ';

export function measure(options: LayoutOptions): LayoutMetrics {
  const columnWidth = Math.floor(options.imageWidth / 2);
  const charWidth = options.fontSize * 0.6;
  const textWidth = columnWidth - GUTTER_WIDTH - SIGN_WIDTH - 2 * CELL_PADDING;
  return {
    width: options.imageWidth,
    columnWidth,
    gutterWidth: GUTTER_WIDTH,
    signWidth: SIGN_WIDTH,
    padding: CELL_PADDING,
    charWidth,
    textColumns: Math.max(8, Math.floor(textWidth / charWidth)),
    fontSize: options.fontSize,
    lineHeight: options.lineHeight,
    headerHeight: HEADER_HEIGHT,
    footerHeight: FOOTER_HEIGHT,
  };
}

export function pageHeight(metrics: LayoutMetrics, lineCount: number): number {
  return metrics.headerHeight + lineCount * metrics.lineHeight + metrics.footerHeight;
}

export function displayText(text: string): string {
  return text.replace(/\r$/, '').replace(/\t/g, TAB);
}

/** Hard-wrap on code points; an empty string is one empty line. */
export function wrapText(text: string, columns: number): string[] {
  const chars = Array.from(text);
  if (chars.length <= columns) return [text];
  const lines: string[] = [];
  for (let i = 0; i < chars.length; i += columns) {
    lines.push(chars.slice(i, i + columns).join(''));
  }
  return lines;
}

function cell(line: DiffLine | undefined, side: 'old' | 'new', columns: number): Cell {
  if (!line) return { kind: 'blank', wrapped: [''] };
  return {
    kind: line.kind,
    lineNo: side === 'old' ? line.oldLineNo : line.newLineNo,
    wrapped: wrapText(displayText(line.text), columns),
  };
}

function makeRow(hunkIndex: number, left: Cell, right: Cell): Row {
  return {
    hunkIndex,
    hunkStart: false,
    left,
    right,
    height: Math.max(left.wrapped.length, right.wrapped.length),
  };
}

/**
 * Lay a file's hunks out as aligned left/right rows. Context lines fill
 * both sides; a removed run followed by an added run is paired row by
 * row and the shorter side is blank-filled.
 */
export function buildRows(file: FileDiff, metrics: LayoutMetrics): Row[] {
  const rows: Row[] = [];
  const columns = metrics.textColumns;

  file.hunks.forEach((hunk, hunkIndex) => {
    const first = rows.length;
    const lines = hunk.lines;
    let i = 0;

    while (i < lines.length) {
      const line = lines[i];

      if (line.omitted !== undefined) {
        const blank = cell(undefined, 'old', columns);
        rows.push({ ...makeRow(hunkIndex, blank, blank), marker: line.text });
        i++;
        continue;
      }

      if (line.kind === 'context') {
        rows.push(makeRow(hunkIndex, cell(line, 'old', columns), cell(line, 'new', columns)));
        i++;
        continue;
      }

      const removed: DiffLine[] = [];
      while (i < lines.length && lines[i].kind === 'removed' && lines[i].omitted === undefined) {
        removed.push(lines[i++]);
      }
      const added: DiffLine[] = [];
      while (i < lines.length && lines[i].kind === 'added') {
        added.push(lines[i++]);
      }

      const span = Math.max(removed.length, added.length);
      for (let k = 0; k < span; k++) {
        rows.push(makeRow(hunkIndex, cell(removed[k], 'old', columns), cell(added[k], 'new', columns)));
      }
    }

    if (rows.length > first) rows[first].hunkStart = true;
  });

  return rows;
}
