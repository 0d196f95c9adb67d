import type { Row } from './layout.js';

export interface PageLayout {
  /** 1-based */
  pageIndex: number;
  rows: Row[];
  lineCount: number;
}

export interface RejectedHunk {
  hunkIndex: number;
  rowHeight: number;
}

export interface Pagination {
  pages: PageLayout[];
  rejected: RejectedHunk[];
}

/**
 * Fill pages with rows up to `capacity` visual lines. A row that does not
 * fit what is left of a page moves to a fresh one; a hunk holding a row
 * taller than an empty page is dropped whole and reported.
 */
export function paginate(rows: Row[], capacity: number): Pagination {
  const tallest = new Map<number, number>();
  for (const row of rows) {
    if (row.height > capacity) {
      tallest.set(row.hunkIndex, Math.max(row.height, tallest.get(row.hunkIndex) ?? 0));
    }
  }

  const pages: PageLayout[] = [];
  let current: PageLayout = { pageIndex: 1, rows: [], lineCount: 0 };

  for (const row of rows) {
    if (tallest.has(row.hunkIndex)) continue;

    if (current.lineCount + row.height > capacity && current.rows.length > 0) {
      pages.push(current);
      current = { pageIndex: current.pageIndex + 1, rows: [], lineCount: 0 };
    }
    current.rows.push(row);
    current.lineCount += row.height;
  }
  if (current.rows.length > 0) pages.push(current);

  const rejected = [...tallest.entries()]
    .sort((a, b) => a[0] - b[0])
    .map(([hunkIndex, rowHeight]) => ({ hunkIndex, rowHeight }));

  return { pages, rejected };
}
