import type { FileDiff } from '../model/diff.js';
import type { Cell, CellKind, LayoutMetrics, Row } from './layout.js';
import { pageHeight } from './layout.js';
import type { PageLayout } from './paginate.js';

export const PALETTE = {
  background: '#ffffff',
  text: '#24292e',
  muted: '#6a737d',
  border: '#e1e4e8',
  header: '#f6f8fa',
  gutter: '#f6f8fa',
  gutterText: '#959da5',
  marker: '#f1f8ff',
  removed: { fill: '#ffeef0', sign: '#cb2431' },
  added: { fill: '#e6ffed', sign: '#22863a' },
  blank: { fill: '#fafbfc' },
} as const;

/** CSS class per cell kind. Context cells carry none. */
export const VISUAL_CLASS: Record<CellKind, string | undefined> = {
  removed: 'removed',
  added: 'added',
  blank: 'blank',
  context: undefined,
};

const FONT_FAMILY = "'DejaVu Sans Mono', 'SF Mono', Menlo, Consolas, monospace";

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function classAttr(kind: CellKind): string {
  const name = VISUAL_CLASS[kind];
  return name ? ` class="${name}"` : '';
}

function cellFill(kind: CellKind): string | undefined {
  switch (kind) {
    case 'removed': return PALETTE.removed.fill;
    case 'added': return PALETTE.added.fill;
    case 'blank': return PALETTE.blank.fill;
    case 'context': return undefined;
  }
}

function baseline(metrics: LayoutMetrics, y: number, line: number): number {
  return y + line * metrics.lineHeight + Math.round(metrics.lineHeight * 0.7);
}

function paintCell(out: string[], c: Cell, x: number, y: number, height: number, metrics: LayoutMetrics): void {
  const fill = cellFill(c.kind);
  if (fill) {
    out.push(`<rect${classAttr(c.kind)} x="${x}" y="${y}" width="${metrics.columnWidth}" height="${height}" fill="${fill}"/>`);
  }
  out.push(`<rect x="${x}" y="${y}" width="${metrics.gutterWidth}" height="${height}" fill="${PALETTE.gutter}"/>`);

  if (c.lineNo !== undefined) {
    out.push(
      `<text x="${x + metrics.gutterWidth - 6}" y="${baseline(metrics, y, 0)}" text-anchor="end" fill="${PALETTE.gutterText}">${c.lineNo}</text>`,
    );
  }

  if (c.kind === 'removed' || c.kind === 'added') {
    const sign = c.kind === 'removed' ? '-' : '+';
    const color = c.kind === 'removed' ? PALETTE.removed.sign : PALETTE.added.sign;
    out.push(`<text x="${x + metrics.gutterWidth + 3}" y="${baseline(metrics, y, 0)}" fill="${color}">${sign}</text>`);
  }

  if (c.kind === 'blank') return;

  const textX = x + metrics.gutterWidth + metrics.signWidth + metrics.padding;
  c.wrapped.forEach((segment, line) => {
    if (segment === '') return;
    out.push(`<text${classAttr(c.kind)} x="${textX}" y="${baseline(metrics, y, line)}">${escapeXml(segment)}</text>`);
  });
}

function paintRow(out: string[], row: Row, y: number, metrics: LayoutMetrics): void {
  const height = row.height * metrics.lineHeight;

  if (row.marker !== undefined) {
    out.push(`<rect x="0" y="${y}" width="${metrics.width}" height="${height}" fill="${PALETTE.marker}"/>`);
    out.push(
      `<text class="omitted" x="${metrics.width / 2}" y="${baseline(metrics, y, 0)}" text-anchor="middle" font-style="italic" fill="${PALETTE.muted}">${escapeXml(row.marker)}</text>`,
    );
  } else {
    paintCell(out, row.left, 0, y, height, metrics);
    paintCell(out, row.right, metrics.columnWidth, y, height, metrics);
  }

  if (row.hunkStart) {
    out.push(`<line x1="0" y1="${y}" x2="${metrics.width}" y2="${y}" stroke="${PALETTE.border}"/>`);
  }
}

/** Markup for one page of one file. */
export function paintPage(file: FileDiff, page: PageLayout, pageCount: number, metrics: LayoutMetrics): string {
  const height = pageHeight(metrics, page.lineCount);
  const width = metrics.width;
  const out: string[] = [];

  out.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" ` +
      `font-family="${FONT_FAMILY}" font-size="${metrics.fontSize}" fill="${PALETTE.text}" xml:space="preserve">`,
  );
  out.push(`<rect width="${width}" height="${height}" fill="${PALETTE.background}"/>`);

  const title = file.oldPath && file.oldPath !== file.path ? `${file.oldPath} → ${file.path}` : file.path;
  const headerBaseline = Math.round(metrics.headerHeight * 0.65);
  out.push(`<rect width="${width}" height="${metrics.headerHeight}" fill="${PALETTE.header}"/>`);
  out.push(`<text x="8" y="${headerBaseline}" font-weight="bold">${escapeXml(title)}</text>`);
  out.push(
    `<text x="${width - 8}" y="${headerBaseline}" text-anchor="end" fill="${PALETTE.muted}">${file.changeKind} · ${page.pageIndex}/${pageCount}</text>`,
  );

  let y = metrics.headerHeight;
  for (const row of page.rows) {
    paintRow(out, row, y, metrics);
    y += row.height * metrics.lineHeight;
  }

  out.push(
    `<line x1="${metrics.columnWidth}" y1="${metrics.headerHeight}" x2="${metrics.columnWidth}" y2="${y}" stroke="${PALETTE.border}"/>`,
  );
  out.push('</svg>');
  return out.join('\n');
}
