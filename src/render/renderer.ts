import type { FileDiff } from '../model/diff.js';
import { EncodingError, RenderOverflowError } from '../model/errors.js';
import type { ImageFormat, PageImage } from '../model/page.js';
import type { PageRasterizer } from './rasterizer.js';
import { type LayoutOptions, buildRows, measure, pageHeight } from './layout.js';
import { paginate } from './paginate.js';
import { paintPage } from './svg.js';

export interface RenderOutput {
  /** In page order; numbering across files happens later, per commit */
  pages: PageImage[];
  /** Hunks left out because a row could not fit an empty page */
  rejected: RenderOverflowError[];
}

export interface DiffRenderer {
  readonly id: string;
  readonly format: ImageFormat;
  render(file: FileDiff, layout: LayoutOptions): Promise<RenderOutput>;
}

// C0 controls other than tab, LF and CR, and U+FFFD left behind by a failed decode
const UNRENDERABLE = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F\uFFFD]/;

export function assertRenderable(file: FileDiff): void {
  for (const hunk of file.hunks) {
    for (const line of hunk.lines) {
      const match = UNRENDERABLE.exec(line.text);
      if (match) {
        const codePoint = match[0].charCodeAt(0).toString(16).toUpperCase().padStart(4, '0');
        const lineNo = line.newLineNo ?? line.oldLineNo;
        throw new EncodingError(file.path, `U+${codePoint} on line ${lineNo ?? '?'}`);
      }
    }
  }
}

export class SideBySideRenderer implements DiffRenderer {
  readonly id: string;
  readonly format: ImageFormat;

  constructor(private rasterizer: PageRasterizer) {
    this.format = rasterizer.format;
    this.id = `side-by-side-${rasterizer.format}`;
  }

  async render(file: FileDiff, layout: LayoutOptions): Promise<RenderOutput> {
    if (file.isBinary) return { pages: [], rejected: [] };
    assertRenderable(file);

    const metrics = measure(layout);
    const rows = buildRows(file, metrics);
    const { pages, rejected } = paginate(rows, layout.maxRowsPerPage);

    const images: PageImage[] = [];
    for (const page of pages) {
      const svg = paintPage(file, page, pages.length, metrics);
      images.push({
        filePath: file.path,
        pageIndex: page.pageIndex,
        image: await this.rasterizer.rasterize(svg),
        format: this.format,
        width: metrics.width,
        height: pageHeight(metrics, page.lineCount),
        rowCount: page.rows.length,
      });
    }

    return {
      pages: images,
      rejected: rejected.map(r => new RenderOverflowError(file.path, r.hunkIndex, r.rowHeight, layout.maxRowsPerPage)),
    };
  }
}
