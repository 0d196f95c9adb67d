import { describe, it, expect } from 'vitest';
import { SideBySideRenderer } from '../src/render/renderer.js';
import { SharpRasterizer, SvgRasterizer } from '../src/render/rasterizer.js';
import { RendererRegistry, createDefaultRegistry } from '../src/render/registry.js';
import type { LayoutOptions } from '../src/render/layout.js';
import { ConfigurationError, EncodingError, RenderOverflowError } from '../src/model/errors.js';
import { makePatch } from './helpers/memory-repo.js';
import { A_PY_PATCH, fileDiff } from './helpers/patches.js';

const LAYOUT: LayoutOptions = { imageWidth: 1200, maxRowsPerPage: 60, fontSize: 12, lineHeight: 20 };

const svgRenderer = new SideBySideRenderer(new SvgRasterizer());

describe('SideBySideRenderer (svg)', () => {
  it('renders the +5/-3 patch on one page', async () => {
    const { pages, rejected } = await svgRenderer.render(fileDiff('a.py', A_PY_PATCH), LAYOUT);

    expect(rejected).toEqual([]);
    expect(pages).toHaveLength(1);
    expect(pages[0]).toMatchObject({ filePath: 'a.py', pageIndex: 1, format: 'svg', width: 1200, height: 196, rowCount: 8 });

    const svg = pages[0].image.toString('utf-8');
    expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="1200" height="196"')).toBe(true);
    expect(svg.match(/<rect class="removed"/g)).toHaveLength(3);
    expect(svg.match(/<rect class="added"/g)).toHaveLength(5);
    expect(svg).toContain('>modified · 1/1</text>');
  });

  it('uses as many pages as the rows need', async () => {
    const { pages } = await svgRenderer.render(fileDiff('a.py', A_PY_PATCH), { ...LAYOUT, maxRowsPerPage: 5 });
    expect(pages.map(p => [p.pageIndex, p.rowCount])).toEqual([[1, 5], [2, 3]]);
    expect(pages[1].image.toString('utf-8')).toContain('>modified · 2/2</text>');
  });

  it('escapes markup in source text', async () => {
    const file = fileDiff('c.ts', makePatch('c.ts', 1, 1, ['+if (a < b && c > "d") {}']));
    const [page] = (await svgRenderer.render(file, LAYOUT)).pages;
    expect(page.image.toString('utf-8')).toContain('>if (a &lt; b &amp;&amp; c &gt; &quot;d&quot;) {}</text>');
  });

  it('rejects text with control characters', async () => {
    const file = fileDiff('d.txt', makePatch('d.txt', 1, 1, ['-ok', '+bad\u0000byte']));
    await expect(svgRenderer.render(file, LAYOUT)).rejects.toThrow(EncodingError);
    await expect(svgRenderer.render(file, LAYOUT)).rejects.toThrow('d.txt is not renderable text: U+0000 on line 1');
  });

  it('reports a hunk that cannot fit a page and renders the rest', async () => {
    const patch = [
      '@@ -1 +1 @@',
      '-short',
      '+fine',
      '@@ -20 +20 @@',
      '-old',
      `+${'y'.repeat(150)}`,
      '',
    ].join('\n');

    const { pages, rejected } = await svgRenderer.render(fileDiff('e.ts', patch), { ...LAYOUT, maxRowsPerPage: 2 });

    expect(pages).toHaveLength(1);
    expect(pages[0].rowCount).toBe(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toBeInstanceOf(RenderOverflowError);
    expect(rejected[0].message).toBe('Hunk 2 of e.ts has a row 3 lines tall; a page holds 2');
  });

  it('produces no pages for binary files or empty diffs', async () => {
    const binary = { ...fileDiff('logo.png', ''), isBinary: true };
    expect((await svgRenderer.render(binary, LAYOUT)).pages).toEqual([]);
    expect((await svgRenderer.render(fileDiff('empty.txt', ''), LAYOUT)).pages).toEqual([]);
  });

  it('is idempotent', async () => {
    const file = fileDiff('a.py', A_PY_PATCH);
    const first = await svgRenderer.render(file, { ...LAYOUT, maxRowsPerPage: 3 });
    const second = await svgRenderer.render(file, { ...LAYOUT, maxRowsPerPage: 3 });

    expect(second.pages.map(p => p.pageIndex)).toEqual(first.pages.map(p => p.pageIndex));
    second.pages.forEach((page, i) => {
      expect(page.image.equals(first.pages[i].image)).toBe(true);
    });
  });
});

describe('SideBySideRenderer (png)', () => {
  it('rasterizes pages to PNG', async () => {
    const renderer = new SideBySideRenderer(new SharpRasterizer());
    const { pages } = await renderer.render(fileDiff('a.py', A_PY_PATCH), LAYOUT);

    expect(pages).toHaveLength(1);
    expect(pages[0].format).toBe('png');
    expect([...pages[0].image.subarray(0, 8)]).toEqual([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
  });
});

describe('RendererRegistry', () => {
  it('serves one renderer per format', () => {
    const registry = createDefaultRegistry();
    expect(registry.get('png').id).toBe('side-by-side-png');
    expect(registry.get('svg').id).toBe('side-by-side-svg');
    expect(registry.listRenderers()).toHaveLength(2);
  });

  it('refuses a format nobody registered', () => {
    expect(() => new RendererRegistry().get('svg')).toThrow(ConfigurationError);
  });
});
