import type { ImageFormat } from '../model/page.js';

export interface PageRasterizer {
  readonly format: ImageFormat;
  rasterize(svg: string): Promise<Buffer>;
}

/** PNG through sharp (libvips + librsvg). sharp loads on first use. */
export class SharpRasterizer implements PageRasterizer {
  readonly format = 'png';

  async rasterize(svg: string): Promise<Buffer> {
    const { default: sharp } = await import('sharp');
    return sharp(Buffer.from(svg, 'utf-8')).png().toBuffer();
  }
}

/** Keeps the markup itself as the image. */
export class SvgRasterizer implements PageRasterizer {
  readonly format = 'svg';

  async rasterize(svg: string): Promise<Buffer> {
    return Buffer.from(svg, 'utf-8');
  }
}
