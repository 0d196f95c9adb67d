import type { ImageFormat } from '../model/page.js';
import { ConfigurationError } from '../model/errors.js';
import type { DiffRenderer } from './renderer.js';
import { SideBySideRenderer } from './renderer.js';
import { SharpRasterizer, SvgRasterizer } from './rasterizer.js';

export class RendererRegistry {
  private renderers = new Map<ImageFormat, DiffRenderer>();

  register(renderer: DiffRenderer): void {
    this.renderers.set(renderer.format, renderer);
  }

  get(format: ImageFormat): DiffRenderer {
    const renderer = this.renderers.get(format);
    if (!renderer) {
      throw new ConfigurationError(`No renderer registered for "${format}" output`);
    }
    return renderer;
  }

  listRenderers(): DiffRenderer[] {
    return Array.from(this.renderers.values());
  }
}

export function createDefaultRegistry(): RendererRegistry {
  const registry = new RendererRegistry();
  registry.register(new SideBySideRenderer(new SharpRasterizer()));
  registry.register(new SideBySideRenderer(new SvgRasterizer()));
  return registry;
}
