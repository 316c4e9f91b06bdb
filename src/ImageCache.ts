/**
 * ImageCache - Loaded images keyed by path
 */

import { CanvasSurface, createCanvas, type CanvasFactory } from './CanvasSurface.js';
import { MissingAssetError } from './errors.js';
import type { Surface } from './Surface.js';

export type ImageLoader = (path: string) => Promise<Surface>;

export class ImageCache {
  private images: Map<string, Surface>;
  private pending: Map<string, Promise<Surface>>;
  private loader: ImageLoader | null;

  constructor(loader: ImageLoader | null = null) {
    this.images = new Map();
    this.pending = new Map();
    this.loader = loader;
  }

  register(path: string, image: Surface): void {
    this.images.set(path, image);
  }

  has(path: string): boolean {
    return this.images.has(path);
  }

  getImage(path: string): Surface {
    const image = this.images.get(path);
    if (!image) {
      throw new MissingAssetError(path);
    }
    return image;
  }

  /**
   * Loads once; calls made while a load is in flight share it. A failed
   * load is forgotten so the path can be tried again.
   */
  async load(path: string): Promise<Surface> {
    const cached = this.images.get(path);
    if (cached) return cached;
    const inFlight = this.pending.get(path);
    if (inFlight) return inFlight;
    if (!this.loader) {
      throw new MissingAssetError(path);
    }

    const request = this.loader(path).then(
      (image) => {
        this.pending.delete(path);
        this.images.set(path, image);
        return image;
      },
      (error: unknown) => {
        this.pending.delete(path);
        throw error;
      }
    );
    this.pending.set(path, request);
    return request;
  }

  async loadAll(paths: readonly string[]): Promise<Surface[]> {
    return Promise.all(paths.map((path) => this.load(path)));
  }

  clear(): void {
    this.images.clear();
    this.pending.clear();
  }
}

/**
 * Loader for the browser: fetches through an <img> element and copies the
 * pixels onto a canvas.
 */
export function loadHtmlImage(path: string, factory: CanvasFactory = createCanvas): Promise<CanvasSurface> {
  return new Promise((resolve, reject) => {
    const img = new Image();
    img.onload = () => {
      try {
        const surface = new CanvasSurface(factory(img.naturalWidth, img.naturalHeight), factory);
        surface.ctx.drawImage(img, 0, 0);
        resolve(surface);
      } catch (error) {
        reject(error);
      }
    };
    img.onerror = () => reject(new MissingAssetError(path));
    img.src = path;
  });
}
