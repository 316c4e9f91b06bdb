/**
 * Costume - A named, scalable image set with its own animation
 */

import { Animation, type Clock } from './Animation.js';
import type { ImageCache } from './ImageCache.js';
import type { Surface } from './Surface.js';
import { ImagePaintMode, type Color, type Coordinates, type Vec2 } from './types.js';
import { toVec } from './vec.js';

export interface CostumeConfig {
  scaleXY?: Coordinates;              // default: (1, 1)
  transparentColor?: Color | null;    // colour key; without one images keep their own alpha
  paintMode?: ImagePaintMode;         // default: Center
  clock?: Clock;
}

export class Costume {
  readonly name: string;
  transparentColor: Color | null;
  paintMode: ImagePaintMode;
  readonly animation: Animation;

  private images: Surface[];
  private scaledImages: Surface[];
  private _scaleXY: Vec2;

  constructor(name: string, config: CostumeConfig = {}) {
    this.name = name;
    this.transparentColor = config.transparentColor ?? null;
    this.paintMode = config.paintMode ?? ImagePaintMode.Center;
    this.animation = new Animation({ clock: config.clock });

    this.images = [];
    this.scaledImages = [];
    this._scaleXY = config.scaleXY ? toVec(config.scaleXY) : { x: 1, y: 1 };
  }

  get scaleXY(): Vec2 {
    return { ...this._scaleXY };
  }

  /** Re-derives every scaled copy from the originals */
  set scaleXY(value: Coordinates) {
    this._scaleXY = toVec(value);
    this.scaledImages = this.images.map((image) => this.scaleImage(image));
  }

  get length(): number {
    return this.images.length;
  }

  /** Unscaled images, in frame order */
  get originals(): readonly Surface[] {
    return this.images;
  }

  addImages(paths: string | readonly string[], cache: ImageCache): void {
    const list = typeof paths === 'string' ? [paths] : paths;
    this.addSurfaces(list.map((path) => cache.getImage(path)));
  }

  addSurfaces(images: readonly Surface[]): void {
    for (const loaded of images) {
      const image = this.transparentColor !== null ? loaded.withColorKey(this.transparentColor) : loaded;
      this.images.push(image);
      this.scaledImages.push(this.scaleImage(image));
    }
  }

  update(): void {
    this.animation.update(this.images.length);
  }

  /** Scaled image of the current frame, undefined while the costume is empty */
  getImage(): Surface | undefined {
    return this.scaledImages[this.animation.frameIndex];
  }

  private scaleImage(image: Surface): Surface {
    const { x, y } = this._scaleXY;
    if (x === 1 && y === 1) return image;
    return image.scaled(image.width * x, image.height * y);
  }
}
