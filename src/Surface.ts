/**
 * Surface - The raster operations the render pipeline needs
 *
 * Coordinates are canvas pixels, y down, origin at the top-left.
 */

import type { Color, TextStyle, Vec2 } from './types.js';

// 'alpha-min' keeps the smaller alpha of source and destination per pixel
export type BlendMode = 'normal' | 'alpha-min';

export interface Surface {
  readonly width: number;
  readonly height: number;

  /** New fully transparent surface of the same backend */
  createCompatible(width: number, height: number): Surface;

  /** Replaces every pixel, alpha included */
  fill(color: Color): void;
  blit(source: Surface, at: Vec2, blend?: BlendMode): void;

  // border 0 fills, anything else strokes with that width
  drawCircle(center: Vec2, radius: number, color: Color, border?: number): void;
  drawPolygon(points: readonly Vec2[], color: Color, border?: number): void;
  drawLine(from: Vec2, to: Vec2, color: Color, width: number): void;

  /** Rasterizes a single line of text onto a new surface */
  renderText(text: string, style: Required<TextStyle>): Surface;

  scaled(width: number, height: number): Surface;
  /** Counter-clockwise, grown to fit the rotated corners */
  rotated(degrees: number): Surface;
  /** Copy with every pixel of `color` made transparent */
  withColorKey(color: Color): Surface;

  present?(): void;
}
