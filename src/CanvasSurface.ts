/**
 * CanvasSurface - Surface over a Canvas 2D context
 */

import type { BlendMode, Surface } from './Surface.js';
import type { Color, TextStyle, Vec2 } from './types.js';
import { toRadians } from './vec.js';

export type CanvasFactory = (width: number, height: number) => HTMLCanvasElement;

export const createCanvas: CanvasFactory = (width, height) => {
  const canvas = document.createElement('canvas');
  canvas.width = width;
  canvas.height = height;
  return canvas;
};

/** CSS colour for a named/hex string or 0-255 channel tuple */
export function toCssColor(color: Color): string {
  if (typeof color === 'string') return color;
  if (color.length === 4) {
    const [r, g, b, a] = color;
    return `rgba(${r}, ${g}, ${b}, ${a / 255})`;
  }
  const [r, g, b] = color;
  return `rgb(${r}, ${g}, ${b})`;
}

function toPixels(value: number): number {
  return Math.max(0, Math.round(value));
}

// drawImage throws InvalidStateError for a source canvas with no pixels
function isEmpty(canvas: HTMLCanvasElement): boolean {
  return canvas.width === 0 || canvas.height === 0;
}

export class CanvasSurface implements Surface {
  readonly canvas: HTMLCanvasElement;
  readonly ctx: CanvasRenderingContext2D;
  private factory: CanvasFactory;

  constructor(canvas: HTMLCanvasElement, factory: CanvasFactory = createCanvas) {
    const ctx = canvas.getContext('2d');
    if (!ctx) {
      throw new Error('Canvas 2D context unavailable');
    }
    this.canvas = canvas;
    this.ctx = ctx;
    this.factory = factory;
  }

  get width(): number {
    return this.canvas.width;
  }

  get height(): number {
    return this.canvas.height;
  }

  createCompatible(width: number, height: number): CanvasSurface {
    return new CanvasSurface(this.factory(toPixels(width), toPixels(height)), this.factory);
  }

  fill(color: Color): void {
    this.ctx.clearRect(0, 0, this.width, this.height);
    this.ctx.fillStyle = toCssColor(color);
    this.ctx.fillRect(0, 0, this.width, this.height);
  }

  blit(source: Surface, at: Vec2, blend: BlendMode = 'normal'): void {
    const image = CanvasSurface.canvasOf(source);
    if (isEmpty(image)) return;
    this.ctx.save();
    // alpha-min is drawn as destination-in
    this.ctx.globalCompositeOperation = blend === 'alpha-min' ? 'destination-in' : 'source-over';
    this.ctx.drawImage(image, at.x, at.y);
    this.ctx.restore();
  }

  drawCircle(center: Vec2, radius: number, color: Color, border = 0): void {
    const ctx = this.ctx;
    ctx.beginPath();
    if (border > 0) {
      // stroke stays inside the radius
      ctx.arc(center.x, center.y, Math.max(radius - border / 2, 0), 0, Math.PI * 2);
      ctx.lineWidth = border;
      ctx.strokeStyle = toCssColor(color);
      ctx.stroke();
    } else {
      ctx.arc(center.x, center.y, radius, 0, Math.PI * 2);
      ctx.fillStyle = toCssColor(color);
      ctx.fill();
    }
  }

  drawPolygon(points: readonly Vec2[], color: Color, border = 0): void {
    if (points.length === 0) return;
    const ctx = this.ctx;
    ctx.beginPath();
    ctx.moveTo(points[0].x, points[0].y);
    for (let i = 1; i < points.length; i++) {
      ctx.lineTo(points[i].x, points[i].y);
    }
    ctx.closePath();
    if (border > 0) {
      ctx.lineWidth = border;
      ctx.strokeStyle = toCssColor(color);
      ctx.stroke();
    } else {
      ctx.fillStyle = toCssColor(color);
      ctx.fill();
    }
  }

  drawLine(from: Vec2, to: Vec2, color: Color, width: number): void {
    const ctx = this.ctx;
    ctx.beginPath();
    ctx.moveTo(from.x, from.y);
    ctx.lineTo(to.x, to.y);
    ctx.lineWidth = Math.max(width, 1);
    ctx.strokeStyle = toCssColor(color);
    ctx.stroke();
  }

  renderText(text: string, style: Required<TextStyle>): CanvasSurface {
    const font = `${style.fontSize}px ${style.fontName ?? 'sans-serif'}`;
    this.ctx.font = font;
    const width = Math.ceil(this.ctx.measureText(text).width);
    const height = Math.ceil(style.fontSize * 1.2);

    const out = this.createCompatible(width, height);
    if (style.backgroundColor !== null) {
      out.fill(style.backgroundColor);
    }
    out.ctx.font = font;
    out.ctx.textBaseline = 'top';
    out.ctx.fillStyle = toCssColor(style.color);
    out.ctx.fillText(text, 0, 0);
    return out;
  }

  scaled(width: number, height: number): CanvasSurface {
    const out = this.createCompatible(width, height);
    if (isEmpty(this.canvas)) return out;
    out.ctx.drawImage(this.canvas, 0, 0, out.width, out.height);
    return out;
  }

  rotated(degrees: number): CanvasSurface {
    const theta = toRadians(degrees);
    const cos = Math.abs(Math.cos(theta));
    const sin = Math.abs(Math.sin(theta));
    const out = this.createCompatible(this.width * cos + this.height * sin, this.width * sin + this.height * cos);
    if (isEmpty(this.canvas)) return out;

    out.ctx.translate(out.width / 2, out.height / 2);
    // canvas y points down, so counter-clockwise is a negative angle
    out.ctx.rotate(-theta);
    out.ctx.drawImage(this.canvas, -this.width / 2, -this.height / 2);
    return out;
  }

  withColorKey(color: Color): CanvasSurface {
    const [kr, kg, kb] = this.resolveRgb(color);
    return this.mapPixels((data) => {
      for (let i = 0; i < data.length; i += 4) {
        if (data[i] === kr && data[i + 1] === kg && data[i + 2] === kb) {
          data[i + 3] = 0;
        }
      }
    });
  }

  private mapPixels(edit: (data: Uint8ClampedArray) => void): CanvasSurface {
    const out = this.createCompatible(this.width, this.height);
    if (isEmpty(this.canvas)) return out;
    const image = this.ctx.getImageData(0, 0, this.width, this.height);
    edit(image.data);
    out.ctx.putImageData(image, 0, 0);
    return out;
  }

  // Named colours go through the context so every CSS form resolves
  private resolveRgb(color: Color): [number, number, number] {
    if (typeof color !== 'string') {
      return [color[0], color[1], color[2]];
    }
    const probe = this.createCompatible(1, 1);
    probe.fill(color);
    const { data } = probe.ctx.getImageData(0, 0, 1, 1);
    return [data[0], data[1], data[2]];
  }

  private static canvasOf(surface: Surface): HTMLCanvasElement {
    if (!(surface instanceof CanvasSurface)) {
      throw new TypeError('CanvasSurface can only blit other CanvasSurfaces');
    }
    return surface.canvas;
  }
}
