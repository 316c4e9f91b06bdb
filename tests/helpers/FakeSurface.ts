import type { BlendMode, Surface } from '../../src/Surface.js';
import type { Color, TextStyle, Vec2 } from '../../src/types.js';

export type SurfaceOp =
  | { op: 'fill'; color: Color }
  | { op: 'blit'; source: FakeSurface; at: Vec2; blend: BlendMode }
  | { op: 'circle'; center: Vec2; radius: number; color: Color; border: number }
  | { op: 'polygon'; points: Vec2[]; color: Color; border: number }
  | { op: 'line'; from: Vec2; to: Vec2; color: Color; width: number };

/**
 * In-memory surface that records every drawing call
 */
export class FakeSurface implements Surface {
  readonly width: number;
  readonly height: number;
  readonly ops: SurfaceOp[] = [];
  label: string;
  transparent: boolean;
  // what produced this surface: 'scaled', 'rotated 90', 'text hello', ...
  origin: string;
  colorKey: Color | null = null;
  presented = 0;

  constructor(width: number, height: number, label = 'surface', transparent = false) {
    this.width = width;
    this.height = height;
    this.label = label;
    this.transparent = transparent;
    this.origin = label;
  }

  private derive(width: number, height: number, origin: string): FakeSurface {
    const out = new FakeSurface(width, height, this.label, this.transparent);
    out.origin = origin;
    return out;
  }

  createCompatible(width: number, height: number): FakeSurface {
    return this.derive(width, height, 'scratch');
  }

  fill(color: Color): void {
    this.ops.push({ op: 'fill', color });
  }

  blit(source: Surface, at: Vec2, blend: BlendMode = 'normal'): void {
    if (!(source instanceof FakeSurface)) throw new TypeError('FakeSurface only blits FakeSurfaces');
    this.ops.push({ op: 'blit', source, at: { ...at }, blend });
  }

  drawCircle(center: Vec2, radius: number, color: Color, border = 0): void {
    this.ops.push({ op: 'circle', center: { ...center }, radius, color, border });
  }

  drawPolygon(points: readonly Vec2[], color: Color, border = 0): void {
    this.ops.push({ op: 'polygon', points: points.map((p) => ({ ...p })), color, border });
  }

  drawLine(from: Vec2, to: Vec2, color: Color, width: number): void {
    this.ops.push({ op: 'line', from: { ...from }, to: { ...to }, color, width });
  }

  renderText(text: string, style: Required<TextStyle>): FakeSurface {
    return this.derive(text.length * 10, style.fontSize, `text ${text}`);
  }

  scaled(width: number, height: number): FakeSurface {
    return this.derive(width, height, `scaled ${width}x${height}`);
  }

  rotated(degrees: number): FakeSurface {
    return this.derive(this.width, this.height, `rotated ${degrees}`);
  }

  withColorKey(color: Color): FakeSurface {
    const out = this.derive(this.width, this.height, 'keyed');
    out.colorKey = color;
    out.transparent = true;
    return out;
  }

  present(): void {
    this.presented++;
  }

  opsOf<K extends SurfaceOp['op']>(kind: K): Extract<SurfaceOp, { op: K }>[] {
    return this.ops.filter((op): op is Extract<SurfaceOp, { op: K }> => op.op === kind);
  }
}
