/**
 * render - Shape, costume and text compositing onto a Surface
 */

import type { Camera } from './Camera.js';
import type { Costume } from './Costume.js';
import { boundsOf, localOutline, type Shape } from './Shape.js';
import type { Surface } from './Surface.js';
import { ImagePaintMode, type Color, type DrawOptions, type Pose, type TextOverlay, type TextStyle, type Vec2 } from './types.js';
import { add, normalize, rotate, scale, sub, toDegrees } from './vec.js';

const SOLID: Color = [255, 255, 255, 255];

export const DEFAULT_TEXT_STYLE: Required<TextStyle> = {
  fontName: null,
  fontSize: 20,
  color: 'black',
  backgroundColor: null,
};

/**
 * Repeats `image` over `dest`, aligned so a tile corner falls on `start`
 */
export function tileImage(image: Surface, dest: Surface, start: Vec2 = { x: 0, y: 0 }): void {
  const w = image.width;
  const h = image.height;
  if (w <= 0 || h <= 0) return;

  let startX = start.x;
  let startY = start.y;
  if (startX < 0) startX = w - (-startX % w);
  if (startY < 0) startY = h - (-startY % h);
  startX = (startX % w) - w;
  startY = (startY % h) - h;

  for (let x = Math.round(startX); x < dest.width; x += w) {
    for (let y = Math.round(startY); y < dest.height; y += h) {
      dest.blit(image, { x, y });
    }
  }
}

export function drawTexts(
  surface: Surface,
  texts: Iterable<TextOverlay>,
  offset: Vec2 = { x: 0, y: 0 }
): void {
  for (const overlay of texts) {
    const style: Required<TextStyle> = {
      fontName: overlay.fontName ?? DEFAULT_TEXT_STYLE.fontName,
      fontSize: overlay.fontSize ?? DEFAULT_TEXT_STYLE.fontSize,
      color: overlay.color ?? DEFAULT_TEXT_STYLE.color,
      backgroundColor: overlay.backgroundColor ?? DEFAULT_TEXT_STYLE.backgroundColor,
    };
    surface.blit(surface.renderText(overlay.text, style), add(overlay.position, offset));
  }
}

function drawOutline(
  target: Surface,
  outline: readonly Vec2[],
  radius: number | null,
  color: Color,
  border: number
): void {
  if (radius !== null) {
    target.drawCircle({ x: target.width / 2, y: target.height / 2 }, radius, color, border);
  } else {
    target.drawPolygon(outline, color, border);
  }
}

/**
 * Draws one shape with its costume, debug marks and texts onto `target`.
 *
 * Everything is composed on a transparent scratch surface the size of the
 * shape's screen bounds, which is then blitted at the bounds' top-left.
 */
export function drawShape(
  target: Surface,
  shape: Shape,
  pose: Pose,
  texts: Iterable<TextOverlay>,
  color: Color,
  border: number,
  drawOptions: DrawOptions | null,
  camera: Camera,
  costume: Costume | null = null
): void {
  // Local outline plus centroid and heading, the last two are removed below
  const outline = localOutline(shape);
  let points: Vec2[] = [...outline.vertices, { x: 0, y: 0 }, { x: 1, y: 0 }];

  points = points.map((p) => add(rotate(p, pose.angle), pose.position));
  points = camera.apply(points);
  const radius = outline.radius !== null ? outline.radius * camera.scale : null;

  // y up to canvas y down
  points = points.map((p) => ({ x: p.x, y: target.height - p.y }));

  const centroid = points[points.length - 2];
  const heading = normalize(sub(points[points.length - 1], centroid));
  const vertices = points.slice(0, -2);

  const bounds = boundsOf(vertices);
  const offset = { x: bounds.minX, y: bounds.minY };
  const local = vertices.map((v) => sub(v, offset));

  const scratch = target.createCompatible(bounds.width, bounds.height);
  drawOutline(scratch, local, radius, color, border);

  const image = costume?.getImage();
  if (costume && image) {
    const mask = target.createCompatible(bounds.width, bounds.height);
    drawOutline(mask, local, radius, SOLID, border);

    let frame = image;
    if (camera.scale !== 1) {
      frame = frame.scaled(Math.trunc(frame.width * camera.scale), Math.trunc(frame.height * camera.scale));
    }
    if (costume.paintMode === ImagePaintMode.Tile) {
      const tiled = target.createCompatible(bounds.width, bounds.height);
      tileImage(frame, tiled);
      frame = tiled;
    }

    const angle = pose.angle + camera.theta;
    if (angle !== 0) {
      frame = frame.rotated(toDegrees(angle));
    }

    // image centre on the shape's centroid
    const topLeft = sub(centroid, { x: frame.width / 2, y: frame.height / 2 });
    scratch.blit(frame, sub(topLeft, offset));
    scratch.blit(mask, { x: 0, y: 0 }, 'alpha-min');
  }

  if (drawOptions) {
    const start = sub(centroid, offset);
    const lineWidth = drawOptions.angleLineWidth ?? 0;
    if (lineWidth > 0) {
      const length = radius ?? Math.max(bounds.width, bounds.height, 2) / 2;
      scratch.drawLine(
        start,
        add(start, scale(heading, length)),
        drawOptions.angleLineColor ?? 'black',
        Math.round(lineWidth * camera.scale)
      );
    }
    const centerRadius = drawOptions.centerRadius ?? 0;
    if (centerRadius > 0) {
      scratch.drawCircle(start, centerRadius * camera.scale, drawOptions.centerColor ?? 'magenta');
    }
  }

  drawTexts(scratch, texts);

  target.blit(scratch, offset);
}
