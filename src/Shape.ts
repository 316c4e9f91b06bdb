/**
 * Shape - Collision outlines attached to exactly one Body
 *
 * Shapes are plain tagged values. Polygon vertices are stored relative to the
 * centroid and in counter-clockwise order, so a body's position and angle
 * alone place the shape in world space.
 */

import { UnsupportedShapeError } from './errors.js';
import type { AABB, Coordinates, Pose, Vec2 } from './types.js';
import { add, cross, dot, length, lengthSq, perp, rotate, scale, sub, toVec } from './vec.js';

export interface CircleShape {
  kind: 'circle';
  radius: number;
  offset: Vec2;
}

export interface PolygonShape {
  kind: 'polygon';
  vertices: readonly Vec2[];
  radius: number; // rounding of the corners, collision only
}

export interface SegmentShape {
  kind: 'segment';
  a: Vec2;
  b: Vec2;
  radius: number; // half thickness
}

export type Shape = CircleShape | PolygonShape | SegmentShape;

export interface Bounds {
  width: number;
  height: number;
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export interface Outline {
  vertices: Vec2[];
  radius: number | null; // set for circles only
}

function unsupported(shape: never): never {
  throw new UnsupportedShapeError(shape);
}

// --- constructors ---------------------------------------------------------

export function circle(radius: number, offset: Coordinates = { x: 0, y: 0 }): CircleShape {
  return { kind: 'circle', radius, offset: toVec(offset) };
}

export function box(width: number, height: number, radius = 0): PolygonShape {
  const hw = width / 2;
  const hh = height / 2;
  return {
    kind: 'polygon',
    vertices: [
      { x: -hw, y: -hh },
      { x: hw, y: -hh },
      { x: hw, y: hh },
      { x: -hw, y: hh },
    ],
    radius,
  };
}

export function segment(a: Coordinates, b: Coordinates, radius = 1): SegmentShape {
  return { kind: 'segment', a: toVec(a), b: toVec(b), radius };
}

/**
 * Builds a polygon from points in any coordinate frame.
 * Returns the shape re-centred on the vertex average plus that average, which
 * is where the owning body has to sit for the polygon to cover `points`.
 */
export function polygonFromPoints(
  points: readonly Coordinates[],
  radius = 0
): { shape: PolygonShape; centroid: Vec2 } {
  const vs = points.map(toVec);
  const sum = vs.reduce((acc, v) => add(acc, v), { x: 0, y: 0 });
  const centroid = vs.length > 0 ? scale(sum, 1 / vs.length) : { x: 0, y: 0 };
  let vertices = vs.map((v) => sub(v, centroid));
  if (signedArea(vertices) < 0) {
    vertices = vertices.reverse();
  }
  return { shape: { kind: 'polygon', vertices, radius }, centroid };
}

/**
 * Corner points of a regular polygon inscribed in the given box, first point
 * at the top.
 */
export function regularPolygonPoints(
  sides: number,
  left: number,
  top: number,
  width: number,
  height: number
): Vec2[] {
  const radiusX = width / 2;
  const radiusY = height / 2;
  const centerX = left + radiusX;
  const centerY = top + radiusY;

  const points: Vec2[] = [];
  for (let i = 0; i < sides; i++) {
    const angle = ((360 / sides) * i - 90) * (Math.PI / 180);
    points.push({
      x: centerX + radiusX * Math.cos(angle),
      y: centerY + radiusY * Math.sin(angle),
    });
  }
  return points;
}

// --- geometry -------------------------------------------------------------

export function signedArea(vertices: readonly Vec2[]): number {
  let sum = 0;
  for (let i = 0; i < vertices.length; i++) {
    sum += cross(vertices[i], vertices[(i + 1) % vertices.length]);
  }
  return sum / 2;
}

export function boundsOf(points: readonly Vec2[]): Bounds {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    if (p.x < minX) minX = p.x;
    if (p.y < minY) minY = p.y;
    if (p.x > maxX) maxX = p.x;
    if (p.y > maxY) maxY = p.y;
  }
  return { width: maxX - minX, height: maxY - minY, minX, minY, maxX, maxY };
}

export function toWorld(local: Vec2, pose: Pose): Vec2 {
  return add(rotate(local, pose.angle), pose.position);
}

/**
 * World-space feature points: the centre of a circle, the corners of a
 * polygon, the endpoints of a segment.
 */
export function worldVertices(shape: Shape, pose: Pose): Vec2[] {
  switch (shape.kind) {
    case 'circle':
      return [toWorld(shape.offset, pose)];
    case 'polygon':
      return shape.vertices.map((v) => toWorld(v, pose));
    case 'segment':
      return [toWorld(shape.a, pose), toWorld(shape.b, pose)];
    default:
      return unsupported(shape);
  }
}

export function boundingBox(shape: Shape, pose: Pose): AABB {
  const b = boundsOf(worldVertices(shape, pose));
  const r = shape.radius;
  return { left: b.minX - r, bottom: b.minY - r, right: b.maxX + r, top: b.maxY + r };
}

/** Four corners of a width-1 rectangle around the line a→b */
export function rectangleFromLine(a: Vec2, b: Vec2): Vec2[] {
  const line = sub(b, a);
  const len = length(line);
  // zero-length segments get a vertical sliver
  const half = len === 0 ? { x: 0, y: 0.5 } : scale(perp(line), 0.5 / len);
  return [add(a, half), sub(a, half), sub(b, half), add(b, half)];
}

/**
 * Local-space outline used for drawing. Circles come back as their bounding
 * square with the radius set.
 */
export function localOutline(shape: Shape): Outline {
  switch (shape.kind) {
    case 'polygon':
      return { vertices: shape.vertices.map((v) => ({ x: v.x, y: v.y })), radius: null };
    case 'segment':
      return { vertices: rectangleFromLine(shape.a, shape.b), radius: null };
    case 'circle': {
      const { radius: r, offset: o } = shape;
      return {
        vertices: [
          { x: o.x + r, y: o.y + r },
          { x: o.x + r, y: o.y - r },
          { x: o.x - r, y: o.y - r },
          { x: o.x - r, y: o.y + r },
        ],
        radius: r,
      };
    }
    default:
      return unsupported(shape);
  }
}

/** Rescales a shape per axis about its local origin */
export function scaleShape(shape: Shape, sx: number, sy: number): Shape {
  const scaleXY = (v: Vec2): Vec2 => ({ x: v.x * sx, y: v.y * sy });
  switch (shape.kind) {
    case 'circle':
      return { ...shape, radius: Math.max(2 * shape.radius * sx, 2 * shape.radius * sy) / 2, offset: scaleXY(shape.offset) };
    case 'polygon':
      return { ...shape, vertices: shape.vertices.map(scaleXY) };
    case 'segment':
      return { ...shape, a: scaleXY(shape.a), b: scaleXY(shape.b) };
    default:
      return unsupported(shape);
  }
}

export function closestPointOnSegment(p: Vec2, a: Vec2, b: Vec2): Vec2 {
  const ab = sub(b, a);
  const lenSq = lengthSq(ab);
  if (lenSq === 0) return { x: a.x, y: a.y };
  const t = Math.max(0, Math.min(1, dot(sub(p, a), ab) / lenSq));
  return add(a, scale(ab, t));
}

/** Outward normal of the CCW edge a→b */
export function edgeNormal(a: Vec2, b: Vec2): Vec2 {
  const e = sub(b, a);
  const len = length(e);
  if (len === 0) return { x: 0, y: 0 };
  return { x: e.y / len, y: -e.x / len };
}

/**
 * Signed distance from `point` to the shape's boundary, negative inside.
 */
export function pointDistance(shape: Shape, pose: Pose, point: Vec2): number {
  switch (shape.kind) {
    case 'circle':
      return length(sub(point, toWorld(shape.offset, pose))) - shape.radius;
    case 'segment': {
      const a = toWorld(shape.a, pose);
      const b = toWorld(shape.b, pose);
      return length(sub(point, closestPointOnSegment(point, a, b))) - shape.radius;
    }
    case 'polygon': {
      const vs = worldVertices(shape, pose);
      let maxSeparation = -Infinity;
      let closest = Infinity;
      for (let i = 0; i < vs.length; i++) {
        const a = vs[i];
        const b = vs[(i + 1) % vs.length];
        maxSeparation = Math.max(maxSeparation, dot(sub(point, a), edgeNormal(a, b)));
        closest = Math.min(closest, length(sub(point, closestPointOnSegment(point, a, b))));
      }
      const inside = maxSeparation <= 0;
      return (inside ? maxSeparation : closest) - shape.radius;
    }
    default:
      return unsupported(shape);
  }
}

export function area(shape: Shape): number {
  switch (shape.kind) {
    case 'circle':
      return Math.PI * shape.radius * shape.radius;
    case 'polygon': {
      const vs = shape.vertices;
      let perimeter = 0;
      for (let i = 0; i < vs.length; i++) {
        perimeter += length(sub(vs[(i + 1) % vs.length], vs[i]));
      }
      const r = shape.radius;
      return Math.abs(signedArea(vs)) + perimeter * r + Math.PI * r * r;
    }
    case 'segment': {
      const r = shape.radius;
      return Math.PI * r * r + 2 * r * length(sub(shape.b, shape.a));
    }
    default:
      return unsupported(shape);
  }
}

/** Moment of inertia about the local origin */
export function momentFor(shape: Shape, mass: number): number {
  switch (shape.kind) {
    case 'circle':
      return mass * (shape.radius * shape.radius / 2 + lengthSq(shape.offset));
    case 'polygon': {
      const vs = shape.vertices;
      let numerator = 0;
      let denominator = 0;
      for (let i = 0; i < vs.length; i++) {
        const v1 = vs[i];
        const v2 = vs[(i + 1) % vs.length];
        const a = cross(v2, v1);
        numerator += a * (dot(v1, v1) + dot(v1, v2) + dot(v2, v2));
        denominator += a;
      }
      if (denominator === 0) return 0;
      return (mass * numerator) / (6 * denominator);
    }
    case 'segment': {
      const offset = scale(add(shape.a, shape.b), 0.5);
      const len = length(sub(shape.b, shape.a)) + 2 * shape.radius;
      return mass * ((len * len + 4 * shape.radius * shape.radius) / 12 + lengthSq(offset));
    }
    default:
      return unsupported(shape);
  }
}
