/**
 * collision - Narrow phase between two posed shapes
 *
 * Circles are treated as a point with a radius, segments as a two-point hull
 * with a radius, polygons as a CCW hull. Hull pairs use the separating axis
 * test with reference-edge clipping for the contact points.
 */

import { closestPointOnSegment, edgeNormal, worldVertices, type Shape } from './Shape.js';
import type { Pose, Vec2 } from './types.js';
import { add, dot, length, negate, normalize, scale, sub } from './vec.js';

export interface Contact {
  normal: Vec2;        // unit, from shape A towards shape B
  penetration: number; // >= 0 while touching
  points: Vec2[];      // world-space contact points
  point: Vec2;         // average of points
}

interface Hull {
  vertices: Vec2[];
  radius: number;
}

interface AxisSeparation {
  separation: number;
  normal: Vec2;
  edge: number;
}

// Reference-face selection bias, keeps the choice stable for resting contacts
const REFERENCE_TOLERANCE = 1e-6;

function hullOf(shape: Shape, pose: Pose): Hull {
  return { vertices: worldVertices(shape, pose), radius: shape.radius };
}

function average(points: Vec2[]): Vec2 {
  const sum = points.reduce((acc, p) => add(acc, p), { x: 0, y: 0 });
  return scale(sum, 1 / points.length);
}

function makeContact(normal: Vec2, penetration: number, points: Vec2[]): Contact {
  return { normal, penetration, points, point: average(points) };
}

function flip(contact: Contact): Contact {
  return { ...contact, normal: negate(contact.normal) };
}

/**
 * Returns the contact between two shapes, or null when they are apart.
 */
export function collide(shapeA: Shape, poseA: Pose, shapeB: Shape, poseB: Pose): Contact | null {
  const a = hullOf(shapeA, poseA);
  const b = hullOf(shapeB, poseB);

  if (a.vertices.length === 1 && b.vertices.length === 1) {
    return pointPoint(a, b);
  }
  if (a.vertices.length === 1) {
    const contact = pointHull(a.vertices[0], a.radius, b);
    // pointHull's normal points from the hull to the point
    return contact ? flip(contact) : null;
  }
  if (b.vertices.length === 1) {
    return pointHull(b.vertices[0], b.radius, a);
  }
  return hullHull(a, b);
}

function pointPoint(a: Hull, b: Hull): Contact | null {
  const ca = a.vertices[0];
  const cb = b.vertices[0];
  const d = sub(cb, ca);
  const dist = length(d);
  const penetration = a.radius + b.radius - dist;
  if (penetration < 0) return null;

  const normal = dist > 0 ? scale(d, 1 / dist) : { x: 0, y: 1 };
  return makeContact(normal, penetration, [add(ca, scale(normal, a.radius - penetration / 2))]);
}

/** Contact normal points from the hull towards the point */
function pointHull(center: Vec2, pointRadius: number, hull: Hull): Contact | null {
  const vs = hull.vertices;
  const radius = pointRadius + hull.radius;
  // a two-point hull has one real edge, walking it both ways adds nothing
  const edgeCount = vs.length === 2 ? 1 : vs.length;

  let maxSeparation = -Infinity;
  let bestNormal: Vec2 = { x: 0, y: 1 };
  let closest: Vec2 = vs[0];
  let closestDist = Infinity;
  let closestNormal: Vec2 = { x: 0, y: 1 };

  for (let i = 0; i < edgeCount; i++) {
    const v1 = vs[i];
    const v2 = vs[(i + 1) % vs.length];
    const n = edgeNormal(v1, v2);
    const s = dot(sub(center, v1), n);
    if (s > maxSeparation) {
      maxSeparation = s;
      bestNormal = n;
    }
    const q = closestPointOnSegment(center, v1, v2);
    const dist = length(sub(center, q));
    if (dist < closestDist) {
      closestDist = dist;
      closest = q;
      closestNormal = n;
    }
  }

  // centre inside a polygon
  if (vs.length >= 3 && maxSeparation <= 0) {
    const onEdge = sub(center, scale(bestNormal, maxSeparation));
    return makeContact(bestNormal, radius - maxSeparation, [onEdge]);
  }

  const penetration = radius - closestDist;
  if (penetration < 0) return null;
  const normal = closestDist > 0 ? normalize(sub(center, closest)) : closestNormal;
  return makeContact(normal, penetration, [closest]);
}

/** Largest separation of `other` along the edge normals of `ref` */
function findMaxSeparation(ref: Hull, other: Hull): AxisSeparation {
  const vs = ref.vertices;
  let best: AxisSeparation = { separation: -Infinity, normal: { x: 0, y: 1 }, edge: 0 };

  for (let i = 0; i < ref.vertices.length; i++) {
    const v1 = vs[i];
    const n = edgeNormal(v1, vs[(i + 1) % vs.length]);
    let min = Infinity;
    for (const q of other.vertices) {
      min = Math.min(min, dot(sub(q, v1), n));
    }
    if (min > best.separation) {
      best = { separation: min, normal: n, edge: i };
    }
  }
  return best;
}

/** Keeps the part of a two-point segment with dot(dir, p) <= offset */
function clipSegment(points: Vec2[], dir: Vec2, offset: number): Vec2[] {
  const out: Vec2[] = [];
  const d0 = dot(dir, points[0]) - offset;
  const d1 = dot(dir, points[1]) - offset;
  if (d0 <= 0) out.push(points[0]);
  if (d1 <= 0) out.push(points[1]);
  if (d0 * d1 < 0) {
    out.push(add(points[0], scale(sub(points[1], points[0]), d0 / (d0 - d1))));
  }
  return out;
}

function hullHull(a: Hull, b: Hull): Contact | null {
  const radius = a.radius + b.radius;
  const sepA = findMaxSeparation(a, b);
  if (sepA.separation > radius) return null;
  const sepB = findMaxSeparation(b, a);
  if (sepB.separation > radius) return null;

  const flipped = sepB.separation > sepA.separation + REFERENCE_TOLERANCE;
  const ref = flipped ? b : a;
  const inc = flipped ? a : b;
  const axis = flipped ? sepB : sepA;
  const n = axis.normal;

  const rv1 = ref.vertices[axis.edge];
  const rv2 = ref.vertices[(axis.edge + 1) % ref.vertices.length];

  // incident edge: the one facing the reference normal most directly
  let incEdge = 0;
  let minDot = Infinity;
  for (let i = 0; i < inc.vertices.length; i++) {
    const d = dot(edgeNormal(inc.vertices[i], inc.vertices[(i + 1) % inc.vertices.length]), n);
    if (d < minDot) {
      minDot = d;
      incEdge = i;
    }
  }
  const incident = [inc.vertices[incEdge], inc.vertices[(incEdge + 1) % inc.vertices.length]];

  const tangent = normalize(sub(rv2, rv1));
  let clipped = clipSegment(incident, negate(tangent), -dot(tangent, rv1));
  if (clipped.length === 2) {
    clipped = clipSegment(clipped, tangent, dot(tangent, rv2));
  }

  let points = clipped.filter((p) => dot(sub(p, rv1), n) <= radius);

  if (points.length === 0) {
    // fall back to the deepest incident vertex
    let deepest = inc.vertices[0];
    for (const q of inc.vertices) {
      if (dot(sub(q, rv1), n) < dot(sub(deepest, rv1), n)) deepest = q;
    }
    points = [deepest];
  }

  const normal = flipped ? negate(n) : n;
  return makeContact(normal, radius - axis.separation, points);
}
