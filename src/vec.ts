/**
 * vec - 2D vector helpers
 * All helpers return new vectors, inputs are never mutated
 */

import type { Vec2 } from './types.js';

export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Vec2, s: number): Vec2 {
  return { x: v.x * s, y: v.y * s };
}

export function negate(v: Vec2): Vec2 {
  return { x: -v.x, y: -v.y };
}

export function dot(a: Vec2, b: Vec2): number {
  return a.x * b.x + a.y * b.y;
}

/** z component of the 3D cross product */
export function cross(a: Vec2, b: Vec2): number {
  return a.x * b.y - a.y * b.x;
}

/** scalar (angular) × vector */
export function crossSV(s: number, v: Vec2): Vec2 {
  return { x: -s * v.y, y: s * v.x };
}

export function length(v: Vec2): number {
  return Math.sqrt(v.x * v.x + v.y * v.y);
}

export function lengthSq(v: Vec2): number {
  return v.x * v.x + v.y * v.y;
}

export function normalize(v: Vec2): Vec2 {
  const len = length(v);
  if (len === 0) return { x: 0, y: 0 };
  return { x: v.x / len, y: v.y / len };
}

export function rotate(v: Vec2, radians: number): Vec2 {
  if (radians === 0) return { x: v.x, y: v.y };
  const c = Math.cos(radians);
  const s = Math.sin(radians);
  return { x: v.x * c - v.y * s, y: v.x * s + v.y * c };
}

/** Counter-clockwise perpendicular */
export function perp(v: Vec2): Vec2 {
  return { x: -v.y, y: v.x };
}

export function angleOf(v: Vec2): number {
  return Math.atan2(v.y, v.x);
}

export function distance(a: Vec2, b: Vec2): number {
  return length(sub(b, a));
}

export function toVec(xy: Vec2 | readonly [number, number]): Vec2 {
  return isTuple(xy) ? { x: xy[0], y: xy[1] } : { x: xy.x, y: xy.y };
}

function isTuple(xy: Vec2 | readonly [number, number]): xy is readonly [number, number] {
  return Array.isArray(xy);
}

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function toDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}
