// Core vector math
export interface Vec2 {
  x: number;
  y: number;
}

// Anything accepted where a point or offset is expected
export type Coordinates = Vec2 | readonly [number, number];

// CSS colour string, or 0-255 channels with optional alpha
export type Color = string | readonly [number, number, number] | readonly [number, number, number, number];

// Axis-aligned bounding box in world space (y up)
export interface AABB {
  left: number;
  bottom: number;
  right: number;
  top: number;
}

// Position + rotation of a body, angle in radians
export interface Pose {
  position: Vec2;
  angle: number;
}

export type BodyKind = 'dynamic' | 'kinematic' | 'static';

// Physics configuration for World
export interface WorldConfig {
  gravity?: Vec2 | number;     // units/s², a number means (0, g) (default: no gravity)
  iterations?: number;         // velocity solver passes per step (default: 10)
  collisionSlop?: number;      // penetration left uncorrected (default: 0.5)
  correctionPercent?: number;  // share of remaining penetration removed per step (default: 0.8)
  restitutionThreshold?: number; // approach speed below which contacts don't bounce (default: 1)
  cellSize?: number;           // broadphase cell size (default: 100)
  debug?: boolean;
}

// Collision filtering, same rules as category/mask bitmasks elsewhere
export interface ShapeFilter {
  categories: number;
  mask: number;
}

// Debug drawing for an actor
export interface DrawOptions {
  angleLineWidth?: number;   // 0 = no heading line
  angleLineColor?: Color;
  centerRadius?: number;     // 0 = no centroid dot
  centerColor?: Color;
}

export enum ImagePaintMode {
  Center = 'center',
  Tile = 'tile',
}

export interface TextStyle {
  fontName?: string | null;
  fontSize?: number;
  color?: Color;
  backgroundColor?: Color | null;
}

// Text drawn with an actor, position is relative to the actor's drawn bounds
export interface TextOverlay extends TextStyle {
  text: string;
  position: Vec2;
}

// Result of Actor.getGrounding(), zeroed when nothing supports the actor
export interface Grounding {
  normal: Vec2;
  penetration: number;
  impulse: Vec2;
  position: Vec2;
  hasBody: boolean;
  friction: number;
  velocity: Vec2;
}
