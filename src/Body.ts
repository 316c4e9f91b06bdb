/**
 * Body - A rigid body owning exactly one shape
 * Angles are radians here; the actor layer converts to degrees.
 */

// Import World type for type annotations
import type { World } from './World.js';
import { boundingBox, toWorld, type Shape } from './Shape.js';
import type { AABB, BodyKind, Coordinates, Pose, ShapeFilter, Vec2 } from './types.js';
import { add, cross, crossSV, rotate, scale, sub, toVec } from './vec.js';

export interface BodyConfig {
  kind?: BodyKind;
  mass?: number;      // ignored unless dynamic
  moment?: number;    // Infinity = cannot rotate
  position?: Coordinates;
  angle?: number;     // radians
  velocity?: Coordinates;
  angularVelocity?: number; // radians/s
  friction?: number;
  elasticity?: number;
}

// Collides with everything
export const ALL_CATEGORIES: ShapeFilter = { categories: 0xffffffff, mask: 0xffffffff };

let nextBodyId = 1;

export class Body {
  readonly id: number;
  world: World | null;
  shape: Shape;
  kind: BodyKind;

  // Pose and motion
  position: Vec2;
  angle: number;
  velocity: Vec2;
  angularVelocity: number;

  // Accumulated per step, cleared after integration
  force: Vec2;
  torque: number;

  // Contact properties
  friction: number;
  elasticity: number;
  surfaceVelocity: Vec2;
  group: number; // non-zero groups never collide with themselves
  filter: ShapeFilter;

  mass: number;
  moment: number;

  constructor(shape: Shape, config: BodyConfig = {}) {
    this.id = nextBodyId++;
    this.world = null;
    this.shape = shape;
    this.kind = config.kind ?? 'dynamic';

    this.position = config.position ? toVec(config.position) : { x: 0, y: 0 };
    this.angle = config.angle ?? 0;
    this.velocity = config.velocity ? toVec(config.velocity) : { x: 0, y: 0 };
    this.angularVelocity = config.angularVelocity ?? 0;

    this.force = { x: 0, y: 0 };
    this.torque = 0;

    this.friction = config.friction ?? 0;
    this.elasticity = config.elasticity ?? 0;
    this.surfaceVelocity = { x: 0, y: 0 };
    this.group = 0;
    this.filter = { ...ALL_CATEGORIES };

    this.mass = this.kind === 'dynamic' ? config.mass ?? 1 : Infinity;
    this.moment = this.kind === 'dynamic' ? config.moment ?? Infinity : Infinity;
  }

  get inverseMass(): number {
    if (this.kind !== 'dynamic') return 0;
    return this.mass > 0 && Number.isFinite(this.mass) ? 1 / this.mass : 0;
  }

  get inverseMoment(): number {
    if (this.kind !== 'dynamic') return 0;
    return this.moment > 0 && Number.isFinite(this.moment) ? 1 / this.moment : 0;
  }

  get pose(): Pose {
    return { position: this.position, angle: this.angle };
  }

  localToWorld(point: Coordinates): Vec2 {
    return toWorld(toVec(point), this.pose);
  }

  worldToLocal(point: Coordinates): Vec2 {
    return rotate(sub(toVec(point), this.position), -this.angle);
  }

  boundingBox(): AABB {
    return boundingBox(this.shape, this.pose);
  }

  velocityAtWorldPoint(point: Vec2): Vec2 {
    return add(this.velocity, crossSV(this.angularVelocity, sub(point, this.position)));
  }

  applyForceAtWorldPoint(force: Coordinates, point: Coordinates): void {
    if (this.kind === 'static') return;
    const f = toVec(force);
    this.force = add(this.force, f);
    this.torque += cross(sub(toVec(point), this.position), f);
  }

  /** Force and point both in body coordinates */
  applyForceAtLocalPoint(force: Coordinates, point: Coordinates = { x: 0, y: 0 }): void {
    this.applyForceAtWorldPoint(rotate(toVec(force), this.angle), this.localToWorld(point));
  }

  applyImpulseAtWorldPoint(impulse: Coordinates, point: Coordinates): void {
    const j = toVec(impulse);
    this.velocity = add(this.velocity, scale(j, this.inverseMass));
    this.angularVelocity += this.inverseMoment * cross(sub(toVec(point), this.position), j);
  }

  /** Impulse and point both in body coordinates */
  applyImpulseAtLocalPoint(impulse: Coordinates, point: Coordinates = { x: 0, y: 0 }): void {
    this.applyImpulseAtWorldPoint(rotate(toVec(impulse), this.angle), this.localToWorld(point));
  }

  applyTorque(torque: number): void {
    if (this.kind === 'static') return;
    this.torque += torque;
  }

  /**
   * Gravity and accumulated forces into velocity, dynamic bodies only.
   * Forces are cleared afterwards.
   */
  integrateVelocity(dt: number, gravity: Vec2): void {
    if (this.kind === 'dynamic') {
      const acceleration = add(gravity, scale(this.force, this.inverseMass));
      this.velocity = add(this.velocity, scale(acceleration, dt));
      this.angularVelocity += this.torque * this.inverseMoment * dt;
    }
    this.force = { x: 0, y: 0 };
    this.torque = 0;
  }

  integratePosition(dt: number): void {
    if (this.kind === 'static') return;
    this.position = add(this.position, scale(this.velocity, dt));
    this.angle += this.angularVelocity * dt;
  }
}
