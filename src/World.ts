/**
 * World - Physics simulation container
 * Fixed-step rigid bodies with impulse contacts
 */

import type { Body } from './Body.js';
import { collide, type Contact } from './collision.js';
import { pointDistance } from './Shape.js';
import { SpatialHash } from './SpatialHash.js';
import type { AABB, Vec2, WorldConfig } from './types.js';
import { add, cross, dot, negate, perp, scale, sub } from './vec.js';

/** A contact between two bodies as seen from one of them */
export interface ContactInfo {
  other: Body;
  normal: Vec2;       // unit, from the other body towards this one
  penetration: number;
  point: Vec2;
  impulse: Vec2;      // impulse this body received in the last step
}

// Solver state for one touching pair during a step
interface Arbiter {
  bodyA: Body;
  bodyB: Body;
  contact: Contact;
  tangent: Vec2;
  normalMass: number;
  tangentMass: number;
  friction: number;
  velocityBias: number;
  normalImpulse: number;
  tangentImpulse: number;
}

export class World {
  bodies: Body[];

  gravity: Vec2;
  iterations: number;
  collisionSlop: number;
  correctionPercent: number;
  restitutionThreshold: number;
  debug: boolean;
  stepCount: number;

  private hash: SpatialHash;
  private arbiters: Arbiter[];

  constructor(config: WorldConfig = {}) {
    this.bodies = [];

    const gravity = config.gravity ?? { x: 0, y: 0 };
    this.gravity = typeof gravity === 'number' ? { x: 0, y: gravity } : { ...gravity };
    this.iterations = config.iterations ?? 10;
    this.collisionSlop = config.collisionSlop ?? 0.5;
    this.correctionPercent = config.correctionPercent ?? 0.8;
    this.restitutionThreshold = config.restitutionThreshold ?? 1;
    this.debug = config.debug ?? false;
    this.stepCount = 0;

    this.hash = new SpatialHash(config.cellSize ?? 100);
    this.arbiters = [];
  }

  registerBody(body: Body): void {
    if (!this.bodies.includes(body)) {
      this.bodies.push(body);
      body.world = this;
    }
  }

  unregisterBody(body: Body): void {
    const index = this.bodies.indexOf(body);
    if (index !== -1) {
      this.bodies.splice(index, 1);
      body.world = null;
      this.arbiters = this.arbiters.filter((arb) => arb.bodyA !== body && arb.bodyB !== body);
    }
  }

  /**
   * Group and category/mask rules, the same ones queries use
   */
  static filtersAllow(a: Body, b: Body): boolean {
    if (a === b) return false;
    if (a.group !== 0 && a.group === b.group) return false;
    return (a.filter.categories & b.filter.mask) !== 0 && (b.filter.categories & a.filter.mask) !== 0;
  }

  step(dt: number): void {
    this.stepCount++;

    // Gravity and forces
    for (const body of this.bodies) {
      body.integrateVelocity(dt, this.gravity);
    }

    // Broad phase, then narrow phase for pairs that can respond
    this.hash.clear();
    for (const body of this.bodies) {
      this.hash.insert(body);
    }
    this.arbiters = [];
    for (const [a, b] of this.hash.getPairs()) {
      if (a.kind !== 'dynamic' && b.kind !== 'dynamic') continue;
      if (!World.filtersAllow(a, b)) continue;
      const contact = collide(a.shape, a.pose, b.shape, b.pose);
      if (contact) {
        this.arbiters.push(this.prepare(a, b, contact));
      }
    }

    // Velocities
    for (let i = 0; i < this.iterations; i++) {
      for (const arb of this.arbiters) {
        this.solve(arb);
      }
    }

    for (const body of this.bodies) {
      body.integratePosition(dt);
    }

    // Push overlapping bodies apart, leaving the slop so resting contacts persist
    for (const arb of this.arbiters) {
      this.correctPositions(arb);
    }

    if (this.debug && this.stepCount % 60 === 0) {
      console.log(`[World] Step ${this.stepCount}: bodies=${this.bodies.length}, contacts=${this.arbiters.length}`);
    }
  }

  /**
   * Fresh contacts between `body` and every other body touching it now.
   * Impulses come from the last step where the pair was solved.
   */
  shapeQuery(body: Body): ContactInfo[] {
    const box = body.boundingBox();
    const found: ContactInfo[] = [];

    for (const other of this.bodies) {
      if (!World.filtersAllow(body, other)) continue;
      if (!overlaps(box, other.boundingBox())) continue;
      const contact = collide(other.shape, other.pose, body.shape, body.pose);
      if (!contact) continue;
      found.push({
        other,
        normal: contact.normal,
        penetration: contact.penetration,
        point: contact.point,
        impulse: this.lastImpulse(body, other),
      });
    }
    return found;
  }

  /** Bodies whose shape contains the point (signed distance <= 0) */
  pointQuery(point: Vec2): Body[] {
    return this.bodies.filter((body) => pointDistance(body.shape, body.pose, point) <= 0);
  }

  private lastImpulse(body: Body, other: Body): Vec2 {
    for (const arb of this.arbiters) {
      if (arb.bodyA === other && arb.bodyB === body) return arbiterImpulse(arb);
      if (arb.bodyA === body && arb.bodyB === other) return negate(arbiterImpulse(arb));
    }
    return { x: 0, y: 0 };
  }

  private prepare(a: Body, b: Body, contact: Contact): Arbiter {
    const n = contact.normal;
    const t = perp(n);
    const rA = sub(contact.point, a.position);
    const rB = sub(contact.point, b.position);

    const effectiveMass = (axis: Vec2): number => {
      const rnA = cross(rA, axis);
      const rnB = cross(rB, axis);
      const k = a.inverseMass + b.inverseMass + a.inverseMoment * rnA * rnA + b.inverseMoment * rnB * rnB;
      return k > 0 ? 1 / k : 0;
    };

    const approach = dot(relativeVelocity(a, b, contact.point), n);
    const elasticity = a.elasticity * b.elasticity;

    return {
      bodyA: a,
      bodyB: b,
      contact,
      tangent: t,
      normalMass: effectiveMass(n),
      tangentMass: effectiveMass(t),
      friction: a.friction * b.friction,
      velocityBias: approach < -this.restitutionThreshold ? -elasticity * approach : 0,
      normalImpulse: 0,
      tangentImpulse: 0,
    };
  }

  private solve(arb: Arbiter): void {
    const { bodyA: a, bodyB: b, contact, tangent: t } = arb;
    const n = contact.normal;
    const p = contact.point;

    // Normal impulse, accumulated and clamped so bodies only push
    const vn = dot(relativeVelocity(a, b, p), n);
    const previousNormal = arb.normalImpulse;
    arb.normalImpulse = Math.max(previousNormal + arb.normalMass * (arb.velocityBias - vn), 0);
    applyPair(a, b, scale(n, arb.normalImpulse - previousNormal), p);

    // Friction, with surface velocity as the target slip
    const surface = sub(a.surfaceVelocity, b.surfaceVelocity);
    const vt = dot(sub(relativeVelocity(a, b, p), surface), t);
    const maxFriction = arb.friction * arb.normalImpulse;
    const previousTangent = arb.tangentImpulse;
    arb.tangentImpulse = clamp(previousTangent - arb.tangentMass * vt, -maxFriction, maxFriction);
    applyPair(a, b, scale(t, arb.tangentImpulse - previousTangent), p);
  }

  private correctPositions(arb: Arbiter): void {
    const { bodyA: a, bodyB: b, contact } = arb;
    const totalInverseMass = a.inverseMass + b.inverseMass;
    if (totalInverseMass === 0) return;

    const depth = Math.max(contact.penetration - this.collisionSlop, 0);
    if (depth === 0) return;
    const correction = scale(contact.normal, (depth * this.correctionPercent) / totalInverseMass);
    a.position = sub(a.position, scale(correction, a.inverseMass));
    b.position = add(b.position, scale(correction, b.inverseMass));
  }
}

function relativeVelocity(a: Body, b: Body, point: Vec2): Vec2 {
  return sub(b.velocityAtWorldPoint(point), a.velocityAtWorldPoint(point));
}

/** Equal and opposite impulses, `impulse` acts on b */
function applyPair(a: Body, b: Body, impulse: Vec2, point: Vec2): void {
  a.applyImpulseAtWorldPoint(negate(impulse), point);
  b.applyImpulseAtWorldPoint(impulse, point);
}

/** Total impulse received by bodyB */
function arbiterImpulse(arb: Arbiter): Vec2 {
  return add(scale(arb.contact.normal, arb.normalImpulse), scale(arb.tangent, arb.tangentImpulse));
}

function overlaps(a: AABB, b: AABB): boolean {
  return a.left <= b.right && b.left <= a.right && a.bottom <= b.top && b.bottom <= a.top;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
