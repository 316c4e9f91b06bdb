import { describe, it, expect } from 'vitest';
import { Body } from '../src/Body.js';
import { box, circle } from '../src/Shape.js';

describe('Body', () => {
  describe('constructor', () => {
    it('should default to a dynamic body of mass 1 that cannot rotate', () => {
      const body = new Body(box(10, 10));

      expect(body.kind).toBe('dynamic');
      expect(body.mass).toBe(1);
      expect(body.inverseMass).toBe(1);
      expect(body.inverseMoment).toBe(0);
      expect(body.friction).toBe(0);
      expect(body.elasticity).toBe(0);
      expect(body.world).toBeNull();
    });

    it('should accept tuples for position and velocity', () => {
      const body = new Body(circle(5), { position: [3, 4], velocity: [1, -1] });

      expect(body.position).toEqual({ x: 3, y: 4 });
      expect(body.velocity).toEqual({ x: 1, y: -1 });
    });

    it('should give unique ids', () => {
      const a = new Body(circle(1));
      const b = new Body(circle(1));
      expect(a.id).not.toBe(b.id);
    });

    it('should give kinematic and static bodies infinite mass', () => {
      for (const kind of ['kinematic', 'static'] as const) {
        const body = new Body(box(10, 10), { kind, mass: 5, moment: 5 });
        expect(body.mass).toBe(Infinity);
        expect(body.inverseMass).toBe(0);
        expect(body.inverseMoment).toBe(0);
      }
    });
  });

  describe('impulses', () => {
    it('should change linear and angular velocity', () => {
      const body = new Body(box(10, 10), { mass: 2, moment: 4 });

      body.applyImpulseAtWorldPoint({ x: 2, y: 0 }, { x: 0, y: 1 });

      expect(body.velocity).toEqual({ x: 1, y: 0 });
      expect(body.angularVelocity).toBe(-0.5);
    });

    it('should rotate local impulses by the body angle', () => {
      const body = new Body(box(10, 10), { mass: 1, angle: Math.PI / 2 });

      body.applyImpulseAtLocalPoint({ x: 3, y: 0 });

      expect(body.velocity.x).toBeCloseTo(0);
      expect(body.velocity.y).toBeCloseTo(3);
    });

    it('should leave kinematic bodies unmoved', () => {
      const body = new Body(box(10, 10), { kind: 'kinematic', velocity: [5, 0] });

      body.applyImpulseAtWorldPoint({ x: 100, y: 100 }, { x: 0, y: 0 });

      expect(body.velocity).toEqual({ x: 5, y: 0 });
    });
  });

  describe('integration', () => {
    it('should add gravity and forces to velocity, then clear forces', () => {
      const body = new Body(box(10, 10), { mass: 2 });
      body.applyForceAtWorldPoint({ x: 2, y: 0 }, { x: 0, y: 0 });

      body.integrateVelocity(0.5, { x: 0, y: -10 });

      expect(body.velocity).toEqual({ x: 0.5, y: -5 });
      expect(body.force).toEqual({ x: 0, y: 0 });
    });

    it('should turn off-centre forces into torque', () => {
      const body = new Body(box(10, 10), { moment: 2 });
      body.applyForceAtWorldPoint({ x: 0, y: 4 }, { x: 1, y: 0 });

      expect(body.torque).toBe(4);
      body.integrateVelocity(1, { x: 0, y: 0 });
      expect(body.angularVelocity).toBe(2);
      expect(body.torque).toBe(0);
    });

    it('should move kinematic bodies by their velocity but not apply gravity', () => {
      const body = new Body(box(10, 10), { kind: 'kinematic', velocity: [2, 0] });

      body.integrateVelocity(1, { x: 0, y: -10 });
      body.integratePosition(1);

      expect(body.velocity).toEqual({ x: 2, y: 0 });
      expect(body.position).toEqual({ x: 2, y: 0 });
    });

    it('should never move static bodies', () => {
      const body = new Body(box(10, 10), { kind: 'static', velocity: [2, 0] });
      body.applyForceAtWorldPoint({ x: 5, y: 5 }, { x: 1, y: 1 });

      body.integratePosition(1);

      expect(body.position).toEqual({ x: 0, y: 0 });
      expect(body.torque).toBe(0);
    });
  });

  describe('frames', () => {
    it('should convert between local and world coordinates', () => {
      const body = new Body(box(10, 10), { position: [10, 20], angle: Math.PI / 2 });

      const world = body.localToWorld([1, 0]);
      expect(world.x).toBeCloseTo(10);
      expect(world.y).toBeCloseTo(21);

      const local = body.worldToLocal(world);
      expect(local.x).toBeCloseTo(1);
      expect(local.y).toBeCloseTo(0);
    });

    it('should include spin in the velocity of a point', () => {
      const body = new Body(circle(5), { velocity: [1, 0], angularVelocity: 2 });

      expect(body.velocityAtWorldPoint({ x: 0, y: 1 })).toEqual({ x: -1, y: 0 });
    });

    it('should report the bounding box at the current pose', () => {
      const body = new Body(box(4, 2), { position: [10, 10] });
      expect(body.boundingBox()).toEqual({ left: 8, bottom: 9, right: 12, top: 11 });
    });
  });
});
