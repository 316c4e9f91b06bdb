import { describe, it, expect, beforeEach, vi } from 'vitest';
import { World } from '../src/World.js';
import { Body } from '../src/Body.js';
import { box, circle } from '../src/Shape.js';

const DT = 1 / 240;

describe('World', () => {
  let world: World;

  beforeEach(() => {
    world = new World({ gravity: -900 });
  });

  describe('constructor', () => {
    it('should read a number as vertical gravity', () => {
      expect(world.gravity).toEqual({ x: 0, y: -900 });
    });

    it('should default to no gravity and 10 iterations', () => {
      const plain = new World();
      expect(plain.gravity).toEqual({ x: 0, y: 0 });
      expect(plain.iterations).toBe(10);
      expect(plain.collisionSlop).toBe(0.5);
    });
  });

  describe('registerBody / unregisterBody', () => {
    it('should track membership on the body', () => {
      const body = new Body(circle(5));

      world.registerBody(body);
      world.registerBody(body);
      expect(world.bodies).toEqual([body]);
      expect(body.world).toBe(world);

      world.unregisterBody(body);
      expect(world.bodies).toEqual([]);
      expect(body.world).toBeNull();
    });
  });

  describe('step', () => {
    it('should accelerate free bodies under gravity', () => {
      const free = new World({ gravity: -10 });
      const body = new Body(circle(1));
      free.registerBody(body);

      free.step(0.1);

      expect(body.velocity.y).toBe(-1);
      expect(body.position.y).toBeCloseTo(-0.1);
    });

    it('should keep a box resting on a static floor', () => {
      const floor = new Body(box(200, 20), { kind: 'static' });
      const crate = new Body(box(20, 20), { mass: 1, position: [0, 20] });
      world.registerBody(floor);
      world.registerBody(crate);

      for (let i = 0; i < 240; i++) world.step(DT);

      expect(crate.position.y).toBeCloseTo(20);
      expect(crate.velocity.y).toBeCloseTo(0);
      expect(floor.position).toEqual({ x: 0, y: 0 });
    });

    it('should bounce when both bodies are elastic', () => {
      const bouncy = new World();
      const floor = new Body(box(200, 20), { kind: 'static', elasticity: 1 });
      const ball = new Body(circle(10), { mass: 1, position: [0, 20], velocity: [0, -100], elasticity: 1 });
      bouncy.registerBody(floor);
      bouncy.registerBody(ball);

      bouncy.step(1 / 60);

      expect(ball.velocity.y).toBeCloseTo(100);
    });

    it('should let bodies of the same group pass through each other', () => {
      const a = new Body(box(20, 20), { position: [0, 0] });
      const b = new Body(box(20, 20), { position: [5, 0] });
      a.group = 3;
      b.group = 3;
      world.registerBody(a);
      world.registerBody(b);

      world.step(DT);

      expect(world.shapeQuery(a)).toEqual([]);
      expect(a.position.x).toBe(0);
      expect(b.position.x).toBe(5);
    });

    it('should push overlapping bodies apart', () => {
      const plain = new World();
      const a = new Body(box(20, 20), { position: [0, 0] });
      const b = new Body(box(20, 20), { position: [15, 0] });
      plain.registerBody(a);
      plain.registerBody(b);

      plain.step(DT);

      expect(a.position.x).toBeLessThan(0);
      expect(b.position.x).toBeGreaterThan(15);
    });

    it('should log every 60 steps when debug is on', () => {
      const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const noisy = new World({ debug: true });

      for (let i = 0; i < 60; i++) noisy.step(DT);

      expect(logSpy).toHaveBeenCalledTimes(1);
      expect(logSpy).toHaveBeenCalledWith('[World] Step 60: bodies=0, contacts=0');
      logSpy.mockRestore();
    });
  });

  describe('filtersAllow', () => {
    it('should apply categories and masks both ways', () => {
      const a = new Body(circle(1));
      const b = new Body(circle(1));
      expect(World.filtersAllow(a, b)).toBe(true);

      a.filter = { categories: 0b01, mask: 0b10 };
      b.filter = { categories: 0b10, mask: 0b10 };
      expect(World.filtersAllow(a, b)).toBe(false);

      b.filter = { categories: 0b10, mask: 0b01 };
      expect(World.filtersAllow(a, b)).toBe(true);
    });

    it('should never let a body collide with itself', () => {
      const a = new Body(circle(1));
      expect(World.filtersAllow(a, a)).toBe(false);
    });
  });

  describe('queries', () => {
    let floor: Body;
    let crate: Body;

    beforeEach(() => {
      floor = new Body(box(200, 20), { kind: 'static' });
      crate = new Body(box(20, 20), { mass: 1, position: [0, 20] });
      world.registerBody(floor);
      world.registerBody(crate);
      world.step(DT);
    });

    it('should point shape query normals from the other body towards the queried one', () => {
      const [contact] = world.shapeQuery(crate);

      expect(contact.other).toBe(floor);
      expect(contact.normal.x).toBeCloseTo(0);
      expect(contact.normal.y).toBeCloseTo(1);
      expect(contact.penetration).toBeCloseTo(0);
    });

    it('should report the impulse each side received in the last step', () => {
      const [onCrate] = world.shapeQuery(crate);
      const [onFloor] = world.shapeQuery(floor);

      expect(onCrate.impulse.y).toBeCloseTo(3.75);
      expect(onFloor.impulse.y).toBeCloseTo(-3.75);
      expect(onFloor.normal.y).toBeCloseTo(-1);
    });

    it('should find bodies containing a point', () => {
      expect(world.pointQuery({ x: 0, y: 20 })).toEqual([crate]);
      expect(world.pointQuery({ x: 50, y: 0 })).toEqual([floor]);
      expect(world.pointQuery({ x: 500, y: 500 })).toEqual([]);
    });
  });
});
