import { describe, it, expect } from 'vitest';
import { collide } from '../src/collision.js';
import { box, circle, segment } from '../src/Shape.js';
import type { Pose } from '../src/types.js';

const at = (x: number, y: number, angle = 0): Pose => ({ position: { x, y }, angle });

describe('collide', () => {
  describe('circle and circle', () => {
    it('should report overlap along the centre line', () => {
      const contact = collide(circle(1), at(0, 0), circle(1), at(1.5, 0));

      expect(contact).not.toBeNull();
      expect(contact?.normal).toEqual({ x: 1, y: 0 });
      expect(contact?.penetration).toBeCloseTo(0.5);
      expect(contact?.point.x).toBeCloseTo(0.75);
    });

    it('should return null when apart', () => {
      expect(collide(circle(1), at(0, 0), circle(1), at(3, 0))).toBeNull();
    });
  });

  describe('polygon and polygon', () => {
    it('should find the face normal, depth and both clipped corners', () => {
      const contact = collide(box(2, 2), at(0, 0), box(2, 2), at(0, 1.5));

      expect(contact).not.toBeNull();
      expect(contact?.normal).toEqual({ x: 0, y: 1 });
      expect(contact?.penetration).toBeCloseTo(0.5);
      expect(contact?.points).toEqual([
        { x: -1, y: 0.5 },
        { x: 1, y: 0.5 },
      ]);
      expect(contact?.point).toEqual({ x: 0, y: 0.5 });
    });

    it('should count touching faces as a contact with zero depth', () => {
      const contact = collide(box(2, 2), at(0, 0), box(2, 2), at(0, 2));
      expect(contact?.penetration).toBe(0);
    });

    it('should return null for disjoint boxes', () => {
      expect(collide(box(2, 2), at(0, 0), box(2, 2), at(5, 0))).toBeNull();
    });
  });

  describe('mixed kinds', () => {
    it('should point from the circle towards the polygon when the circle comes first', () => {
      const contact = collide(circle(1), at(0, 1.5), box(2, 2), at(0, 0));

      expect(contact?.normal.x).toBeCloseTo(0);
      expect(contact?.normal.y).toBeCloseTo(-1);
      expect(contact?.penetration).toBeCloseTo(0.5);
    });

    it('should treat a segment as a thick line', () => {
      const contact = collide(segment([-5, 0], [5, 0], 1), at(0, 0), circle(1), at(0, 1.5));

      expect(contact?.normal).toEqual({ x: 0, y: 1 });
      expect(contact?.penetration).toBeCloseTo(0.5);
    });
  });
});
