import { describe, it, expect } from 'vitest';
import { SpatialHash } from '../src/SpatialHash.js';
import { Body } from '../src/Body.js';
import { box } from '../src/Shape.js';

const boxAt = (x: number, y: number, size = 10): Body => new Body(box(size, size), { position: [x, y] });

describe('SpatialHash', () => {
  describe('getPairs', () => {
    it('should pair bodies sharing a cell', () => {
      const hash = new SpatialHash(100);
      const a = boxAt(10, 10);
      const b = boxAt(30, 30);
      hash.insert(a);
      hash.insert(b);

      expect(hash.getPairs()).toEqual([[a, b]]);
    });

    it('should not pair bodies in different cells', () => {
      const hash = new SpatialHash(100);
      hash.insert(boxAt(10, 10));
      hash.insert(boxAt(510, 510));

      expect(hash.getPairs()).toHaveLength(0);
    });

    it('should report a pair once even when it shares several cells', () => {
      const hash = new SpatialHash(100);
      const a = boxAt(100, 100, 40);
      const b = boxAt(95, 95, 40);
      hash.insert(a);
      hash.insert(b);

      expect(hash.getPairs()).toHaveLength(1);
    });

    it('should put the lower id first', () => {
      const hash = new SpatialHash(100);
      const first = boxAt(10, 10);
      const second = boxAt(20, 20);
      hash.insert(second);
      hash.insert(first);

      const [[a, b]] = hash.getPairs();
      expect(a).toBe(first);
      expect(b).toBe(second);
    });
  });

  describe('clear', () => {
    it('should forget every body', () => {
      const hash = new SpatialHash();
      hash.insert(boxAt(0, 0));
      hash.insert(boxAt(5, 5));
      hash.clear();

      expect(hash.getPairs()).toEqual([]);
    });
  });
});
