import type { Body } from './Body.js';
import type { AABB } from './types.js';

/**
 * Spatial hash broadphase
 * Bodies are filed under every cell their bounding box overlaps
 */
export class SpatialHash {
  private cellSize: number;
  private grid: Map<string, Body[]>;

  constructor(cellSize: number = 100) {
    this.cellSize = cellSize;
    this.grid = new Map();
  }

  insert(body: Body): void {
    // Insert into every cell the bounding box overlaps
    this.forEachCell(body.boundingBox(), (key) => {
      let cell = this.grid.get(key);
      if (!cell) {
        cell = [];
        this.grid.set(key, cell);
      }
      cell.push(body);
    });
  }

  getPairs(): [Body, Body][] {
    const pairs: [Body, Body][] = [];
    const tested = new Set<string>();

    for (const cell of this.grid.values()) {
      for (let i = 0; i < cell.length; i++) {
        for (let j = i + 1; j < cell.length; j++) {
          const a = cell[i];
          const b = cell[j];

          // Create unique pair key, lower id first
          const [first, second] = a.id < b.id ? [a, b] : [b, a];
          const pairKey = `${first.id}-${second.id}`;

          if (!tested.has(pairKey)) {
            tested.add(pairKey);
            pairs.push([first, second]);
          }
        }
      }
    }

    return pairs;
  }

  clear(): void {
    this.grid.clear();
  }

  private forEachCell(box: AABB, visit: (key: string) => void): void {
    const minX = Math.floor(box.left / this.cellSize);
    const maxX = Math.floor(box.right / this.cellSize);
    const minY = Math.floor(box.bottom / this.cellSize);
    const maxY = Math.floor(box.top / this.cellSize);

    for (let cx = minX; cx <= maxX; cx++) {
      for (let cy = minY; cy <= maxY; cy++) {
        visit(`${cx},${cy}`);
      }
    }
  }
}
