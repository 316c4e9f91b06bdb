import { ImageCache } from '../../src/ImageCache.js';
import { EventQueue } from '../../src/input.js';
import { Scene, type FrameTimer, type SceneConfig } from '../../src/Scene.js';
import { FakeSurface } from './FakeSurface.js';

/**
 * Frame timer driven by hand: callbacks wait until advance()
 */
export class ManualTimer implements FrameTimer {
  time = 0;
  pending: Array<(timeMs: number) => void> = [];
  cancelled = 0;

  request(callback: (timeMs: number) => void): () => void {
    this.pending.push(callback);
    return () => {
      this.cancelled++;
      this.pending = this.pending.filter((c) => c !== callback);
    };
  }

  now(): number {
    return this.time;
  }

  advance(ms: number): void {
    this.time += ms;
    const due = this.pending;
    this.pending = [];
    for (const callback of due) {
      callback(this.time);
    }
  }
}

export function createTestScene(config: SceneConfig = {}) {
  const width = config.width ?? 200;
  const height = config.height ?? 100;
  const surface = new FakeSurface(width, height, 'screen');
  const input = new EventQueue();
  const images = new ImageCache();
  const timer = new ManualTimer();
  const scene = new Scene({ width, height, surface, input, images, frameTimer: timer, ...config });
  return { scene, surface, input, images, timer };
}
