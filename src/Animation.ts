/**
 * Animation - Wall-clock frame stepping for a costume
 */

export type Clock = () => number; // seconds

export const defaultClock: Clock = () => performance.now() / 1000;

export interface AnimationConfig {
  frameTimeS?: number; // default: 0.1
  loop?: boolean;      // default: true
  clock?: Clock;
}

export class Animation {
  frameTimeS: number;
  loop: boolean;
  started: boolean;
  frameIndex: number;
  lastFrameTime: number;

  private clock: Clock;

  constructor(config: AnimationConfig = {}) {
    this.frameTimeS = config.frameTimeS ?? 0.1;
    this.loop = config.loop ?? true;
    this.clock = config.clock ?? defaultClock;
    this.started = false;
    this.frameIndex = 0;
    this.lastFrameTime = this.clock();
  }

  start(loop = true, fromIndex = 0, frameTimeS = 0.1): void {
    this.started = true;
    this.loop = loop;
    this.frameTimeS = frameTimeS;
    this.frameIndex = fromIndex;
    this.lastFrameTime = this.clock();
  }

  stop(): void {
    this.started = false;
  }

  /**
   * Advances at most one frame per call, once more than frameTimeS has
   * passed since the last advance.
   */
  update(frameCount: number): void {
    if (!this.started) return;

    const now = this.clock();
    if (now - this.lastFrameTime <= this.frameTimeS) return;

    this.lastFrameTime = now;
    this.frameIndex++;
    if (this.loop) {
      if (this.frameIndex >= frameCount) this.frameIndex = 0;
    } else if (this.frameIndex >= frameCount - 1) {
      // held on the last frame
      this.frameIndex = Math.max(frameCount - 1, 0);
      this.stop();
    }
  }
}
