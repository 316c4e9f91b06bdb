import { describe, it, expect, beforeEach } from 'vitest';
import { Animation } from '../src/Animation.js';

describe('Animation', () => {
  let now: number;
  let animation: Animation;

  beforeEach(() => {
    now = 0;
    animation = new Animation({ clock: () => now });
  });

  it('should not advance before it is started', () => {
    now = 5;
    animation.update(3);
    expect(animation.frameIndex).toBe(0);
  });

  it('should wait strictly longer than the frame time', () => {
    animation.start(true, 0, 0.1);

    now = 0.1;
    animation.update(3);
    expect(animation.frameIndex).toBe(0);

    now = 0.11;
    animation.update(3);
    expect(animation.frameIndex).toBe(1);
  });

  it('should advance at most one frame per update', () => {
    animation.start(true, 0, 0.1);
    now = 10;
    animation.update(5);
    expect(animation.frameIndex).toBe(1);
  });

  it('should wrap around when looping', () => {
    animation.start(true, 0, 0.1);
    const seen: number[] = [];

    for (const t of [0.11, 0.22, 0.33, 0.44]) {
      now = t;
      animation.update(3);
      seen.push(animation.frameIndex);
    }

    expect(seen).toEqual([1, 2, 0, 1]);
    expect(animation.started).toBe(true);
  });

  it('should hold the last frame and stop when not looping', () => {
    animation.start(false, 0, 0.1);

    now = 0.11;
    animation.update(3);
    expect(animation.frameIndex).toBe(1);

    now = 0.22;
    animation.update(3);
    expect(animation.frameIndex).toBe(2);
    expect(animation.started).toBe(false);

    now = 0.33;
    animation.update(3);
    expect(animation.frameIndex).toBe(2);
  });

  it('should start from the given index', () => {
    animation.start(true, 2, 0.5);

    expect(animation.frameIndex).toBe(2);
    expect(animation.frameTimeS).toBe(0.5);
    expect(animation.lastFrameTime).toBe(0);
  });

  it('should stay on frame 0 for a single-frame costume', () => {
    animation.start(false);
    now = 1;
    animation.update(1);

    expect(animation.frameIndex).toBe(0);
    expect(animation.started).toBe(false);
  });
});
