import { describe, it, expect } from 'vitest';
import { Costume } from '../src/Costume.js';
import { ImageCache } from '../src/ImageCache.js';
import { MissingAssetError } from '../src/errors.js';
import { FakeSurface } from './helpers/FakeSurface.js';

const frame = (label: string, transparent = false): FakeSurface => new FakeSurface(10, 20, label, transparent);

describe('Costume', () => {
  describe('transparency', () => {
    it('should keep images as loaded without a colour key', () => {
      const source = frame('a', true);
      const costume = new Costume('idle');
      costume.addSurfaces([source]);

      const image = costume.getImage();
      expect(image).toBe(source);
      expect(image instanceof FakeSurface && image.transparent).toBe(true);
    });

    it('should key out the transparent colour', () => {
      const costume = new Costume('idle', { transparentColor: [255, 0, 255] });
      costume.addSurfaces([frame('a', true)]);

      const image = costume.getImage();
      expect(image instanceof FakeSurface && image.colorKey).toEqual([255, 0, 255]);
    });
  });

  describe('scaling', () => {
    it('should scale each frame when added', () => {
      const costume = new Costume('idle', { scaleXY: [2, 0.5] });
      costume.addSurfaces([frame('a')]);

      const image = costume.getImage();
      expect(image?.width).toBe(20);
      expect(image?.height).toBe(10);
    });

    it('should rescale from the originals rather than the last scaled copy', () => {
      const costume = new Costume('idle', { scaleXY: [2, 2] });
      costume.addSurfaces([frame('a')]);

      costume.scaleXY = [3, 1];

      expect(costume.getImage()?.width).toBe(30);
      expect(costume.getImage()?.height).toBe(20);
      expect(costume.originals[0].width).toBe(10);
      expect(costume.scaleXY).toEqual({ x: 3, y: 1 });
    });
  });

  describe('frames', () => {
    it('should have no image while empty', () => {
      const costume = new Costume('empty');

      expect(costume.length).toBe(0);
      expect(costume.getImage()).toBeUndefined();
    });

    it('should follow its animation', () => {
      let now = 0;
      const costume = new Costume('walk', { clock: () => now });
      const frames = [frame('a', true), frame('b', true)];
      costume.addSurfaces(frames);

      costume.animation.start(true, 0, 0.1);
      now = 0.15;
      costume.update();

      expect(costume.getImage()).toBe(frames[1]);
    });
  });

  describe('addImages', () => {
    it('should read frames from the image cache', () => {
      const cache = new ImageCache();
      cache.register('a.png', frame('a', true));
      cache.register('b.png', frame('b', true));
      const costume = new Costume('walk');

      costume.addImages(['a.png', 'b.png'], cache);
      costume.addImages('a.png', cache);

      expect(costume.length).toBe(3);
    });

    it('should throw for paths that were never loaded', () => {
      const costume = new Costume('walk');
      expect(() => costume.addImages('nope.png', new ImageCache())).toThrow(MissingAssetError);
    });
  });
});
