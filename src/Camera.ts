/**
 * Camera - World to camera space transform (zoom, rotation, pan)
 */

import type { Coordinates, Vec2 } from './types.js';
import { add, scale, toRadians, toVec } from './vec.js';

// Keys a scene may forward to Camera.handleKeys
export interface CameraControls {
  zoomInKey: string;
  zoomOutKey: string;
  panLeftKey: string;
  panRightKey: string;
  panUpKey: string;
  panDownKey: string;
  rotateLeftKey: string;
  rotateRightKey: string;
  resetKey: string;
  zoomSpeed: number;   // factor per held frame
  panSpeed: number;    // units per held frame
  rotateSpeed: number; // degrees per held frame
}

export const DEFAULT_CAMERA_CONTROLS: CameraControls = {
  zoomInKey: 'z',
  zoomOutKey: 'x',
  panLeftKey: 'a',
  panRightKey: 'd',
  panUpKey: 'w',
  panDownKey: 's',
  rotateLeftKey: 'q',
  rotateRightKey: 'e',
  resetKey: 'r',
  zoomSpeed: 1.1,
  panSpeed: 10,
  rotateSpeed: 5,
};

export class Camera {
  private _position: Vec2;
  private _angle: number; // degrees
  private _scale: number;

  // Derived, refreshed by every mutator and nothing else
  private _theta = 0;
  private cos = 1;
  private sin = 0;

  constructor() {
    this._position = { x: 0, y: 0 };
    this._angle = 0;
    this._scale = 1;
    this.updateTransform();
  }

  /** Bottom-left of the view in world space */
  get position(): Vec2 {
    return { ...this._position };
  }

  get angle(): number {
    return this._angle;
  }

  get scale(): number {
    return this._scale;
  }

  /** Rotation in radians */
  get theta(): number {
    return this._theta;
  }

  get isIdentity(): boolean {
    return this._angle === 0 && this._scale === 1 && this._position.x === 0 && this._position.y === 0;
  }

  /**
   * Scale about the origin, rotate about the origin, then translate by
   * -position. The default camera hands back the input array itself.
   */
  apply(points: Vec2[]): Vec2[] {
    if (this.isIdentity) return points;

    return points.map((p) => {
      const x = p.x * this._scale;
      const y = p.y * this._scale;
      return {
        x: x * this.cos - y * this.sin - this._position.x,
        y: x * this.sin + y * this.cos - this._position.y,
      };
    });
  }

  moveBy(delta: Coordinates): void {
    this._position = add(this._position, toVec(delta));
    this.updateTransform();
  }

  moveTo(position: Coordinates): void {
    this._position = toVec(position);
    this.updateTransform();
  }

  turnBy(degrees: number): void {
    this._angle += degrees;
    this.updateTransform();
  }

  turnTo(degrees: number): void {
    this._angle = degrees;
    this.updateTransform();
  }

  zoomBy(factor: number): void {
    this._scale *= factor;
    this.updateTransform();
  }

  zoomTo(factor: number): void {
    this._scale = factor;
    this.updateTransform();
  }

  reset(): void {
    this._position = { x: 0, y: 0 };
    this._angle = 0;
    this._scale = 1;
    this.updateTransform();
  }

  /**
   * Applies one frame of movement for every held control key
   */
  handleKeys(keys: ReadonlySet<string>, controls: CameraControls = DEFAULT_CAMERA_CONTROLS): void {
    if (keys.has(controls.resetKey)) {
      this.reset();
      return;
    }
    if (keys.has(controls.zoomInKey)) this.zoomBy(controls.zoomSpeed);
    if (keys.has(controls.zoomOutKey)) this.zoomBy(1 / controls.zoomSpeed);

    let pan: Vec2 = { x: 0, y: 0 };
    if (keys.has(controls.panLeftKey)) pan = add(pan, { x: -1, y: 0 });
    if (keys.has(controls.panRightKey)) pan = add(pan, { x: 1, y: 0 });
    if (keys.has(controls.panUpKey)) pan = add(pan, { x: 0, y: 1 });
    if (keys.has(controls.panDownKey)) pan = add(pan, { x: 0, y: -1 });
    if (pan.x !== 0 || pan.y !== 0) this.moveBy(scale(pan, controls.panSpeed));

    if (keys.has(controls.rotateLeftKey)) this.turnBy(controls.rotateSpeed);
    if (keys.has(controls.rotateRightKey)) this.turnBy(-controls.rotateSpeed);
  }

  private updateTransform(): void {
    if (this._angle === 0) {
      this._theta = 0;
      this.cos = 1;
      this.sin = 0;
    } else {
      this._theta = toRadians(this._angle);
      this.cos = Math.cos(this._theta);
      this.sin = Math.sin(this._theta);
    }
  }
}
