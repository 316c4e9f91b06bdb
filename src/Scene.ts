/**
 * Scene - Owns the world, camera, surface and actors, and runs the frame loop
 *
 * Each tick: physics sub-steps, input dispatch, onFrame, update all actors,
 * draw all actors, screen texts, present.
 */

import { Actor, type CostumeOptions, type TextOptions } from './Actor.js';
import type { Clock } from './Animation.js';
import { Body, type BodyConfig } from './Body.js';
import { Camera, DEFAULT_CAMERA_CONTROLS, type CameraControls } from './Camera.js';
import { CanvasSurface, createCanvas } from './CanvasSurface.js';
import { ConfigurationError } from './errors.js';
import { HandlerRegistry } from './handlers.js';
import { ImageCache, loadHtmlImage } from './ImageCache.js';
import { DomInputSource, EventQueue, type InputEvent, type InputSource } from './input.js';
import { drawTexts } from './render.js';
import {
  area,
  boundsOf,
  box,
  circle,
  momentFor,
  polygonFromPoints,
  regularPolygonPoints,
  type Shape,
} from './Shape.js';
import type { Surface } from './Surface.js';
import type { Color, Coordinates, DrawOptions, TextOverlay, Vec2, WorldConfig } from './types.js';
import { toRadians, toVec } from './vec.js';
import { World } from './World.js';

export type SceneState = 'running' | 'stopped';

/** Schedules one callback per display frame, returns a cancel function */
export interface FrameTimer {
  request(callback: (timeMs: number) => void): () => void;
  now(): number;
}

export const animationFrameTimer: FrameTimer = {
  request(callback) {
    const id = requestAnimationFrame(callback);
    return () => cancelAnimationFrame(id);
  },
  now: () => performance.now(),
};

export interface SceneConfig {
  width?: number;                // default: 1280
  height?: number;               // default: 720
  color?: Color | null;          // background fill (default: 'purple')
  backgroundImage?: string | null; // path already in `images`, stretched to the screen
  fps?: number;                  // default: 60
  physicsStepsPerFrame?: number; // fixed for the scene's lifetime (default: 4)
  gravity?: Vec2 | number;
  world?: Omit<WorldConfig, 'gravity'>;
  surface?: Surface;             // default: a new canvas
  input?: InputSource;           // default: DOM events on that canvas
  images?: ImageCache;
  frameTimer?: FrameTimer;
  clock?: Clock;                 // animation clock for every costume
  cameraControls?: CameraControls | boolean; // true = default key bindings
  onFrame?: (scene: Scene) => void;
  onStop?: () => void;
  debug?: boolean;
}

export interface PlacementOptions {
  bottomLeft?: Coordinates; // mutually exclusive with center
  center?: Coordinates;
  angle?: number;           // degrees
}

export interface BodyOptions {
  density?: number;         // density, mass or moment make the body dynamic
  mass?: number;
  moment?: number;
  elasticity?: number;
  friction?: number;
  fixedObject?: boolean;    // static body
  canRotate?: boolean;
  velocity?: Coordinates;
  angularVelocity?: number; // degrees/s
}

export interface AppearanceOptions extends CostumeOptions {
  color?: Color;
  border?: number;
  imagePaths?: string | readonly string[];
  drawOptions?: DrawOptions | null;
  visible?: boolean;
}

export type CreateOptions = PlacementOptions & BodyOptions & AppearanceOptions;

export interface ScreenWallOptions extends BodyOptions {
  left?: number | boolean;  // distance in from the edge, true = 0
  right?: number | boolean;
  top?: number | boolean;
  bottom?: number | boolean;
  color?: Color;
  width?: number;           // wall thickness (default: 1)
  border?: number;
}

const TRANSPARENT: Color = [0, 0, 0, 0];

export function randomColor(randomAlpha = false): Color {
  const channel = (): number => Math.floor(Math.random() * 256);
  return [channel(), channel(), channel(), randomAlpha ? channel() : 255];
}

export class Scene {
  readonly world: World;
  readonly camera: Camera;
  readonly surface: Surface;
  readonly input: InputSource;
  readonly images: ImageCache;
  readonly actors: Set<Actor>;
  readonly handlers: HandlerRegistry;
  readonly texts: Map<string, TextOverlay>;
  readonly heldKeys: Set<string>;
  readonly heldButtons: Set<string>;
  readonly physicsStepsPerFrame: number;

  width: number;
  height: number;
  color: Color | null;
  fps: number;
  cameraControls: CameraControls | null;
  debug: boolean;
  frameCount: number;

  private state: SceneState;
  private background: Surface | null;
  private frameTimer: FrameTimer;
  private clock: Clock | undefined;
  private onFrame: ((scene: Scene) => void) | null;
  private onStop: (() => void) | null;

  // Loop timing, milliseconds
  private lastTime: number;
  private accumulator: number;
  private cancelFrame: (() => void) | null;

  constructor(config: SceneConfig = {}) {
    this.width = config.width ?? 1280;
    this.height = config.height ?? 720;
    this.color = config.color === undefined ? 'purple' : config.color;
    this.fps = config.fps ?? 60;
    this.physicsStepsPerFrame = config.physicsStepsPerFrame ?? 4;
    this.debug = config.debug ?? false;

    if (this.fps <= 0 || this.physicsStepsPerFrame < 1) {
      throw new ConfigurationError(
        `fps must be positive and physicsStepsPerFrame at least 1 (got ${this.fps}, ${this.physicsStepsPerFrame})`
      );
    }

    this.world = new World({ ...config.world, gravity: config.gravity, debug: config.world?.debug ?? this.debug });
    this.camera = new Camera();
    this.surface = config.surface ?? new CanvasSurface(createCanvas(this.width, this.height));
    this.input = config.input ?? Scene.defaultInput(this.surface);
    this.images = config.images ?? new ImageCache((path) => loadHtmlImage(path));
    this.actors = new Set();
    this.handlers = new HandlerRegistry();
    this.texts = new Map();
    this.heldKeys = new Set();
    this.heldButtons = new Set();

    const controls = config.cameraControls ?? false;
    this.cameraControls = controls === true ? DEFAULT_CAMERA_CONTROLS : controls === false ? null : controls;

    this.state = 'running';
    this.frameCount = 0;
    this.background = null;
    this.frameTimer = config.frameTimer ?? animationFrameTimer;
    this.clock = config.clock;
    this.onFrame = config.onFrame ?? null;
    this.onStop = config.onStop ?? null;
    this.lastTime = 0;
    this.accumulator = 0;
    this.cancelFrame = null;

    if (config.backgroundImage) {
      this.setBackgroundImage(config.backgroundImage);
    }

    if (this.debug) {
      console.log(`[Scene] Created ${this.width}x${this.height} @ ${this.fps}fps, ${this.physicsStepsPerFrame} physics steps/frame`);
    }
  }

  private static defaultInput(surface: Surface): InputSource {
    return surface instanceof CanvasSurface ? new DomInputSource(surface.canvas) : new EventQueue();
  }

  // --- lifecycle --------------------------------------------------------------

  isRunning(): boolean {
    return this.state === 'running';
  }

  /**
   * Runs tick() on the frame timer, at most once per 1/fps seconds
   */
  start(): void {
    if (!this.isRunning() || this.cancelFrame) return;
    this.lastTime = this.frameTimer.now();
    // first callback draws straight away
    this.accumulator = 1000 / this.fps;
    this.loop(this.lastTime);
  }

  /** Terminal; the scene cannot be restarted */
  stop(): void {
    if (!this.isRunning()) return;
    this.state = 'stopped';
    this.cancelFrame?.();
    this.cancelFrame = null;

    if (this.debug) {
      console.log(`[Scene] Stopped after ${this.frameCount} frames`);
    }
    this.onStop?.();
  }

  private loop = (time: number): void => {
    this.cancelFrame = null;
    if (!this.isRunning()) return;

    const interval = 1000 / this.fps;
    this.accumulator += time - this.lastTime;
    this.lastTime = time;

    if (this.accumulator >= interval) {
      // never bank more than one frame
      this.accumulator = Math.min(this.accumulator - interval, interval);
      this.tick();
    }

    if (this.isRunning()) {
      this.cancelFrame = this.frameTimer.request(this.loop);
    }
  };

  /**
   * One frame. Physics always advances physicsStepsPerFrame steps of
   * 1 / (fps * physicsStepsPerFrame) seconds, whatever time really passed.
   */
  tick(): void {
    if (!this.isRunning()) return;
    this.frameCount++;

    const dt = 1 / (this.fps * this.physicsStepsPerFrame);
    for (let i = 0; i < this.physicsStepsPerFrame; i++) {
      this.world.step(dt);
    }

    for (const event of this.input.poll()) {
      this.dispatch(event);
      if (!this.isRunning()) return;
    }
    if (this.heldKeys.size > 0) {
      this.handlers.dispatch('keypress', new Set(this.heldKeys));
    }
    if (this.heldButtons.size > 0) {
      this.handlers.dispatch('mousebutton', new Set(this.heldButtons));
    }
    if (this.cameraControls) {
      this.camera.handleKeys(this.heldKeys, this.cameraControls);
    }

    this.onFrame?.(this);

    if (this.color !== null) {
      this.surface.fill(this.color);
    }
    if (this.background) {
      this.surface.blit(this.background, { x: 0, y: 0 });
    }

    // every update before any draw
    for (const actor of this.actors) {
      actor.update();
    }
    for (const actor of this.actors) {
      actor.draw(this.surface, this.camera);
    }
    drawTexts(this.surface, this.texts.values());

    this.surface.present?.();
  }

  private dispatch(event: InputEvent): void {
    switch (event.kind) {
      case 'keydown':
        this.heldKeys.add(event.key);
        this.handlers.dispatch('keydown', event);
        break;
      case 'keyup':
        this.heldKeys.delete(event.key);
        this.handlers.dispatch('keyup', event);
        break;
      case 'mousedown':
        this.heldButtons.add(event.button);
        this.handlers.dispatch('mousedown', { ...event, position: this.fromPixels(event.position) });
        break;
      case 'mouseup':
        this.heldButtons.delete(event.button);
        this.handlers.dispatch('mouseup', { ...event, position: this.fromPixels(event.position) });
        break;
      case 'mousemove':
        this.handlers.dispatch('mousemove', {
          ...event,
          position: this.fromPixels(event.position),
          relative: { x: event.relative.x, y: -event.relative.y },
        });
        break;
      case 'mousewheel':
        this.handlers.dispatch('mousewheel', event);
        break;
      case 'quit': {
        const results = this.handlers.dispatch('quit', undefined);
        if (results.length === 0 || results.some((result) => result === true)) {
          this.stop();
        }
        break;
      }
    }
  }

  /** Canvas pixels (y down) to scene coordinates (y up) */
  fromPixels(point: Vec2): Vec2 {
    return { x: point.x, y: this.height - point.y };
  }

  // --- actors -----------------------------------------------------------------

  createRect(width = 20, height = 20, options: CreateOptions = {}): Actor {
    const position = this.placeBox(width, height, options);
    return this.spawn(box(width, height), position, { color: 'red', ...options });
  }

  createCircle(radius = 20, options: CreateOptions = {}): Actor {
    const position = this.place(options, (bottomLeft) => ({ x: bottomLeft.x + radius, y: bottomLeft.y + radius }), {
      x: 0,
      y: 0,
    });
    return this.spawn(circle(radius), position, { color: 'red', ...options });
  }

  /** A 32-sided polygon inscribed in the width x height box */
  createEllipse(width = 20, height = 20, options: CreateOptions = {}): Actor {
    const position = this.placeBox(width, height, options);
    const { shape } = polygonFromPoints(regularPolygonPoints(32, -width / 2, -height / 2, width, height));
    return this.spawn(shape, position, { color: 'red', ...options });
  }

  createPolygon(sides: number, width = 20, height = 20, options: CreateOptions = {}): Actor {
    return this.createPolygonAny(regularPolygonPoints(sides, 0, 0, width, height), options);
  }

  /**
   * Polygon through `points`. The body sits on their average, which is
   * where the points end up when no placement is given.
   */
  createPolygonAny(points: readonly Coordinates[], options: CreateOptions = {}): Actor {
    if (points.length < 3) {
      throw new ConfigurationError(`A polygon needs at least 3 points (got ${points.length})`);
    }
    const { shape, centroid } = polygonFromPoints(points);
    const bounds = boundsOf(shape.vertices);
    const position = this.place(
      options,
      (bottomLeft) => ({ x: bottomLeft.x - bounds.minX, y: bottomLeft.y - bounds.minY }),
      centroid
    );
    return this.spawn(shape, position, { color: 'red', ...options });
  }

  /** Box sized to the first image (times scaleXY), wearing all of them */
  createImage(paths: string | readonly string[], options: CreateOptions = {}): Actor {
    const list = typeof paths === 'string' ? [paths] : [...paths];
    if (list.length === 0) {
      throw new ConfigurationError('createImage needs at least one image path');
    }
    const image = this.images.getImage(list[0]);
    const scaleXY = options.scaleXY ? toVec(options.scaleXY) : { x: 1, y: 1 };
    const width = image.width * scaleXY.x;
    const height = image.height * scaleXY.y;

    const position = this.placeBox(width, height, options);
    return this.spawn(box(width, height), position, { color: TRANSPARENT, ...options, imagePaths: list });
  }

  /** Static walls along the chosen screen edges */
  createScreenWalls(options: ScreenWallOptions = {}): Actor[] {
    const inset = (value: number | boolean | undefined): number | null => {
      if (typeof value === 'boolean') return value ? 0 : null;
      return value ?? null;
    };
    const thickness = options.width ?? 1;
    const border = options.border ?? 0;
    const wall: CreateOptions = {
      color: options.color ?? TRANSPARENT,
      border,
      density: options.density,
      elasticity: options.elasticity,
      friction: options.friction,
      fixedObject: true,
    };

    const walls: Actor[] = [];
    const left = inset(options.left);
    const right = inset(options.right);
    const top = inset(options.top);
    const bottom = inset(options.bottom);

    if (left !== null) {
      walls.push(this.createRect(thickness, this.height, { ...wall, bottomLeft: { x: left, y: 0 } }));
    }
    if (right !== null) {
      const x = this.width - right - border * 2 - thickness - 1;
      walls.push(this.createRect(thickness, this.height, { ...wall, bottomLeft: { x, y: 0 } }));
    }
    if (top !== null) {
      const y = this.height - top - border * 2 - thickness - 1;
      walls.push(this.createRect(this.width, thickness, { ...wall, bottomLeft: { x: 0, y } }));
    }
    if (bottom !== null) {
      walls.push(this.createRect(this.width, thickness, { ...wall, bottomLeft: { x: 0, y: bottom } }));
    }
    return walls;
  }

  remove(actor: Actor): void {
    if (!this.actors.delete(actor)) return;
    this.world.unregisterBody(actor.body);
    this.handlers.removeOwner(actor);

    if (this.debug) {
      console.log(`[Scene] Removed actor #${actor.body.id}, ${this.actors.size} left`);
    }
  }

  private placeBox(width: number, height: number, options: PlacementOptions): Vec2 {
    return this.place(options, (bottomLeft) => ({ x: bottomLeft.x + width / 2, y: bottomLeft.y + height / 2 }), {
      x: width / 2,
      y: height / 2,
    });
  }

  /** Body position from bottomLeft or center */
  private place(options: PlacementOptions, fromBottomLeft: (bottomLeft: Vec2) => Vec2, fallback: Vec2): Vec2 {
    if (options.bottomLeft !== undefined && options.center !== undefined) {
      throw new ConfigurationError("Don't specify both bottomLeft and center, only one or the other");
    }
    if (options.center !== undefined) return toVec(options.center);
    if (options.bottomLeft !== undefined) return fromBottomLeft(toVec(options.bottomLeft));
    return fallback;
  }

  private spawn(shape: Shape, position: Vec2, options: CreateOptions): Actor {
    const dynamic = options.density !== undefined || options.mass !== undefined || options.moment !== undefined;
    const kind = options.fixedObject ? 'static' : dynamic ? 'dynamic' : 'kinematic';
    const mass = options.mass ?? (options.density !== undefined ? options.density * area(shape) : 1);
    const moment = options.canRotate === false ? Infinity : options.moment ?? momentFor(shape, mass);

    const bodyConfig: BodyConfig = {
      kind,
      mass,
      moment,
      position,
      angle: toRadians(options.angle ?? 0),
      velocity: options.velocity ?? { x: 0, y: 0 },
      angularVelocity: toRadians(options.angularVelocity ?? 0),
      friction: options.friction,
      elasticity: options.elasticity,
    };
    const body = new Body(shape, bodyConfig);
    this.world.registerBody(body);

    const actor = new Actor(body, {
      color: options.color,
      border: options.border,
      visible: options.visible,
      drawOptions: options.drawOptions,
      imagePaths: options.imagePaths,
      imageOptions: {
        scaleXY: options.scaleXY,
        transparentColor: options.transparentColor,
        paintMode: options.paintMode,
      },
      images: this.images,
      handlers: this.handlers,
      clock: this.clock,
    });
    this.actors.add(actor);

    if (this.debug) {
      console.log(`[Scene] Added ${kind} ${shape.kind} actor #${body.id} at (${position.x.toFixed(1)}, ${position.y.toFixed(1)})`);
    }
    return actor;
  }

  // --- screen -----------------------------------------------------------------

  get screenWidth(): number {
    return this.width;
  }

  get screenHeight(): number {
    return this.height;
  }

  get screenTop(): number {
    return this.height;
  }

  get screenBottom(): number {
    return 0;
  }

  get screenLeft(): number {
    return 0;
  }

  get screenRight(): number {
    return this.width;
  }

  get screenCenter(): Vec2 {
    return { x: Math.floor(this.width / 2), y: Math.floor(this.height / 2) };
  }

  tooLeft(actor: Actor): boolean {
    return actor.left < 0;
  }

  tooRight(actor: Actor): boolean {
    return actor.right > this.width;
  }

  tooTop(actor: Actor): boolean {
    return actor.top > this.height;
  }

  tooBottom(actor: Actor): boolean {
    return actor.bottom < 0;
  }

  /** Mouse position in scene coordinates */
  mouseXY(): Vec2 {
    return this.fromPixels(this.input.mousePosition());
  }

  /** Screen text at canvas pixel `at` (default: the screen centre) */
  addText(text: string, at: Coordinates = this.screenCenter, options: TextOptions = {}): TextOverlay {
    const { name, ...style } = options;
    const overlay: TextOverlay = { ...style, text, position: toVec(at) };
    this.texts.set(name ?? text, overlay);
    return overlay;
  }

  removeText(nameOrText: string): void {
    this.texts.delete(nameOrText);
  }

  setColor(color: Color | null): void {
    this.color = color;
  }

  /** Path must already be in `images`; null removes the image */
  setBackgroundImage(path: string | null): void {
    this.background = path === null ? null : this.images.getImage(path).scaled(this.width, this.height);
  }

  setFps(fps: number): void {
    if (fps <= 0) {
      throw new ConfigurationError(`fps must be positive (got ${fps})`);
    }
    this.fps = fps;
  }
}
