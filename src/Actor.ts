/**
 * Actor - One physics body with its costumes, texts and event handlers
 *
 * Angles are degrees at this layer; the body underneath keeps radians.
 */

import type { Clock } from './Animation.js';
import type { Body } from './Body.js';
import type { Camera } from './Camera.js';
import { Costume } from './Costume.js';
import { ConfigurationError } from './errors.js';
import type { Handler, HandlerKind, HandlerRegistry } from './handlers.js';
import type { ImageCache } from './ImageCache.js';
import { drawShape } from './render.js';
import { pointDistance, scaleShape, type Shape } from './Shape.js';
import type { Surface } from './Surface.js';
import type {
  Color,
  Coordinates,
  DrawOptions,
  Grounding,
  ImagePaintMode,
  TextOverlay,
  TextStyle,
  Vec2,
} from './types.js';
import { add, angleOf, distance, length, scale, sub, toDegrees, toRadians, toVec } from './vec.js';

// Contact normals must point at least this far up to count as ground
const GROUND_EPSILON = 1e-3;

export interface CostumeOptions {
  scaleXY?: Coordinates;
  transparentColor?: Color | null;
  paintMode?: ImagePaintMode;
}

export interface ActorOptions {
  color?: Color;                 // default: 'green'
  border?: number;               // 0 = filled
  visible?: boolean;
  drawOptions?: DrawOptions | null;
  imagePaths?: string | readonly string[]; // becomes the current costume ''
  imageOptions?: CostumeOptions;
  images?: ImageCache | null;
  handlers?: HandlerRegistry | null;
  clock?: Clock;
}

export interface TextOptions extends TextStyle {
  name?: string; // default: the text itself
}

export interface Rect {
  left: number;
  top: number;
  width: number;
  height: number;
}

export class Actor {
  readonly body: Body;
  color: Color;
  border: number;
  visible: boolean;
  drawOptions: DrawOptions | null;

  readonly texts: Map<string, TextOverlay>;
  readonly costumes: Map<string, Costume>;
  currentCostume: Costume | null;

  private images: ImageCache | null;
  private handlers: HandlerRegistry | null;
  private clock: Clock | undefined;

  constructor(body: Body, options: ActorOptions = {}) {
    this.body = body;
    this.color = options.color ?? 'green';
    this.border = options.border ?? 0;
    this.visible = options.visible ?? true;
    this.drawOptions = options.drawOptions ?? null;

    this.texts = new Map();
    this.costumes = new Map();
    this.currentCostume = null;

    this.images = options.images ?? null;
    this.handlers = options.handlers ?? null;
    this.clock = options.clock;

    const paths = options.imagePaths ?? [];
    if (paths.length > 0) {
      this.addCostume('', paths, options.imageOptions, true);
    }
  }

  get shape(): Shape {
    return this.body.shape;
  }

  // --- body pass-through ----------------------------------------------------

  get position(): Vec2 {
    return { ...this.body.position };
  }

  set position(value: Coordinates) {
    this.body.position = toVec(value);
  }

  get velocity(): Vec2 {
    return { ...this.body.velocity };
  }

  set velocity(value: Coordinates) {
    this.body.velocity = toVec(value);
  }

  get angle(): number {
    return toDegrees(this.body.angle);
  }

  set angle(degrees: number) {
    this.body.angle = toRadians(degrees);
  }

  /** Degrees per second */
  get angularVelocity(): number {
    return toDegrees(this.body.angularVelocity);
  }

  set angularVelocity(degrees: number) {
    this.body.angularVelocity = toRadians(degrees);
  }

  get mass(): number {
    return this.body.mass;
  }

  set mass(value: number) {
    this.body.mass = value;
  }

  get moment(): number {
    return this.body.moment;
  }

  set moment(value: number) {
    this.body.moment = value;
  }

  get friction(): number {
    return this.body.friction;
  }

  set friction(value: number) {
    this.body.friction = value;
  }

  get elasticity(): number {
    return this.body.elasticity;
  }

  set elasticity(value: number) {
    this.body.elasticity = value;
  }

  get group(): number {
    return this.body.group;
  }

  set group(value: number) {
    this.body.group = value;
  }

  get surfaceVelocity(): Vec2 {
    return { ...this.body.surfaceVelocity };
  }

  set surfaceVelocity(value: Coordinates) {
    this.body.surfaceVelocity = toVec(value);
  }

  // --- motion ---------------------------------------------------------------

  moveBy(delta: Coordinates): void {
    this.body.position = add(this.body.position, toVec(delta));
  }

  moveTo(xy: Coordinates): void {
    this.body.position = toVec(xy);
  }

  turnBy(degrees: number): void {
    this.body.angle += toRadians(degrees);
  }

  turnTo(degrees: number): void {
    this.body.angle = toRadians(degrees);
  }

  turnTowards(xy: Coordinates): void {
    this.body.angle = angleOf(sub(toVec(xy), this.body.position));
  }

  /**
   * Moves `speed` units towards `xy`. Speed is per call, not per second.
   * A step that would reach or pass the target lands on it.
   */
  glideTo(xy: Coordinates, speed = 1): void {
    const target = toVec(xy);
    const direction = sub(target, this.body.position);
    const dist = length(direction);
    if (dist === 0) return;

    if (dist <= speed + 1e-9) {
      this.body.position = target;
    } else {
      this.body.position = add(this.body.position, scale(direction, speed / dist));
    }
  }

  /** World-frame force at a body-local point */
  applyForce(force: Coordinates, localPoint: Coordinates = { x: 0, y: 0 }): void {
    this.body.applyForceAtWorldPoint(force, this.body.localToWorld(localPoint));
  }

  /** World-frame impulse at a body-local point */
  applyImpulse(impulse: Coordinates, localPoint: Coordinates = { x: 0, y: 0 }): void {
    this.body.applyImpulseAtWorldPoint(impulse, this.body.localToWorld(localPoint));
  }

  applyLocalForce(force: Coordinates, localPoint: Coordinates = { x: 0, y: 0 }): void {
    this.body.applyForceAtLocalPoint(force, localPoint);
  }

  applyLocalImpulse(impulse: Coordinates, localPoint: Coordinates = { x: 0, y: 0 }): void {
    this.body.applyImpulseAtLocalPoint(impulse, localPoint);
  }

  applyTorque(torque: number): void {
    this.body.applyTorque(torque);
  }

  /** Δω = impulse / moment; nothing happens for a zero or infinite moment */
  applyImpulseTorque(impulse: number): void {
    const moment = this.body.moment;
    if (moment === 0 || !Number.isFinite(moment)) return;
    this.body.angularVelocity += impulse / moment;
  }

  // --- queries --------------------------------------------------------------

  touchesAt(point: Coordinates): boolean {
    return pointDistance(this.body.shape, this.body.pose, toVec(point)) <= 0;
  }

  /**
   * With no arguments: is anything overlapping this actor.
   * Otherwise: is any of `others` overlapping it.
   */
  touches(...others: Actor[]): boolean {
    const world = this.body.world;
    if (!world) return false;

    const contacts = world.shapeQuery(this.body);
    if (others.length === 0) {
      return contacts.length > 0;
    }
    const bodies = new Set(others.map((other) => other.body));
    return contacts.some((contact) => bodies.has(contact.other));
  }

  distanceTo(xy: Coordinates): number {
    return distance(this.body.position, toVec(xy));
  }

  isGrounded(): boolean {
    const world = this.body.world;
    if (!world) return false;

    return world
      .shapeQuery(this.body)
      .some((contact) => contact.other !== this.body && contact.normal.y > GROUND_EPSILON);
  }

  /** The most upward-facing contact, zeroed when there is none */
  getGrounding(): Grounding {
    const grounding: Grounding = {
      normal: { x: 0, y: 0 },
      penetration: 0,
      impulse: { x: 0, y: 0 },
      position: { x: 0, y: 0 },
      hasBody: false,
      friction: 0,
      velocity: { x: 0, y: 0 },
    };
    const world = this.body.world;
    if (!world) return grounding;

    for (const contact of world.shapeQuery(this.body)) {
      const n = contact.normal;
      if (n.y <= grounding.normal.y) continue;

      const hasBody = contact.other.kind !== 'static';
      grounding.normal = n;
      grounding.penetration = contact.penetration;
      grounding.impulse = contact.impulse;
      grounding.position = contact.point;
      grounding.hasBody = hasBody;
      grounding.friction = hasBody ? Math.abs(n.x / n.y) : 0;
      grounding.velocity = hasBody ? { ...contact.other.velocity } : { x: 0, y: 0 };
    }
    return grounding;
  }

  // --- geometry, recomputed from the body on every read ----------------------

  get x(): number {
    return this.body.position.x;
  }

  get y(): number {
    return this.body.position.y;
  }

  get center(): Vec2 {
    return { x: this.x, y: this.y };
  }

  get left(): number {
    return this.body.boundingBox().left;
  }

  get right(): number {
    return this.body.boundingBox().right;
  }

  get top(): number {
    return this.body.boundingBox().top;
  }

  get bottom(): number {
    return this.body.boundingBox().bottom;
  }

  get width(): number {
    const box = this.body.boundingBox();
    return box.right - box.left;
  }

  get height(): number {
    const box = this.body.boundingBox();
    return box.top - box.bottom;
  }

  get topLeft(): Vec2 {
    const box = this.body.boundingBox();
    return { x: box.left, y: box.top };
  }

  get topRight(): Vec2 {
    const box = this.body.boundingBox();
    return { x: box.right, y: box.top };
  }

  get bottomLeft(): Vec2 {
    const box = this.body.boundingBox();
    return { x: box.left, y: box.bottom };
  }

  get bottomRight(): Vec2 {
    const box = this.body.boundingBox();
    return { x: box.right, y: box.bottom };
  }

  rect(): Rect {
    const box = this.body.boundingBox();
    return { left: box.left, top: box.top, width: box.right - box.left, height: box.top - box.bottom };
  }

  // --- costumes -------------------------------------------------------------

  addCostume(
    name: string,
    paths: string | readonly string[],
    options: CostumeOptions = {},
    makeCurrent = false
  ): Costume {
    if (!this.images) {
      throw new ConfigurationError(`Actor has no image cache to load costume "${name}" from`);
    }
    const costume = new Costume(name, { ...options, clock: this.clock });
    costume.addImages(paths, this.images);
    this.costumes.set(name, costume);

    if (makeCurrent) {
      this.currentCostume = costume;
    }
    return costume;
  }

  /**
   * Switches to a known costume, or to none with null. Unknown names
   * leave the current costume as it is.
   */
  setCostume(name: string | null): boolean {
    if (name === null) {
      this.currentCostume = null;
      return true;
    }
    const costume = this.costumes.get(name);
    if (!costume) return false;
    this.currentCostume = costume;
    return true;
  }

  removeCostume(name: string): void {
    const costume = this.costumes.get(name);
    if (!costume) return;
    this.costumes.delete(name);
    if (this.currentCostume === costume) {
      this.currentCostume = null;
    }
  }

  startAnimation(loop = true, fromIndex = 0, frameTimeS = 0.2): void {
    this.currentCostume?.animation.start(loop, fromIndex, frameTimeS);
  }

  stopAnimation(): void {
    this.currentCostume?.animation.stop();
  }

  // --- texts ----------------------------------------------------------------

  addText(text: string, position: Coordinates = { x: 0, y: 0 }, options: TextOptions = {}): TextOverlay {
    const { name, ...style } = options;
    const overlay: TextOverlay = { ...style, text, position: toVec(position) };
    this.texts.set(name ?? text, overlay);
    return overlay;
  }

  removeText(nameOrText: string): void {
    this.texts.delete(nameOrText);
  }

  // --- visibility -----------------------------------------------------------

  show(): void {
    this.visible = true;
  }

  hide(): void {
    this.visible = false;
  }

  isHidden(): boolean {
    return !this.visible;
  }

  // --- events ---------------------------------------------------------------

  on<K extends HandlerKind>(kind: K, handler: Handler<K>): void {
    if (!this.handlers) {
      throw new ConfigurationError('Actor is not part of a scene, it cannot receive events');
    }
    this.handlers.add(kind, this, handler);
  }

  off(kind: HandlerKind): void {
    this.handlers?.remove(kind, this);
  }

  // --- frame ----------------------------------------------------------------

  update(): void {
    this.currentCostume?.update();
  }

  draw(target: Surface, camera: Camera): void {
    if (!this.visible) return;
    drawShape(
      target,
      this.body.shape,
      this.body.pose,
      this.texts.values(),
      this.color,
      this.border,
      this.drawOptions,
      camera,
      this.currentCostume
    );
  }

  // --- fitting shape and image ---------------------------------------------

  /** Resizes the shape to the first image of the current costume */
  fitToImage(): void {
    const image = this.currentCostume?.originals[0];
    if (!image) return;

    const { width, height } = this;
    if (width === 0 || height === 0) return;
    this.body.shape = scaleShape(this.body.shape, image.width / width, image.height / height);
  }

  /** Scales the current costume so its image covers the shape's bounds */
  fitImage(): void {
    const costume = this.currentCostume;
    if (!costume || costume.length === 0) return;

    const image = costume.originals[costume.animation.frameIndex] ?? costume.originals[0];
    if (image.width === 0 || image.height === 0) return;
    costume.scaleXY = { x: this.width / image.width, y: this.height / image.height };
  }
}
