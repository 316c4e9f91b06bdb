/**
 * actorkit - 2D actors on a rigid-body world, drawn through a camera
 */

export * from './types.js';
export * from './vec.js';
export * from './errors.js';
export * from './Shape.js';
export { collide, type Contact } from './collision.js';
export { Body, ALL_CATEGORIES, type BodyConfig } from './Body.js';
export { World, type ContactInfo } from './World.js';
export { SpatialHash } from './SpatialHash.js';
export { Camera, DEFAULT_CAMERA_CONTROLS, type CameraControls } from './Camera.js';
export { Animation, defaultClock, type AnimationConfig, type Clock } from './Animation.js';
export { Costume, type CostumeConfig } from './Costume.js';
export type { BlendMode, Surface } from './Surface.js';
export { CanvasSurface, createCanvas, toCssColor, type CanvasFactory } from './CanvasSurface.js';
export { ImageCache, loadHtmlImage, type ImageLoader } from './ImageCache.js';
export { drawShape, drawTexts, tileImage, DEFAULT_TEXT_STYLE } from './render.js';
export {
  Actor,
  type ActorOptions,
  type CostumeOptions,
  type Rect,
  type TextOptions,
} from './Actor.js';
export {
  DomInputSource,
  EventQueue,
  NO_MODIFIERS,
  buttonName,
  keyName,
  type DomInputConfig,
  type InputEvent,
  type InputSource,
  type KeyEvent,
  type Modifiers,
  type MouseButtonEvent,
  type MouseMoveEvent,
  type MouseWheelEvent,
  type QuitEvent,
} from './input.js';
export {
  HandlerRegistry,
  HANDLER_KINDS,
  type Handler,
  type HandlerKind,
  type HandlerPayloads,
} from './handlers.js';
export {
  Scene,
  animationFrameTimer,
  randomColor,
  type AppearanceOptions,
  type BodyOptions,
  type CreateOptions,
  type FrameTimer,
  type PlacementOptions,
  type SceneConfig,
  type SceneState,
  type ScreenWallOptions,
} from './Scene.js';
