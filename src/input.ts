/**
 * input - Keyboard/mouse events in canvas pixel coordinates
 */

import type { Vec2 } from './types.js';

export interface Modifiers {
  shift: boolean;
  ctrl: boolean;
  alt: boolean;
  meta: boolean;
}

export interface KeyEvent {
  kind: 'keydown' | 'keyup';
  key: string;  // normalised name: 'a', 'space', 'left', 'return', ...
  code: string; // physical key code as reported by the host
  modifiers: Modifiers;
}

export interface MouseButtonEvent {
  kind: 'mousedown' | 'mouseup';
  position: Vec2;
  button: string;       // 'left' | 'middle' | 'right' or the 1-based number
  buttonNumber: number; // 1-based
}

export interface MouseMoveEvent {
  kind: 'mousemove';
  position: Vec2;
  relative: Vec2;
  buttons: ReadonlySet<string>;
}

export interface MouseWheelEvent {
  kind: 'mousewheel';
  deltaX: number;
  deltaY: number;
  flipped: boolean;
}

export interface QuitEvent {
  kind: 'quit';
}

export type InputEvent = KeyEvent | MouseButtonEvent | MouseMoveEvent | MouseWheelEvent | QuitEvent;

export interface InputSource {
  /** Drains everything queued since the last poll */
  poll(): InputEvent[];
  mousePosition(): Vec2;
}

export const NO_MODIFIERS: Modifiers = Object.freeze({ shift: false, ctrl: false, alt: false, meta: false });

const KEY_NAMES: Readonly<Record<string, string>> = {
  ' ': 'space',
  ArrowLeft: 'left',
  ArrowRight: 'right',
  ArrowUp: 'up',
  ArrowDown: 'down',
  Enter: 'return',
  Escape: 'escape',
  Backspace: 'backspace',
  Delete: 'delete',
  Tab: 'tab',
  PageUp: 'page up',
  PageDown: 'page down',
  CapsLock: 'caps lock',
};

const SIDED_KEYS: Readonly<Record<string, string>> = {
  Shift: 'shift',
  Control: 'ctrl',
  Alt: 'alt',
  Meta: 'meta',
};

const BUTTON_NAMES: readonly string[] = ['left', 'middle', 'right'];

/**
 * Lower-case key name the handlers match on. Modifier keys carry their
 * side: 'left shift', 'right ctrl'.
 */
export function keyName(key: string, location = 0): string {
  const sided = SIDED_KEYS[key];
  if (sided) {
    return `${location === 2 ? 'right' : 'left'} ${sided}`;
  }
  return KEY_NAMES[key] ?? key.toLowerCase();
}

/** 1-based button number to name, unnamed buttons keep their number */
export function buttonName(buttonNumber: number): string {
  return BUTTON_NAMES[buttonNumber - 1] ?? String(buttonNumber);
}

/**
 * In-memory source, events are pushed by hand
 */
export class EventQueue implements InputSource {
  private events: InputEvent[];
  private mouse: Vec2;

  constructor() {
    this.events = [];
    this.mouse = { x: 0, y: 0 };
  }

  push(...events: InputEvent[]): void {
    for (const event of events) {
      if (event.kind === 'mousemove' || event.kind === 'mousedown' || event.kind === 'mouseup') {
        this.mouse = { ...event.position };
      }
      this.events.push(event);
    }
  }

  setMousePosition(position: Vec2): void {
    this.mouse = { ...position };
  }

  poll(): InputEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }

  mousePosition(): Vec2 {
    return { ...this.mouse };
  }
}

export interface DomInputConfig {
  keyTarget?: EventTarget; // default: the element's window
  debug?: boolean;
}

/**
 * Listens on a canvas (mouse) and its window (keys, unload). Mouse
 * positions are scaled from CSS pixels to the canvas' own pixels.
 */
export class DomInputSource implements InputSource {
  readonly element: HTMLElement;
  private keyTarget: EventTarget;
  private queue: EventQueue;
  private heldButtons: Set<string>;
  private lastMouse: Vec2 | null;
  private debug: boolean;

  constructor(element: HTMLElement, config: DomInputConfig = {}) {
    this.element = element;
    this.keyTarget = config.keyTarget ?? element.ownerDocument.defaultView ?? element;
    this.queue = new EventQueue();
    this.heldButtons = new Set();
    this.lastMouse = null;
    this.debug = config.debug ?? false;

    this.keyTarget.addEventListener('keydown', this.onKey);
    this.keyTarget.addEventListener('keyup', this.onKey);
    this.keyTarget.addEventListener('beforeunload', this.onUnload);
    this.element.addEventListener('mousedown', this.onMouseButton);
    this.element.addEventListener('mouseup', this.onMouseButton);
    this.element.addEventListener('mousemove', this.onMouseMove);
    this.element.addEventListener('wheel', this.onWheel);
  }

  poll(): InputEvent[] {
    return this.queue.poll();
  }

  mousePosition(): Vec2 {
    return this.queue.mousePosition();
  }

  detach(): void {
    this.keyTarget.removeEventListener('keydown', this.onKey);
    this.keyTarget.removeEventListener('keyup', this.onKey);
    this.keyTarget.removeEventListener('beforeunload', this.onUnload);
    this.element.removeEventListener('mousedown', this.onMouseButton);
    this.element.removeEventListener('mouseup', this.onMouseButton);
    this.element.removeEventListener('mousemove', this.onMouseMove);
    this.element.removeEventListener('wheel', this.onWheel);
  }

  /** Client coordinates to element pixels */
  toCanvasPixels(clientX: number, clientY: number): Vec2 {
    const rect = this.element.getBoundingClientRect();
    let sx = 1;
    let sy = 1;
    if (this.element instanceof HTMLCanvasElement && rect.width > 0 && rect.height > 0) {
      sx = this.element.width / rect.width;
      sy = this.element.height / rect.height;
    }
    return { x: (clientX - rect.left) * sx, y: (clientY - rect.top) * sy };
  }

  private onKey = (event: Event): void => {
    if (!(event instanceof KeyboardEvent)) return;
    if (event.type === 'keydown' && event.repeat) return;
    this.queue.push({
      kind: event.type === 'keydown' ? 'keydown' : 'keyup',
      key: keyName(event.key, event.location),
      code: event.code,
      modifiers: {
        shift: event.shiftKey,
        ctrl: event.ctrlKey,
        alt: event.altKey,
        meta: event.metaKey,
      },
    });
  };

  private onMouseButton = (event: Event): void => {
    if (!(event instanceof MouseEvent)) return;
    const buttonNumber = event.button + 1;
    const button = buttonName(buttonNumber);
    const kind = event.type === 'mousedown' ? 'mousedown' : 'mouseup';
    if (kind === 'mousedown') {
      this.heldButtons.add(button);
    } else {
      this.heldButtons.delete(button);
    }
    this.queue.push({ kind, position: this.toCanvasPixels(event.clientX, event.clientY), button, buttonNumber });
  };

  private onMouseMove = (event: Event): void => {
    if (!(event instanceof MouseEvent)) return;
    const position = this.toCanvasPixels(event.clientX, event.clientY);
    const relative = this.lastMouse
      ? { x: position.x - this.lastMouse.x, y: position.y - this.lastMouse.y }
      : { x: 0, y: 0 };
    this.lastMouse = position;
    this.queue.push({ kind: 'mousemove', position, relative, buttons: new Set(this.heldButtons) });
  };

  private onWheel = (event: Event): void => {
    if (!(event instanceof WheelEvent)) return;
    // positive deltaY means scrolling up
    this.queue.push({ kind: 'mousewheel', deltaX: event.deltaX, deltaY: -event.deltaY, flipped: false });
  };

  private onUnload = (): void => {
    if (this.debug) {
      console.log('[Input] Window closing, queueing quit');
    }
    this.queue.push({ kind: 'quit' });
  };
}
