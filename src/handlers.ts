/**
 * handlers - Per-event-kind callback registry shared by a scene's actors
 */

import type { KeyEvent, MouseButtonEvent, MouseMoveEvent, MouseWheelEvent } from './input.js';

// Payload each handler kind receives; mouse positions are y-up
export interface HandlerPayloads {
  keydown: KeyEvent;
  keyup: KeyEvent;
  keypress: ReadonlySet<string>;    // every held key, once per poll
  mousedown: MouseButtonEvent;
  mouseup: MouseButtonEvent;
  mousebutton: ReadonlySet<string>; // every held button, once per poll
  mousemove: MouseMoveEvent;
  mousewheel: MouseWheelEvent;
  quit: undefined;
}

export type HandlerKind = keyof HandlerPayloads;

// Only quit handlers' return value is read: true lets the scene stop
export type Handler<K extends HandlerKind> = (payload: HandlerPayloads[K]) => boolean | void;

type HandlerTable = { [K in HandlerKind]: Map<object, Handler<K>> };

export const HANDLER_KINDS: readonly HandlerKind[] = [
  'keydown',
  'keyup',
  'keypress',
  'mousedown',
  'mouseup',
  'mousebutton',
  'mousemove',
  'mousewheel',
  'quit',
];

export class HandlerRegistry {
  private table: HandlerTable;

  constructor() {
    this.table = {
      keydown: new Map(),
      keyup: new Map(),
      keypress: new Map(),
      mousedown: new Map(),
      mouseup: new Map(),
      mousebutton: new Map(),
      mousemove: new Map(),
      mousewheel: new Map(),
      quit: new Map(),
    };
  }

  /** One handler per owner and kind, a second call replaces the first */
  add<K extends HandlerKind>(kind: K, owner: object, handler: Handler<K>): void {
    this.table[kind].set(owner, handler);
  }

  remove(kind: HandlerKind, owner: object): void {
    this.table[kind].delete(owner);
  }

  removeOwner(owner: object): void {
    for (const kind of HANDLER_KINDS) {
      this.table[kind].delete(owner);
    }
  }

  has(kind: HandlerKind): boolean {
    return this.table[kind].size > 0;
  }

  handlers<K extends HandlerKind>(kind: K): Handler<K>[] {
    return [...this.table[kind].values()];
  }

  /** Calls every handler of `kind`, returns their results in order */
  dispatch<K extends HandlerKind>(kind: K, payload: HandlerPayloads[K]): (boolean | void)[] {
    return this.handlers(kind).map((handler) => handler(payload));
  }
}
