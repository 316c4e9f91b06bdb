import { describe, it, expect, vi } from 'vitest';
import { HANDLER_KINDS, HandlerRegistry } from '../src/handlers.js';
import { NO_MODIFIERS, type KeyEvent } from '../src/input.js';

const keydown: KeyEvent = { kind: 'keydown', key: 'space', code: 'Space', modifiers: NO_MODIFIERS };

describe('HandlerRegistry', () => {
  it('should start empty for every kind', () => {
    const registry = new HandlerRegistry();
    expect(HANDLER_KINDS.filter((kind) => registry.has(kind))).toEqual([]);
  });

  it('should call each owner once with the payload', () => {
    const registry = new HandlerRegistry();
    const first = vi.fn();
    const second = vi.fn();
    registry.add('keydown', {}, first);
    registry.add('keydown', {}, second);

    registry.dispatch('keydown', keydown);

    expect(first).toHaveBeenCalledWith(keydown);
    expect(second).toHaveBeenCalledWith(keydown);
  });

  it('should replace a handler registered twice by the same owner', () => {
    const registry = new HandlerRegistry();
    const owner = {};
    const old = vi.fn();
    const latest = vi.fn();
    registry.add('keyup', owner, old);
    registry.add('keyup', owner, latest);

    registry.dispatch('keyup', { ...keydown, kind: 'keyup' });

    expect(old).not.toHaveBeenCalled();
    expect(latest).toHaveBeenCalledTimes(1);
  });

  it('should return handler results in registration order', () => {
    const registry = new HandlerRegistry();
    registry.add('quit', {}, () => false);
    registry.add('quit', {}, () => {});
    registry.add('quit', {}, () => true);

    expect(registry.dispatch('quit', undefined)).toEqual([false, undefined, true]);
  });

  it('should remove one kind or every kind for an owner', () => {
    const registry = new HandlerRegistry();
    const owner = {};
    registry.add('keydown', owner, () => {});
    registry.add('mousemove', owner, () => {});
    registry.add('quit', owner, () => true);

    registry.remove('keydown', owner);
    expect(registry.has('keydown')).toBe(false);
    expect(registry.has('mousemove')).toBe(true);

    registry.removeOwner(owner);
    expect(registry.handlers('mousemove')).toEqual([]);
    expect(registry.has('quit')).toBe(false);
  });
});
