/**
 * EventEmitter / SimpleEventEmitter tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { EventEmitter } from '../../src/core/EventEmitter';
import { SimpleEventEmitter } from '../../src/core/SimpleEventEmitter';

describe('EventEmitter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('delivers payloads to subscribers of that type only', () => {
    const emitter = new EventEmitter<number>();
    const removed = vi.fn();
    const cleared = vi.fn();

    emitter.on('row:removed', removed);
    emitter.on('grid:cleared', cleared);
    emitter.emit('row:removed', { row: 1, values: [3, 9] });

    expect(removed).toHaveBeenCalledTimes(1);
    expect(removed.mock.calls[0]?.[0]).toMatchObject({
      type: 'row:removed',
      payload: { row: 1, values: [3, 9] },
    });
    expect(cleared).not.toHaveBeenCalled();
  });

  it('unsubscribe stops delivery', () => {
    const emitter = new EventEmitter<number>();
    const handler = vi.fn();

    const unsubscribe = emitter.on('cell:inserted', handler);
    unsubscribe();
    emitter.emit('cell:inserted', { position: [0, 0], value: 1 });

    expect(handler).not.toHaveBeenCalled();
    expect(emitter.listenerCount('cell:inserted')).toBe(0);
  });

  it('once() fires a single time', () => {
    const emitter = new EventEmitter<number>();
    const handler = vi.fn();

    emitter.once('grid:cleared', handler);
    emitter.emit('grid:cleared', { rowCount: 2, size: 3 });
    emitter.emit('grid:cleared', { rowCount: 0, size: 0 });

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('onAny() sees every event in order', () => {
    const emitter = new EventEmitter<string>();
    const types: string[] = [];

    emitter.onAny((event) => types.push(event.type));
    emitter.emit('cell:inserted', { position: [0, 0], value: 'a' });
    emitter.emit('cells:swapped', { first: [0, 0], second: [0, 1] });

    expect(types).toEqual(['cell:inserted', 'cells:swapped']);
  });

  it('a failing handler is logged and the rest still run', () => {
    const emitter = new EventEmitter<number>();
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const after = vi.fn();

    emitter.on('row:inserted', () => {
      throw new Error('boom');
    });
    emitter.on('row:inserted', after);
    emitter.emit('row:inserted', { row: 0, values: [] });

    expect(after).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0]?.[0]).toBe('[EventEmitter] Handler error for "row:inserted":');
  });

  it('counts listeners and clears them on destroy', () => {
    const emitter = new EventEmitter<number>();

    emitter.on('cell:removed', () => {});
    emitter.on('cell:updated', () => {});
    emitter.onAny(() => {});

    expect(emitter.listenerCount()).toBe(3);
    expect(emitter.eventTypes()).toEqual(['cell:removed', 'cell:updated']);

    emitter.destroy();
    expect(emitter.listenerCount()).toBe(0);
  });
});

describe('SimpleEventEmitter', () => {
  interface TestEvents {
    ping: { count: number };
  }

  it('delivers and unsubscribes', () => {
    const emitter = new SimpleEventEmitter<TestEvents>();
    const handler = vi.fn();

    const off = emitter.on('ping', handler);
    emitter.emit('ping', { count: 1 });
    off();
    emitter.emit('ping', { count: 2 });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ count: 1 });
  });
});
