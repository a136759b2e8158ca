/**
 * EventEmitter - typed publish/subscribe for grid edits
 *
 * GridEditor publishes every change through this class; views subscribe to
 * the events they care about.
 *
 * @example
 * const emitter = new EventEmitter<number>();
 *
 * const unsubscribe = emitter.on('row:removed', (event) => {
 *   console.log(`row ${event.payload.row} removed`);
 * });
 *
 * emitter.emit('row:removed', { row: 0, values: [10, 5, 4] });
 *
 * unsubscribe();
 */

import type {
  GridEventType,
  GridEvent,
  GridEventPayloads,
  GridEventHandler,
  Unsubscribe,
} from '../types';

/**
 * Framework independent event hub
 *
 * @template T - element type carried in payloads
 */
export class EventEmitter<T> {
  /**
   * Handlers per event type. A Set keeps registration order and ignores a
   * handler registered twice.
   */
  private listeners = new Map<GridEventType, Set<GridEventHandler<T, GridEventType>>>();

  /** Handlers that receive every event (handy for logging) */
  private wildcardListeners = new Set<GridEventHandler<T, GridEventType>>();

  /**
   * Subscribe to one event type
   *
   * @returns function that removes the subscription
   */
  on<K extends GridEventType>(type: K, handler: GridEventHandler<T, K>): Unsubscribe {
    let handlers = this.listeners.get(type);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(type, handlers);
    }

    // Payload type is keyed by `type`, which the Map cannot express
    handlers.add(handler as GridEventHandler<T, GridEventType>);

    return () => {
      this.off(type, handler);
    };
  }

  /**
   * Subscribe to every event
   *
   * @example
   * emitter.onAny((event) => {
   *   console.log(`[${event.type}]`, event.payload);
   * });
   */
  onAny(handler: GridEventHandler<T, GridEventType>): Unsubscribe {
    this.wildcardListeners.add(handler);
    return () => {
      this.wildcardListeners.delete(handler);
    };
  }

  off<K extends GridEventType>(type: K, handler: GridEventHandler<T, K>): void {
    const handlers = this.listeners.get(type);
    if (handlers) {
      handlers.delete(handler as GridEventHandler<T, GridEventType>);

      if (handlers.size === 0) {
        this.listeners.delete(type);
      }
    }
  }

  /**
   * Subscribe for the next occurrence only
   */
  once<K extends GridEventType>(type: K, handler: GridEventHandler<T, K>): Unsubscribe {
    const onceHandler: GridEventHandler<T, K> = (event) => {
      this.off(type, onceHandler);
      handler(event);
    };

    return this.on(type, onceHandler);
  }

  /**
   * Deliver an event to its subscribers, then to the wildcard subscribers
   */
  emit<K extends GridEventType>(type: K, payload: GridEventPayloads<T>[K]): void {
    const event: GridEvent<T, K> = {
      type,
      payload,
      timestamp: Date.now(),
    };

    const handlers = this.listeners.get(type);
    if (handlers) {
      // Copy: a handler may subscribe or unsubscribe while we loop
      for (const handler of [...handlers]) {
        this.safeCall(handler, event);
      }
    }

    for (const handler of [...this.wildcardListeners]) {
      this.safeCall(handler, event);
    }
  }

  /**
   * A throwing handler is logged and does not stop the others
   */
  private safeCall<K extends GridEventType>(
    handler: GridEventHandler<T, GridEventType>,
    event: GridEvent<T, K>
  ): void {
    try {
      handler(event);
    } catch (error) {
      console.error(`[EventEmitter] Handler error for "${event.type}":`, error);
    }
  }

  /**
   * Remove the handlers of one type, or of every type when called without one
   */
  removeAllListeners(type?: GridEventType): void {
    if (type) {
      this.listeners.delete(type);
    } else {
      this.listeners.clear();
      this.wildcardListeners.clear();
    }
  }

  listenerCount(type?: GridEventType): number {
    if (type) {
      return this.listeners.get(type)?.size ?? 0;
    }

    let count = this.wildcardListeners.size;
    for (const handlers of this.listeners.values()) {
      count += handlers.size;
    }
    return count;
  }

  eventTypes(): GridEventType[] {
    return [...this.listeners.keys()];
  }

  destroy(): void {
    this.removeAllListeners();
  }
}
