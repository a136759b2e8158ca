/**
 * SimpleEventEmitter - generic publish/subscribe
 *
 * Lightweight emitter for components whose events are not grid edits
 * (UndoStack uses it for history state).
 */

type EventHandler<T> = (payload: T) => void;

/**
 * @template Events - map of event name to payload type
 *
 * @example
 * ```ts
 * interface HistoryEvents {
 *   changed: { depth: number };
 * }
 *
 * const emitter = new SimpleEventEmitter<HistoryEvents>();
 * emitter.on('changed', ({ depth }) => console.log(depth));
 * emitter.emit('changed', { depth: 3 });
 * ```
 */
export class SimpleEventEmitter<Events extends object> {
  private listeners = new Map<keyof Events, Set<EventHandler<unknown>>>();

  on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void {
    let handlers = this.listeners.get(event);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(event, handlers);
    }

    const stored = handler as EventHandler<unknown>;
    handlers.add(stored);

    return () => {
      const current = this.listeners.get(event);
      if (!current) return;
      current.delete(stored);
      if (current.size === 0) {
        this.listeners.delete(event);
      }
    };
  }

  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const handlers = this.listeners.get(event);
    if (handlers) {
      for (const handler of [...handlers]) {
        try {
          handler(payload);
        } catch (error) {
          console.error(`[SimpleEventEmitter] Handler error for "${String(event)}":`, error);
        }
      }
    }
  }

  removeAllListeners(event?: keyof Events): void {
    if (event !== undefined) {
      this.listeners.delete(event);
    } else {
      this.listeners.clear();
    }
  }

  destroy(): void {
    this.removeAllListeners();
  }
}
