/**
 * Type-safe event emitter with wildcard subscribers
 */

export type EventHandler<T = unknown> = (data: T) => void;

export type AnyEventHandler<TEvents extends Record<string, unknown>> = (
  event: keyof TEvents,
  data: TEvents[keyof TEvents]
) => void;

export interface EventEmitter<TEvents extends Record<string, unknown>> {
  on<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void;
  off<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void;
  emit<K extends keyof TEvents>(event: K, data: TEvents[K]): void;
  once<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void;
  onAny(handler: AnyEventHandler<TEvents>): () => void;
  removeAllListeners(event?: keyof TEvents): void;
  listenerCount(event: keyof TEvents): number;
}

type HandlerMap<TEvents extends Record<string, unknown>> = {
  [K in keyof TEvents]?: Set<EventHandler<TEvents[K]>>;
};

export class TypedEventEmitter<TEvents extends Record<string, unknown>>
  implements EventEmitter<TEvents>
{
  private listeners: HandlerMap<TEvents> = {};
  private anyListeners = new Set<AnyEventHandler<TEvents>>();

  /**
   * Register an event handler
   */
  on<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void {
    const handlers = this.listeners[event] ?? new Set<EventHandler<TEvents[K]>>();
    handlers.add(handler);
    this.listeners[event] = handlers;
  }

  /**
   * Unregister an event handler
   */
  off<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void {
    const handlers = this.listeners[event];
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        delete this.listeners[event];
      }
    }
  }

  /**
   * Emit an event to its handlers, then to wildcard subscribers
   */
  emit<K extends keyof TEvents>(event: K, data: TEvents[K]): void {
    const handlers = this.listeners[event];
    if (handlers) {
      // Copy so handlers may unsubscribe while we iterate
      for (const handler of Array.from(handlers)) {
        handler(data);
      }
    }
    for (const handler of Array.from(this.anyListeners)) {
      handler(event, data);
    }
  }

  /**
   * Register a one-time event handler
   */
  once<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void {
    const onceHandler: EventHandler<TEvents[K]> = (data) => {
      this.off(event, onceHandler);
      handler(data);
    };
    this.on(event, onceHandler);
  }

  /**
   * Subscribe to every event. Returns an unsubscribe function.
   */
  onAny(handler: AnyEventHandler<TEvents>): () => void {
    this.anyListeners.add(handler);
    return () => {
      this.anyListeners.delete(handler);
    };
  }

  /**
   * Remove all listeners for an event, or all events if none specified
   */
  removeAllListeners(event?: keyof TEvents): void {
    if (event !== undefined) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
      this.anyListeners.clear();
    }
  }

  /**
   * Get the number of listeners for an event
   */
  listenerCount(event: keyof TEvents): number {
    return this.listeners[event]?.size ?? 0;
  }
}
