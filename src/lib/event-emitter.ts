/**
 * Typed event emitter for classes that emit their own events.
 *
 * ```typescript
 * interface Events { ready: { at: number } }
 * class Thing extends EventEmitterProtected<Events> {}
 * new Thing().on('ready', ({ at }) => console.log(at));
 * ```
 */

import { isPromise } from './type-guards';

export type EventListener<TData> = (data: TData) => void | Promise<void>;

export type ListenerErrorHandler = (event: string, error: unknown) => void;

type ListenerTable<TEventMap> = {
  [K in keyof TEventMap]?: Set<EventListener<TEventMap[K]>>;
};

export interface EventEmitterOptions {
  /** Receives errors thrown (or rejected) by listeners. Defaults to console.error. */
  onListenerError?: ListenerErrorHandler;
}

export class EventEmitterProtected<TEventMap extends object> {
  private listeners: ListenerTable<TEventMap> = {};
  private readonly onListenerError: ListenerErrorHandler;

  constructor(options: EventEmitterOptions = {}) {
    this.onListenerError =
      options.onListenerError ??
      ((event, error) => {
        console.error(`Error in event handler for ${event}:`, error);
      });
  }

  /**
   * Subscribe to an event.
   * @returns A function that unsubscribes the listener
   */
  public on<K extends keyof TEventMap>(
    event: K,
    listener: EventListener<TEventMap[K]>,
  ): () => void {
    const set = this.listeners[event] ?? new Set<EventListener<TEventMap[K]>>();
    set.add(listener);
    this.listeners[event] = set;

    return () => {
      const current = this.listeners[event];

      if (current) {
        current.delete(listener);

        if (current.size === 0) {
          delete this.listeners[event];
        }
      }
    };
  }

  /**
   * Subscribe for the next emission only.
   */
  public once<K extends keyof TEventMap>(
    event: K,
    listener: EventListener<TEventMap[K]>,
  ): () => void {
    const unsubscribe = this.on(event, (data) => {
      unsubscribe();
      return listener(data);
    });

    return unsubscribe;
  }

  public hasListeners(event: keyof TEventMap): boolean {
    return this.listenerCount(event) > 0;
  }

  public listenerCount(event: keyof TEventMap): number {
    return this.listeners[event]?.size ?? 0;
  }

  /**
   * Remove all listeners, or only those of `event`.
   */
  public clear(event?: keyof TEventMap): void {
    if (event === undefined) {
      this.listeners = {};
    } else {
      delete this.listeners[event];
    }
  }

  protected emit<K extends keyof TEventMap>(
    event: K,
    data: TEventMap[K],
  ): void {
    const set = this.listeners[event];

    if (!set) {
      return;
    }

    const eventName = String(event);

    // Copy so listeners that unsubscribe during emit don't skip siblings
    for (const listener of [...set]) {
      try {
        const result = listener(data);

        if (isPromise(result)) {
          void Promise.resolve(result).catch((error: unknown) => {
            this.onListenerError(eventName, error);
          });
        }
      } catch (error) {
        this.onListenerError(eventName, error);
      }
    }
  }
}
