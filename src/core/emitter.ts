import type { EventHandler, EventUnsubscribe } from '../types';

type HandlerSets<E> = { [K in keyof E]?: Set<EventHandler<E[K]>> };

/**
 * Minimal typed event emitter keyed by payload type.
 * A throwing handler is logged and does not stop the remaining handlers.
 */
export class Emitter<E> {
  private handlers: HandlerSets<E> = {};

  constructor(private readonly label: string) {}

  /**
   * Subscribe to an event.
   * @returns Unsubscribe function
   */
  on<K extends keyof E>(event: K, handler: EventHandler<E[K]>): EventUnsubscribe {
    let set = this.handlers[event];
    if (!set) {
      set = new Set();
      this.handlers[event] = set;
    }
    set.add(handler);
    return () => this.off(event, handler);
  }

  /** Unsubscribe from an event. */
  off<K extends keyof E>(event: K, handler: EventHandler<E[K]>): void {
    this.handlers[event]?.delete(handler);
  }

  /** Subscribe to an event, auto-unsubscribe after first call. */
  once<K extends keyof E>(event: K, handler: EventHandler<E[K]>): EventUnsubscribe {
    const wrapped: EventHandler<E[K]> = (payload) => {
      unsub();
      handler(payload);
    };
    const unsub = this.on(event, wrapped);
    return unsub;
  }

  emit<K extends keyof E>(event: K, payload: E[K]): void {
    this.handlers[event]?.forEach((handler) => {
      try {
        handler(payload);
      } catch (e) {
        console.error(`[${this.label}] Error in ${String(event)} handler:`, e);
      }
    });
  }

  /** Number of handlers registered for an event */
  listenerCount<K extends keyof E>(event: K): number {
    return this.handlers[event]?.size ?? 0;
  }

  clear(): void {
    this.handlers = {};
  }
}
