/**
 * Type-Safe Event Bus
 *
 * Provides a strongly-typed pub/sub mechanism for progress updates,
 * status changes, and cross-module communication.
 *
 * @module
 */

export type EventHandler<T> = (payload: T) => void;

/**
 * Type-safe event emitter for decoupled communication.
 *
 * @example
 * ```typescript
 * interface MyEvents {
 *   'task:done': { key: string };
 * }
 *
 * const bus = new EventBus<MyEvents>();
 * bus.on('task:done', ({ key }) => console.log(key));
 * bus.emit('task:done', { key: 'channel:chan_1' });
 * ```
 */
export class EventBus<Events extends object> {
  private handlers: { [K in keyof Events]?: Set<EventHandler<Events[K]>> } = {};

  /**
   * Subscribes to an event.
   *
   * @returns Unsubscribe function
   */
  on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void {
    let set = this.handlers[event];
    if (!set) {
      set = new Set<EventHandler<Events[K]>>();
      this.handlers[event] = set;
    }
    set.add(handler);
    return () => this.off(event, handler);
  }

  off<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
    this.handlers[event]?.delete(handler);
  }

  /**
   * Emits an event to all subscribers. A throwing handler does not stop
   * delivery to the others; its error is rethrown after all ran.
   */
  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const set = this.handlers[event];
    if (!set) return;

    const errors: unknown[] = [];
    for (const handler of [...set]) {
      try {
        handler(payload);
      } catch (error) {
        errors.push(error);
      }
    }
    if (errors.length === 1) throw errors[0];
    if (errors.length > 1) throw new AggregateError(errors, `Multiple handlers failed for ${String(event)}`);
  }

  once<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void {
    const wrappedHandler: EventHandler<Events[K]> = (payload) => {
      this.off(event, wrappedHandler);
      handler(payload);
    };
    return this.on(event, wrappedHandler);
  }
}
