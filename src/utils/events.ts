/**
 * Type-Safe Event Bus
 *
 * Strongly-typed pub/sub used by the pipeline to report ticks, dispatches and
 * completions to the CLI and the completion server.
 *
 * @module
 */

export type EventHandler<T> = (payload: T) => void;

type HandlerMap<Events> = { [K in keyof Events]?: Set<EventHandler<Events[K]>> };

/**
 * Type-safe event emitter for decoupled communication.
 *
 * @example
 * ```typescript
 * interface PipelineEvents {
 *   "file:dispatched": { path: string; correlationId: string };
 * }
 *
 * const bus = new EventBus<PipelineEvents>();
 * bus.on("file:dispatched", ({ path }) => console.log(path));
 * ```
 */
export class EventBus<Events extends object> {
  private handlers: HandlerMap<Events> = {};

  /**
   * Subscribes to an event.
   *
   * @returns Unsubscribe function
   */
  on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void {
    let set = this.handlers[event];
    if (!set) {
      set = new Set();
      this.handlers[event] = set;
    }
    set.add(handler);
    return () => this.off(event, handler);
  }

  off<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
    this.handlers[event]?.delete(handler);
  }

  /**
   * Emits an event to all subscribers. A throwing subscriber does not stop the others.
   */
  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const set = this.handlers[event];
    if (!set) return;
    for (const handler of [...set]) {
      try {
        handler(payload);
      } catch (error) {
        this.onHandlerError?.(error, String(event));
      }
    }
  }

  /** Called with errors thrown by subscribers */
  onHandlerError?: (error: unknown, event: string) => void;
}
