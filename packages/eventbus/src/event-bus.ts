import type { EventHandler, IEventBus } from '@mender/core';
import { createLogger } from '@mender/core';

const log = createLogger('EventBus');

/**
 * Synchronous in-process pub/sub. A throwing handler is logged and
 * does not stop delivery to the remaining handlers.
 */
export class EventBus implements IEventBus {
  private readonly handlers = new Map<string, Set<EventHandler>>();

  on(event: string, handler: EventHandler): () => void {
    let set = this.handlers.get(event);
    if (!set) {
      set = new Set();
      this.handlers.set(event, set);
    }
    set.add(handler);
    return () => {
      this.handlers.get(event)?.delete(handler);
    };
  }

  once(event: string, handler: EventHandler): () => void {
    const unsubscribe = this.on(event, (payload) => {
      unsubscribe();
      handler(payload);
    });
    return unsubscribe;
  }

  emit(event: string, payload: unknown): void {
    const set = this.handlers.get(event);
    if (!set) return;
    // Copy so handlers may unsubscribe while we iterate
    for (const handler of [...set]) {
      try {
        handler(payload);
      } catch (error) {
        log.error(`Error in handler for "${event}"`, { error: String(error) });
      }
    }
  }

  listenerCount(event: string): number {
    return this.handlers.get(event)?.size ?? 0;
  }

  removeAllListeners(event?: string): void {
    if (event === undefined) {
      this.handlers.clear();
    } else {
      this.handlers.delete(event);
    }
  }
}
