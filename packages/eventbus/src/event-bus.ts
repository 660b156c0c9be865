import type { EventHandler, IEventBus } from '@taskfit/core';
import { createLogger } from '@taskfit/core';

const log = createLogger('EventBus');

/**
 * Synchronous in-process event bus. Handlers run in registration order; a
 * throwing handler is logged and does not stop the others.
 */
export class EventBus implements IEventBus {
  private handlers = new Map<string, EventHandler[]>();

  on(event: string, handler: EventHandler): () => void {
    const list = this.handlers.get(event) ?? [];
    list.push(handler);
    this.handlers.set(event, list);
    return () => this.off(event, handler);
  }

  once(event: string, handler: EventHandler): () => void {
    const unsubscribe = this.on(event, (payload) => {
      unsubscribe();
      handler(payload);
    });
    return unsubscribe;
  }

  emit(event: string, payload: unknown): void {
    const list = this.handlers.get(event);
    if (!list) return;
    // Copy so handlers that unsubscribe during dispatch don't skip siblings
    for (const handler of [...list]) {
      try {
        handler(payload);
      } catch (error) {
        log.error(`Error in handler for "${event}"`, error);
      }
    }
  }

  removeAllListeners(event?: string): void {
    if (event === undefined) {
      this.handlers.clear();
    } else {
      this.handlers.delete(event);
    }
  }

  listenerCount(event: string): number {
    return this.handlers.get(event)?.length ?? 0;
  }

  private off(event: string, handler: EventHandler): void {
    const list = this.handlers.get(event);
    if (!list) return;
    const remaining = list.filter((h) => h !== handler);
    if (remaining.length === 0) {
      this.handlers.delete(event);
    } else {
      this.handlers.set(event, remaining);
    }
  }
}
