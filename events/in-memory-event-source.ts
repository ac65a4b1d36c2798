import type { RuntimeEvent } from '../core/contracts/events';
import type { EventSource, EventSourceHandlers, EventSubscription } from './event-source';

/**
 * In-process feed for tests and embedding. Events emitted before anyone subscribes are buffered.
 */
export class InMemoryEventSource implements EventSource {
  private readonly subscribers = new Set<EventSourceHandlers>();
  private readonly backlog: RuntimeEvent[] = [];

  emit(event: RuntimeEvent): void {
    if (this.subscribers.size === 0) {
      this.backlog.push(event);
      return;
    }
    for (const subscriber of this.subscribers) {
      try {
        subscriber.onEvent(event);
      } catch (error) {
        subscriber.onError?.(error instanceof Error ? error : new Error(String(error)));
      }
    }
  }

  subscribe(handlers: EventSourceHandlers): EventSubscription {
    this.subscribers.add(handlers);
    for (const event of this.backlog.splice(0)) {
      handlers.onEvent(event);
    }
    return {
      close: async () => {
        this.subscribers.delete(handlers);
      }
    };
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }
}
