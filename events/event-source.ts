import type { RuntimeEvent } from '../core/contracts/events';

export interface EventSubscription {
  /** Stops delivery and releases the remote subscription. Idempotent. */
  close(): Promise<void>;
}

export interface EventSourceHandlers {
  onEvent(event: RuntimeEvent): void;
  onError?(error: Error): void;
}

/**
 * A live subscription to a remote event feed. Delivery is at-least-once; the park
 * drops redelivered markers.
 */
export interface EventSource {
  subscribe(handlers: EventSourceHandlers): EventSubscription;
}
