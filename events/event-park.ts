import type { RuntimeEvent } from '../core/contracts/events';

export type SubmitOutcome = 'accepted' | 'duplicate';

/**
 * Ordered, deduplicated holding area for events that arrived but were not processed yet.
 * Events leave in arrival order, so events sharing a conversation keep their relative order.
 * A marker at or below the highest one already accepted for that conversation is a redelivery.
 */
export class EventPark {
  private readonly queue: RuntimeEvent[] = [];
  private readonly highestSequence = new Map<string, number>();
  private waiters: Array<() => void> = [];

  submit(event: RuntimeEvent): SubmitOutcome {
    const highest = this.highestSequence.get(event.conversationId);
    if (highest !== undefined && event.sequence <= highest) {
      return 'duplicate';
    }
    this.highestSequence.set(event.conversationId, event.sequence);
    this.queue.push(event);
    this.wake();
    return 'accepted';
  }

  take(): RuntimeEvent | undefined {
    return this.queue.shift();
  }

  get size(): number {
    return this.queue.length;
  }

  /** Drops dedup state for a conversation that will never produce events again. */
  forget(conversationId: string): void {
    this.highestSequence.delete(conversationId);
  }

  /**
   * Resolves true as soon as an event is submitted, false when the timeout elapses or
   * the signal aborts first.
   */
  waitForWork(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    if (this.queue.length > 0) {
      return Promise.resolve(true);
    }
    if (signal?.aborted) {
      return Promise.resolve(false);
    }

    return new Promise<boolean>((resolve) => {
      let settled = false;
      const finish = (arrived: boolean): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.waiters = this.waiters.filter((waiter) => waiter !== onWork);
        resolve(arrived);
      };
      const onWork = (): void => finish(true);
      const onAbort = (): void => finish(false);
      const timer = setTimeout(() => finish(false), timeoutMs);

      this.waiters.push(onWork);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
