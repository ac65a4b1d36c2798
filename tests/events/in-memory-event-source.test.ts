import type { RuntimeEvent } from '../../core/contracts/events';
import { InMemoryEventSource } from '../../events/in-memory-event-source';
import { makeEvent } from '../support/fake-backend';

describe('InMemoryEventSource', () => {
  it('buffers events emitted before the first subscriber', () => {
    const source = new InMemoryEventSource();
    source.emit(makeEvent('generation_requested', 'c1', 1, {}));
    source.emit(makeEvent('generation_requested', 'c1', 2, {}));

    const received: RuntimeEvent[] = [];
    source.subscribe({ onEvent: (event) => received.push(event) });

    expect(received.map((event) => event.sequence)).toEqual([1, 2]);
  });

  it('stops delivering after the subscription closes', async () => {
    const source = new InMemoryEventSource();
    const received: RuntimeEvent[] = [];
    const subscription = source.subscribe({ onEvent: (event) => received.push(event) });

    source.emit(makeEvent('generation_requested', 'c1', 1, {}));
    await subscription.close();
    source.emit(makeEvent('generation_requested', 'c1', 2, {}));

    expect(received).toHaveLength(1);
    expect(source.subscriberCount).toBe(0);
  });

  it('reports a throwing subscriber through onError', () => {
    const source = new InMemoryEventSource();
    const errors: string[] = [];
    source.subscribe({
      onEvent: () => {
        throw new Error('subscriber broke');
      },
      onError: (error) => errors.push(error.message)
    });

    source.emit(makeEvent('generation_requested', 'c1', 1, {}));

    expect(errors).toEqual(['subscriber broke']);
  });
});
