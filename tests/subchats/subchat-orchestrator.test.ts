import type { CreateChildrenRequest } from '../../core/contracts/backend';
import type { ChildSpec, PendingToolCall } from '../../core/contracts/tools';
import { ConversationStore } from '../../conversations/conversation-store';
import { SubchatOrchestrator, WAIT_PLACEHOLDER } from '../../subchats/subchat-orchestrator';
import { PendingCallTable } from '../../tools/pending-calls';
import { FakeBackend } from '../support/fake-backend';

const parentCall: PendingToolCall = {
  invocationId: 'tc-1',
  conversationId: 'parent',
  toolName: 'delegate_subchats',
  arguments: '{}',
  createdAt: 0
};

const specs: ChildSpec[] = [
  { content: 'task a', profile: 'worker' },
  { content: 'task b', profile: 'worker' },
  { content: 'task c', profile: 'reviewer' }
];

function setup(backend = new FakeBackend()) {
  let now = 0;
  let groups = 0;
  const store = new ConversationStore();
  const pendingCalls = new PendingCallTable({ sink: backend });
  const terminated: string[] = [];
  const retired: string[] = [];
  const orchestrator = new SubchatOrchestrator({
    gateway: backend,
    pendingCalls,
    store,
    getTime: () => now,
    generateGroupId: () => `group-${++groups}`,
    onChildTerminated: (childId) => terminated.push(childId),
    onChildRetired: (childId) => retired.push(childId)
  });
  store.ensure('parent');
  pendingCalls.register(parentCall);
  return {
    backend,
    store,
    pendingCalls,
    orchestrator,
    terminated,
    retired,
    setNow: (value: number) => {
      now = value;
    }
  };
}

describe('SubchatOrchestrator', () => {
  it('creates the children, parks the parent and posts a placeholder', async () => {
    const { backend, store, orchestrator } = setup();

    const spawned = await orchestrator.spawn(parentCall, specs);

    expect(spawned).toEqual({ groupId: 'group-1', childIds: ['child-1', 'child-2', 'child-3'] });
    expect(backend.childRequests).toEqual([{ parentInvocationId: 'tc-1', parentConversationId: 'parent', specs }]);
    expect(backend.posts).toEqual([
      {
        invocationId: 'tc-1',
        conversationId: 'parent',
        content: WAIT_PLACEHOLDER,
        subchats: ['child-1', 'child-2', 'child-3'],
        status: 'ok',
        cost: 0,
        placeholder: true
      }
    ]);
    expect(store.get('parent')?.status).toBe('awaiting_children');
    expect(store.get('child-3')).toEqual({
      id: 'child-3',
      kind: 'child',
      profile: 'reviewer',
      status: 'active',
      groupId: 'group-1',
      history: [{ role: 'user', content: 'task c', toolCalls: [] }]
    });
    expect(orchestrator.groupIdOf('child-2')).toBe('group-1');
    expect(orchestrator.openGroups()).toEqual([
      { groupId: 'group-1', parentInvocationId: 'tc-1', childIds: ['child-1', 'child-2', 'child-3'], completed: 0, deadlineAt: 3_600_000 }
    ]);
  });

  it('delivers the values in task order whatever order the children finish in', async () => {
    const { backend, store, orchestrator, retired } = setup();
    await orchestrator.spawn(parentCall, specs);

    await orchestrator.onChildFinalized('group-1', 'child-2', '2');
    await orchestrator.onChildFinalized('group-1', 'child-3', '3');
    expect(backend.finalPosts()).toEqual([]);
    await orchestrator.onChildFinalized('group-1', 'child-1', '1');

    expect(backend.finalPosts()).toEqual([
      { invocationId: 'tc-1', conversationId: 'parent', content: '["1","2","3"]', status: 'ok', cost: 0 }
    ]);
    expect(store.get('parent')?.status).toBe('active');
    expect(store.statusOf('child-1')).toBe('finalized');
    expect(store.isRetired('child-1')).toBe(true);
    expect(retired).toEqual(['child-1', 'child-2', 'child-3']);
    expect(orchestrator.groupIdOf('child-1')).toBeUndefined();
    expect(orchestrator.openGroups()).toEqual([]);
  });

  it('keeps structured values as JSON', async () => {
    const { backend, orchestrator } = setup();
    await orchestrator.spawn(parentCall, specs.slice(0, 2));

    await orchestrator.onChildFinalized('group-1', 'child-1', { score: 3 });
    await orchestrator.onChildFinalized('group-1', 'child-2', null);

    expect(backend.finalPosts()[0]?.content).toBe('[{"score":3},null]');
  });

  it('ignores repeated and late reports', async () => {
    const { backend, orchestrator } = setup();
    await orchestrator.spawn(parentCall, specs.slice(0, 2));

    await expect(orchestrator.onChildFinalized('group-1', 'child-1', 'a')).resolves.toBe(true);
    await expect(orchestrator.onChildFinalized('group-1', 'child-1', 'again')).resolves.toBe(false);
    await expect(orchestrator.onChildFinalized('group-1', 'child-2', 'b')).resolves.toBe(true);
    await expect(orchestrator.onChildFinalized('group-1', 'child-2', 'b')).resolves.toBe(false);
    await expect(orchestrator.onChildFinalized('group-9', 'child-1', 'x')).resolves.toBe(false);

    expect(backend.finalPosts()).toHaveLength(1);
    expect(backend.finalPosts()[0]?.content).toBe('["a","b"]');
  });

  it('times out when a child misses the deadline, exactly once', async () => {
    const { backend, store, orchestrator, terminated, setNow } = setup();
    await orchestrator.spawn(parentCall, specs);
    await orchestrator.onChildFinalized('group-1', 'child-1', '1');
    await orchestrator.onChildFinalized('group-1', 'child-2', '2');

    setNow(3_599_999);
    await expect(orchestrator.checkDeadlines()).resolves.toEqual([]);

    setNow(3_600_000);
    await expect(orchestrator.checkDeadlines()).resolves.toEqual(['group-1']);

    expect(backend.finalPosts()).toEqual([
      {
        invocationId: 'tc-1',
        conversationId: 'parent',
        content: 'Subchat timeout: 1 of 3 subchats did not finish within 3600000 ms',
        status: 'timeout',
        cost: 0
      }
    ]);
    expect(store.statusOf('child-3')).toBe('terminated');
    expect(store.get('parent')?.status).toBe('active');
    expect(terminated).toEqual(['child-3']);

    await expect(orchestrator.onChildFinalized('group-1', 'child-3', '3')).resolves.toBe(false);
    await expect(orchestrator.checkDeadlines()).resolves.toEqual([]);
    expect(backend.finalPosts()).toHaveLength(1);
  });

  it('reports the time left until the nearest deadline', async () => {
    const { orchestrator, setNow } = setup();
    expect(orchestrator.nextDeadlineIn()).toBeUndefined();

    await orchestrator.spawn(parentCall, specs.slice(0, 1));
    setNow(1000);
    expect(orchestrator.nextDeadlineIn()).toBe(3_599_000);

    setNow(4_000_000);
    expect(orchestrator.nextDeadlineIn()).toBe(0);

    await orchestrator.onChildFinalized('group-1', 'child-1', 'done');
    expect(orchestrator.nextDeadlineIn()).toBeUndefined();
  });

  it('fills a failed child slot with an error marker', async () => {
    const { backend, store, orchestrator } = setup();
    await orchestrator.spawn(parentCall, specs.slice(0, 2));

    store.setStatus('child-1', 'failed', 'bad input');
    await orchestrator.onChildFailed('group-1', 'child-1', 'bad input');
    await orchestrator.onChildFinalized('group-1', 'child-2', '2');

    expect(backend.finalPosts()[0]?.content).toBe('[{"error":"bad input"},"2"]');
    expect(store.statusOf('child-1')).toBe('failed');
  });

  it('keeps the parent parked until every one of its groups resolves', async () => {
    const { store, pendingCalls, orchestrator } = setup();
    const secondCall: PendingToolCall = { ...parentCall, invocationId: 'tc-2' };
    pendingCalls.register(secondCall);
    await orchestrator.spawn(parentCall, specs.slice(0, 1));
    await orchestrator.spawn(secondCall, specs.slice(1, 2));

    await orchestrator.onChildFinalized('group-1', 'child-1', 'first');

    expect(store.get('parent')?.status).toBe('awaiting_children');
    expect(orchestrator.openGroups().map((group) => group.groupId)).toEqual(['group-2']);

    await orchestrator.onChildFinalized('group-2', 'child-2', 'second');

    expect(store.get('parent')?.status).toBe('active');
  });

  it('retries a result post that failed on the next deadline check', async () => {
    const { backend, store, orchestrator } = setup();
    await orchestrator.spawn(parentCall, specs.slice(0, 1));
    backend.failNextPosts(1);

    await expect(orchestrator.onChildFinalized('group-1', 'child-1', 'v')).rejects.toThrow('backend unavailable');
    expect(backend.finalPosts()).toEqual([]);
    expect(store.get('parent')?.status).toBe('awaiting_children');
    expect(orchestrator.openGroups()).toEqual([
      { groupId: 'group-1', parentInvocationId: 'tc-1', childIds: ['child-1'], completed: 1, deadlineAt: 3_600_000 }
    ]);

    await expect(orchestrator.checkDeadlines()).resolves.toEqual(['group-1']);

    expect(backend.finalPosts()).toEqual([
      { invocationId: 'tc-1', conversationId: 'parent', content: '["v"]', status: 'ok', cost: 0 }
    ]);
    expect(store.get('parent')?.status).toBe('active');
  });

  it('retries a timeout post that failed', async () => {
    const { backend, store, orchestrator, setNow } = setup();
    await orchestrator.spawn(parentCall, specs.slice(0, 1));
    setNow(3_600_000);
    backend.failNextPosts(1);

    await expect(orchestrator.checkDeadlines()).resolves.toEqual([]);
    expect(store.statusOf('child-1')).toBe('active');

    await expect(orchestrator.checkDeadlines()).resolves.toEqual(['group-1']);
    expect(backend.finalPosts()).toEqual([
      {
        invocationId: 'tc-1',
        conversationId: 'parent',
        content: 'Subchat timeout: 1 of 1 subchats did not finish within 3600000 ms',
        status: 'timeout',
        cost: 0
      }
    ]);
    expect(store.statusOf('child-1')).toBe('terminated');
  });

  it('abandons the group when the placeholder cannot be posted', async () => {
    const { backend, store, orchestrator, terminated } = setup();
    backend.failNextPosts(1);

    await expect(orchestrator.spawn(parentCall, specs.slice(0, 2))).rejects.toThrow('backend unavailable');

    expect(orchestrator.openGroups()).toEqual([]);
    expect(store.get('parent')?.status).toBe('active');
    expect(terminated).toEqual(['child-1', 'child-2']);
    expect(store.isRetired('child-1')).toBe(true);
    expect(backend.failures).toEqual([
      { conversationId: 'child-1', error: 'Subchat group abandoned' },
      { conversationId: 'child-2', error: 'Subchat group abandoned' }
    ]);
    await expect(orchestrator.onChildFinalized('group-1', 'child-1', 'late')).resolves.toBe(false);
  });

  it('rejects a backend that creates the wrong number of children', async () => {
    class ShortBackend extends FakeBackend {
      async createChildConversations(_request: CreateChildrenRequest): Promise<string[]> {
        return ['only-one'];
      }
    }
    const { orchestrator } = setup(new ShortBackend());

    await expect(orchestrator.spawn(parentCall, specs.slice(0, 2))).rejects.toThrow(
      'Expected 2 child conversations, backend created 1'
    );
  });

  it('uses the configured deadline for every group', async () => {
    const backend = new FakeBackend();
    const store = new ConversationStore();
    const pendingCalls = new PendingCallTable({ sink: backend });
    const orchestrator = new SubchatOrchestrator({
      gateway: backend,
      pendingCalls,
      store,
      deadlineMs: 500,
      getTime: () => 0,
      generateGroupId: () => 'group-1'
    });

    await orchestrator.spawn(parentCall, specs.slice(0, 1));
    expect(orchestrator.openGroups()[0]?.deadlineAt).toBe(500);
    expect(() => new SubchatOrchestrator({ gateway: backend, pendingCalls, store, deadlineMs: 0 })).toThrow(
      'deadlineMs must be a finite positive number. Got: 0'
    );
  });
});
