import type { ToolCallContext } from '../../core/contracts/tools';
import { createDelegateSubchatsTool, DELEGATE_SUBCHATS_TOOL } from '../../tools/builtin/delegate-subchats';

const context: ToolCallContext = { invocationId: 'tc-1', conversationId: 'c1', toolName: DELEGATE_SUBCHATS_TOOL };

describe('delegate_subchats tool', () => {
  it('asks for one child per task under the given profile', async () => {
    const tool = createDelegateSubchatsTool();
    const reply = await tool.handler({ tasks: ['summarize a', '  summarize b '], profile: 'research' }, context);

    expect(reply).toEqual({
      signal: 'wait_for_children',
      children: [
        { content: 'summarize a', profile: 'research' },
        { content: 'summarize b', profile: 'research' }
      ]
    });
  });

  it('falls back to the default profile', async () => {
    const tool = createDelegateSubchatsTool({ defaultProfile: 'worker' });
    const reply = await tool.handler({ tasks: ['x'] }, context);
    expect(reply).toEqual({ signal: 'wait_for_children', children: [{ content: 'x', profile: 'worker' }] });
  });

  it('answers with an error result when no profile is known', async () => {
    const tool = createDelegateSubchatsTool();
    const reply = await tool.handler({ tasks: ['x'] }, context);
    expect(reply).toEqual({ signal: 'result', content: 'Error: profile: Required' });
  });

  it('rejects an empty task list', async () => {
    const tool = createDelegateSubchatsTool({ defaultProfile: 'worker' });
    const reply = await tool.handler({ tasks: [] }, context);
    expect(reply).toEqual({ signal: 'result', content: 'Error: tasks: Array must contain at least 1 element(s)' });
  });

  it('rejects more tasks than one group may hold', async () => {
    const tool = createDelegateSubchatsTool({ defaultProfile: 'worker' });
    const tasks = Array.from({ length: 21 }, (_, index) => `task ${index}`);
    const reply = await tool.handler({ tasks }, context);
    expect(reply).toEqual({ signal: 'result', content: 'Error: tasks: Array must contain at most 20 element(s)' });
  });
});
