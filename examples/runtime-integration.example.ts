/**
 * Minimal integration example for AgentRuntime.
 * Wires an in-memory feed and a scripted backend, registers one tool, and drains a
 * generation request through a turn, a tool call and its result post.
 * Not wired into the CLI - standalone illustration.
 *
 * Run with: npm run build && node dist/examples/runtime-integration.example.js
 */

import type { ToolResultPost } from '../core/contracts/tools';
import { AgentRuntime, InMemoryEventSource, toolResult, type RuntimeBackend } from '../runtime';

export function createExampleBackend(posts: ToolResultPost[]): RuntimeBackend {
  return {
    async postToolResult(post) {
      posts.push(post);
    },
    async requestConfirmation() {},
    async createChildConversations(request) {
      return request.specs.map((_, index) => `${request.parentConversationId}-child-${index}`);
    },
    async failConversation() {},
    async postInstruction() {},
    async generate() {
      return {
        content: 'Looking up the weather.',
        cost: 1,
        toolCalls: [{ invocationId: 'inv-1', toolName: 'weather', arguments: '{"city":"Oslo"}' }]
      };
    }
  };
}

export async function runExample(): Promise<ToolResultPost[]> {
  const posts: ToolResultPost[] = [];
  const feed = new InMemoryEventSource();
  const runtime = new AgentRuntime({ backend: createExampleBackend(posts), eventSource: feed });

  runtime.onToolCall({
    name: 'weather',
    handler: (args) => toolResult(`Sunny in ${String(args.city)}`, 0.5)
  });

  runtime.submit({
    kind: 'generation_requested',
    conversationId: 'conv-1',
    sequence: 1,
    receivedAt: Date.now(),
    payload: {}
  });
  await runtime.drain();

  const call = runtime.pendingCalls.get('inv-1');
  if (call) {
    await runtime.router.route(call);
  }
  return posts;
}

if (require.main === module) {
  runExample().then(
    (posts) => {
      console.log(JSON.stringify(posts, null, 2));
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
