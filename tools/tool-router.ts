/**
 * Routes one tool invocation: in-process handlers run here and their result is posted back,
 * every other tool name is left pending for the external service that claims it.
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import type { ToolResultSink } from '../core/contracts/backend';
import type {
  ChildSpec,
  PendingToolCall,
  ToolOutcome,
  ToolReply,
  ToolResultContent
} from '../core/contracts/tools';
import { errorMessage } from '../core/errors';
import type { BudgetTracker } from '../budget/budget-tracker';
import { createComponentLogger } from '../logging/logger';
import type { HandlerRegistry } from '../runtime/handler-registry';
import type { RuntimeAuditTrail } from '../security/audit-logger';
import { assertSafeValue } from '../security/validation';
import type { PendingCallTable } from './pending-calls';

export const TOOL_ERROR_MESSAGE = 'Tool error, see logs for details';
export const INVALID_ARGUMENTS_MESSAGE = 'Arguments expected to be a valid json object';

/** Hands a wait-for-children reply to the subchat orchestrator. */
export interface ChildSpawner {
  spawn(parent: PendingToolCall, specs: ChildSpec[]): Promise<{ groupId: string; childIds: string[] }>;
}

export interface ToolRouterOptions {
  registry: HandlerRegistry;
  pendingCalls: PendingCallTable;
  sink: ToolResultSink;
  spawner: ChildSpawner;
  budget?: BudgetTracker;
  isConversationClosed?: (conversationId: string) => boolean;
  audit?: RuntimeAuditTrail;
  logger?: Logger;
}

const toolPartSchema = z.object({ type: z.string().min(1), content: z.string() });

const contentSchema = z.union([z.string(), z.array(toolPartSchema)]);

const replySchema = z.union([
  z.string(),
  z.array(toolPartSchema),
  z.object({
    signal: z.literal('result'),
    content: contentSchema,
    cost: z.number().finite().nonnegative().optional()
  }),
  z.object({
    signal: z.literal('needs_confirmation'),
    setupKey: z.string(),
    command: z.string(),
    explanation: z.string()
  }),
  z.object({
    signal: z.literal('wait_for_children'),
    children: z
      .array(z.object({ content: z.string(), profile: z.string().min(1), title: z.string().optional() }))
      .min(1)
  })
]);

function parseArguments(raw: string): Record<string, unknown> | null {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!decoded || typeof decoded !== 'object' || Array.isArray(decoded)) {
    return null;
  }
  return Object.fromEntries(Object.entries(decoded));
}

function describeContent(content: ToolResultContent): string {
  return typeof content === 'string' ? `${content.length} chars` : `${content.length} parts`;
}

export class ToolRouter {
  private readonly logger: Logger;

  constructor(private readonly options: ToolRouterOptions) {
    this.logger = options.logger ?? createComponentLogger('tool-router');
  }

  async route(call: PendingToolCall): Promise<ToolOutcome> {
    const { pendingCalls, registry } = this.options;

    if (pendingCalls.isSettled(call.invocationId)) {
      return { kind: 'skipped', reason: 'already_settled' };
    }
    if (this.options.isConversationClosed?.(call.conversationId)) {
      return { kind: 'skipped', reason: 'conversation_closed' };
    }

    pendingCalls.register(call);

    const definition = registry.tool(call.toolName);
    if (!definition) {
      // Claimed by an external subscriber; it posts the result itself.
      return { kind: 'external' };
    }

    const args = parseArguments(call.arguments);
    if (!args) {
      this.logger.debug({ invocationId: call.invocationId, toolName: call.toolName }, 'tool arguments are not a json object');
      return this.fail(call, INVALID_ARGUMENTS_MESSAGE);
    }

    let reply: ToolReply;
    try {
      assertSafeValue(args, 'tool arguments');
      reply = await definition.handler(args, {
        invocationId: call.invocationId,
        conversationId: call.conversationId,
        toolName: call.toolName,
        confirmedByHuman: call.confirmedByHuman
      });
    } catch (error) {
      return this.fault(call, error);
    }

    const checked = replySchema.safeParse(reply);
    if (!checked.success) {
      return this.fault(call, new Error(`unexpected handler reply: ${checked.error.issues[0]?.message ?? 'invalid'}`));
    }
    const value = checked.data;

    if (typeof value === 'string' || Array.isArray(value)) {
      return this.succeed(call, value, 0);
    }

    switch (value.signal) {
      case 'result':
        return this.succeed(call, value.content, value.cost ?? 0);
      case 'needs_confirmation': {
        const request = {
          invocationId: call.invocationId,
          conversationId: call.conversationId,
          setupKey: value.setupKey,
          command: value.command,
          explanation: value.explanation
        };
        try {
          await this.options.sink.requestConfirmation(request);
        } catch (error) {
          return this.fault(call, error);
        }
        this.options.audit?.record('confirmation_requested', call.conversationId, {
          invocationId: call.invocationId,
          toolName: call.toolName,
          command: value.command
        });
        return { kind: 'needs_confirmation', request };
      }
      case 'wait_for_children': {
        try {
          const { groupId, childIds } = await this.options.spawner.spawn(call, value.children);
          return { kind: 'pending_children', groupId, childIds };
        } catch (error) {
          return this.fault(call, error);
        }
      }
    }
  }

  private async succeed(call: PendingToolCall, content: ToolResultContent, cost: number): Promise<ToolOutcome> {
    const posted = await this.options.pendingCalls.settle({
      invocationId: call.invocationId,
      conversationId: call.conversationId,
      content,
      status: 'ok',
      cost
    });
    if (!posted) {
      this.logger.info({ invocationId: call.invocationId }, 'handler finished after the invocation was settled');
      return { kind: 'skipped', reason: 'already_settled' };
    }
    if (cost > 0 && this.options.budget?.charge(call.conversationId, cost)) {
      this.logger.warn({ conversationId: call.conversationId }, 'tool cost exhausted conversation budget');
    }
    this.options.audit?.record('tool_call', call.conversationId, {
      invocationId: call.invocationId,
      toolName: call.toolName,
      arguments: call.arguments,
      result: describeContent(content),
      cost
    });
    return { kind: 'success', content, cost };
  }

  private async fault(call: PendingToolCall, error: unknown): Promise<ToolOutcome> {
    this.logger.error(
      { err: error, invocationId: call.invocationId, toolName: call.toolName, conversationId: call.conversationId },
      'tool handler failed'
    );
    this.options.audit?.record('tool_call', call.conversationId, {
      invocationId: call.invocationId,
      toolName: call.toolName,
      arguments: call.arguments,
      error: errorMessage(error)
    });
    return this.fail(call, TOOL_ERROR_MESSAGE);
  }

  private async fail(call: PendingToolCall, message: string): Promise<ToolOutcome> {
    const posted = await this.options.pendingCalls.settle({
      invocationId: call.invocationId,
      conversationId: call.conversationId,
      content: message,
      status: 'error',
      cost: 0
    });
    if (!posted) {
      return { kind: 'skipped', reason: 'already_settled' };
    }
    return { kind: 'failed', message };
  }
}
