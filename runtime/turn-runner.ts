/**
 * One generation step of one conversation, wrapped by its control script and guarded by
 * its budget. Used for top-level and child conversations alike.
 */

import type { Logger } from 'pino';
import type { ConversationGateway, GenerationStep } from '../core/contracts/backend';
import type { ControlContext, TurnControl } from '../core/contracts/control';
import type { ConversationRecord } from '../core/contracts/conversation';
import { errorMessage } from '../core/errors';
import type { BudgetTracker } from '../budget/budget-tracker';
import { applyControlResult, type ControlTarget } from '../control/apply-control-result';
import type { ConversationStore } from '../conversations/conversation-store';
import { createComponentLogger } from '../logging/logger';
import type { RuntimeAuditTrail } from '../security/audit-logger';
import type { SubchatOrchestrator } from '../subchats/subchat-orchestrator';
import type { PendingCallTable } from '../tools/pending-calls';

export const CANCELLED_MESSAGE = 'Tool call cancelled by control script';

export type ChildLifecycle = Pick<SubchatOrchestrator, 'onChildFinalized' | 'onChildFailed'>;

export type TurnOutcome =
  /** Conversation is not active (failed, awaiting children, finalized, terminated). */
  | 'inactive'
  /** Budget exhausted; the turn runs again once a reset arrives. */
  | 'deferred'
  /** A control script stopped the conversation. */
  | 'halted'
  | 'generated';

export interface TurnRunnerOptions {
  store: ConversationStore;
  budget: BudgetTracker;
  control: TurnControl;
  generator: GenerationStep;
  gateway: ConversationGateway;
  pendingCalls: PendingCallTable;
  children: ChildLifecycle;
  getTime?: () => number;
  audit?: RuntimeAuditTrail;
  logger?: Logger;
}

export class TurnRunner {
  private readonly deferred = new Set<string>();
  private readonly getTime: () => number;
  private readonly logger: Logger;

  constructor(private readonly options: TurnRunnerOptions) {
    this.getTime = options.getTime ?? (() => Date.now());
    this.logger = options.logger ?? createComponentLogger('turn-runner');
  }

  async runTurn(conversationId: string): Promise<TurnOutcome> {
    const { store, budget, control } = this.options;
    const record = store.ensure(conversationId);

    if (record.status !== 'active') {
      this.logger.debug({ conversationId, status: record.status }, 'skipping turn for inactive conversation');
      return 'inactive';
    }
    if (budget.isBlocked(conversationId)) {
      this.deferred.add(conversationId);
      this.options.audit?.record('generation_blocked_budget', conversationId, { ...budget.snapshot(conversationId) });
      this.logger.info({ conversationId }, 'budget exhausted, turn deferred until reset');
      return 'deferred';
    }

    const target = this.targetFor(record);

    const before = control.beforeTurn(this.contextFor(record));
    if ((await applyControlResult(before, target)) === 'halt') {
      return 'halted';
    }

    const generated = await this.options.generator.generate({
      conversationId,
      profile: record.profile,
      history: [...record.history]
    });

    if (budget.charge(conversationId, generated.cost)) {
      this.options.audit?.record('generation_blocked_budget', conversationId, { ...budget.snapshot(conversationId) });
      this.logger.warn({ conversationId }, 'conversation reached its spend ceiling');
    }

    store.appendTurn(conversationId, { role: 'assistant', content: generated.content, toolCalls: generated.toolCalls });
    const createdAt = this.getTime();
    for (const call of generated.toolCalls) {
      this.options.pendingCalls.register({
        invocationId: call.invocationId,
        conversationId,
        toolName: call.toolName,
        arguments: call.arguments,
        createdAt
      });
    }

    const after = control.afterTurn(this.contextFor(record), generated);
    return (await applyControlResult(after, target)) === 'halt' ? 'halted' : 'generated';
  }

  /** Runs the turn refused while the budget was blocked. Returns undefined when none was deferred. */
  async resumeDeferred(conversationId: string): Promise<TurnOutcome | undefined> {
    if (!this.deferred.delete(conversationId)) {
      return undefined;
    }
    return this.runTurn(conversationId);
  }

  /** Drops a deferred turn that must never run, e.g. for a terminated child. */
  cancelDeferred(conversationId: string): boolean {
    return this.deferred.delete(conversationId);
  }

  deferredConversations(): string[] {
    return [...this.deferred];
  }

  private contextFor(record: ConversationRecord): ControlContext {
    const snapshot = this.options.budget.snapshot(record.id);
    return {
      conversationId: record.id,
      profile: record.profile,
      isChild: record.kind === 'child',
      history: record.history,
      spendSoFar: snapshot.spent,
      spendCeiling: snapshot.ceiling,
      softThresholdReached: snapshot.softThresholdReached
    };
  }

  private targetFor(record: ConversationRecord): ControlTarget {
    const { store, gateway, pendingCalls, children } = this.options;
    const conversationId = record.id;
    const groupId = record.kind === 'child' ? record.groupId : undefined;

    return {
      isChild: groupId !== undefined,

      fail: async (message) => {
        store.setStatus(conversationId, 'failed', message);
        pendingCalls.dropConversation(conversationId);
        this.options.audit?.record('control_hard_error', conversationId, { error: message });
        this.logger.warn({ conversationId, error: message }, 'control script failed the conversation');
        try {
          await gateway.failConversation(conversationId, message);
        } catch (error) {
          this.logger.error({ conversationId, error: errorMessage(error) }, 'could not report conversation failure');
        }
        if (groupId !== undefined) {
          await children.onChildFailed(groupId, conversationId, message);
        }
      },

      cancel: async (invocationIds) => {
        for (const invocationId of invocationIds) {
          const call = pendingCalls.get(invocationId);
          if (!call) {
            this.logger.debug({ conversationId, invocationId }, 'cancel target is not pending');
            continue;
          }
          if (call.conversationId !== conversationId) {
            this.logger.warn({ conversationId, invocationId }, 'refusing to cancel a call owned by another conversation');
            continue;
          }
          const cancelled = await pendingCalls.settle({
            invocationId,
            conversationId,
            content: CANCELLED_MESSAGE,
            status: 'cancelled',
            cost: 0
          });
          if (cancelled) {
            this.options.audit?.record('tool_cancelled', conversationId, { invocationId, toolName: call.toolName });
          }
        }
      },

      inject: async (instruction) => {
        store.appendTurn(conversationId, { role: 'instruction', content: instruction, toolCalls: [], synthetic: true });
        await gateway.postInstruction(conversationId, instruction);
      },

      finalize: async (value) => {
        if (groupId !== undefined) {
          await children.onChildFinalized(groupId, conversationId, value);
        }
      },

      ignoreTerminal: (value) => {
        this.logger.info(
          { conversationId, valueType: value === null ? 'null' : typeof value },
          'terminal value ignored on top-level conversation'
        );
      }
    };
  }
}
