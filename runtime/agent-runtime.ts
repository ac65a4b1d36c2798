/**
 * AgentRuntime wires the event feed, the park, the dispatcher and every component the
 * dispatcher drives for one agent identity. Handlers are registered on it before run();
 * run() locks the registry, subscribes to the feed and always closes the subscription on exit.
 */

import type { Logger } from 'pino';
import type { RuntimeEvent } from '../core/contracts/events';
import type { ToolDefinition } from '../core/contracts/tools';
import { BudgetTracker } from '../budget/budget-tracker';
import { TurnControlEvaluator } from '../control/turn-control-evaluator';
import { ConversationStore } from '../conversations/conversation-store';
import { EventPark, type SubmitOutcome } from '../events/event-park';
import { createComponentLogger } from '../logging/logger';
import { RuntimeAuditTrail } from '../security/audit-logger';
import { SubchatOrchestrator } from '../subchats/subchat-orchestrator';
import { createDelegateSubchatsTool } from '../tools/builtin/delegate-subchats';
import { PendingCallTable } from '../tools/pending-calls';
import { ToolRouter } from '../tools/tool-router';
import { Dispatcher } from './dispatcher';
import { HandlerRegistry, type EventHandler } from './handler-registry';
import { TurnRunner } from './turn-runner';
import type { AgentRuntimeOptions, RuntimeExit, RuntimeStatus } from './types';

type RegistrableKind = Parameters<HandlerRegistry['onEvent']>[0];

export class AgentRuntime {
  readonly store = new ConversationStore();
  readonly budget: BudgetTracker;
  readonly pendingCalls: PendingCallTable;
  readonly orchestrator: SubchatOrchestrator;
  readonly router: ToolRouter;
  readonly turns: TurnRunner;

  private readonly registry = new HandlerRegistry();
  private readonly park = new EventPark();
  private readonly dispatcher: Dispatcher;
  private readonly audit: RuntimeAuditTrail;
  private readonly sleepIfIdleMs: number;
  private readonly logger: Logger;
  private running = false;

  constructor(private readonly options: AgentRuntimeOptions) {
    const sleepIfIdleMs = options.sleepIfIdleMs ?? 10_000;
    if (!Number.isFinite(sleepIfIdleMs) || sleepIfIdleMs < 0) {
      throw new Error(`sleepIfIdleMs must be a finite non-negative number. Got: ${options.sleepIfIdleMs}`);
    }
    this.sleepIfIdleMs = sleepIfIdleMs;

    const getTime = options.getTime ?? (() => Date.now());
    const logger = options.logger ?? createComponentLogger('runtime');
    this.logger = logger;
    this.audit = new RuntimeAuditTrail(options.auditLogger, getTime);

    this.budget = new BudgetTracker({
      defaultCeiling: options.budget?.ceiling ?? 100,
      softRatio: options.budget?.softRatio,
      ceilings: options.budget?.ceilings
    });
    this.pendingCalls = new PendingCallTable({ sink: options.backend, logger: logger.child({ component: 'pending-calls' }) });
    this.orchestrator = new SubchatOrchestrator({
      gateway: options.backend,
      pendingCalls: this.pendingCalls,
      store: this.store,
      deadlineMs: options.subchatDeadlineMs,
      getTime,
      generateGroupId: options.generateGroupId,
      onChildTerminated: (childId) => {
        this.turns.cancelDeferred(childId);
      },
      onChildRetired: (childId) => this.release(childId),
      audit: this.audit,
      logger: logger.child({ component: 'subchats' })
    });
    this.router = new ToolRouter({
      registry: this.registry,
      pendingCalls: this.pendingCalls,
      sink: options.backend,
      spawner: this.orchestrator,
      budget: this.budget,
      isConversationClosed: (conversationId) => this.store.isClosed(conversationId),
      audit: this.audit,
      logger: logger.child({ component: 'tool-router' })
    });
    this.turns = new TurnRunner({
      store: this.store,
      budget: this.budget,
      control: options.control ?? new TurnControlEvaluator({ logger: logger.child({ component: 'turn-control' }) }),
      generator: options.backend,
      gateway: options.backend,
      pendingCalls: this.pendingCalls,
      children: this.orchestrator,
      getTime,
      audit: this.audit,
      logger: logger.child({ component: 'turn-runner' })
    });
    this.dispatcher = new Dispatcher({
      park: this.park,
      registry: this.registry,
      router: this.router,
      unhandledToolPolicy: options.unhandledToolPolicy,
      audit: this.audit,
      logger: logger.child({ component: 'dispatcher' }),
      hooks: {
        onTick: async () => {
          await this.orchestrator.checkDeadlines();
        },
        nextWakeInMs: () => this.orchestrator.nextDeadlineIn(),
        beforeDispatch: (event) => this.observe(event)
      }
    });

    this.registerBuiltins();
    for (const name of options.externalTools ?? []) {
      this.registry.declareExternalTool(name);
    }
  }

  onEvent<K extends RegistrableKind>(kind: K, handler: EventHandler<K>): void {
    this.registry.onEvent(kind, handler);
  }

  onToolCall(definition: ToolDefinition): void {
    this.registry.onToolCall(definition);
  }

  declareExternalTool(name: string): void {
    this.registry.declareExternalTool(name);
  }

  /** Tool names presented to the model. */
  toolNames(): string[] {
    return this.registry.toolNames();
  }

  /** Parks an event directly, bypassing the feed. */
  submit(event: RuntimeEvent): SubmitOutcome {
    return this.park.submit(event);
  }

  /**
   * Runs until the signal aborts or an unhandled tool stops the loop.
   */
  async run(signal?: AbortSignal): Promise<RuntimeExit> {
    if (this.running) {
      throw new Error('AgentRuntime is already running');
    }
    this.running = true;
    this.registry.lock();

    const subscription = this.options.eventSource.subscribe({
      onEvent: (event) => {
        if (this.park.submit(event) === 'duplicate') {
          this.logger.debug({ conversationId: event.conversationId, sequence: event.sequence }, 'dropping redelivered event');
        }
      },
      onError: (error) => {
        this.logger.warn({ err: error }, 'event source error');
      }
    });

    try {
      const exit = await this.dispatcher.run({ sleepIfIdleMs: this.sleepIfIdleMs, signal });
      this.audit.record('runtime_shutdown', undefined, {
        reason: exit.reason,
        ...(exit.reason === 'unhandled_tool' ? { toolName: exit.error.toolName } : {})
      });
      return exit;
    } finally {
      await subscription.close();
      this.running = false;
      this.logger.info('event subscription closed');
    }
  }

  /** Dispatches everything currently parked, one event at a time, without sleeping. */
  async drain(): Promise<void> {
    this.registry.lock();
    await this.dispatcher.drain();
  }

  status(): RuntimeStatus {
    return {
      running: this.running,
      parkDepth: this.park.size,
      pendingToolCalls: this.pendingCalls.size,
      openSubchatGroups: this.orchestrator.openGroups().length,
      blockedConversations: this.budget.blockedConversations(),
      deferredTurns: this.turns.deferredConversations(),
      dispatch: this.dispatcher.getStats()
    };
  }

  private observe(event: RuntimeEvent): boolean {
    const { conversationId } = event;
    if (this.store.isRetired(conversationId) || this.store.statusOf(conversationId) === 'terminated') {
      return false;
    }
    this.store.observe(event);
    return true;
  }

  /** Frees per-conversation state of a child whose group has closed. */
  private release(conversationId: string): void {
    this.turns.cancelDeferred(conversationId);
    this.budget.forget(conversationId);
    this.park.forget(conversationId);
    const dropped = this.pendingCalls.dropConversation(conversationId);
    if (dropped.length > 0) {
      this.logger.debug({ conversationId, dropped }, 'dropped pending calls of retired conversation');
    }
  }

  private registerBuiltins(): void {
    this.registry.onEvent('generation_requested', async (event) => {
      await this.turns.runTurn(event.conversationId);
    });

    this.registry.onEvent('budget_reset', async (event) => {
      const { conversationId, payload } = event;
      this.budget.reset(conversationId, payload.mode, payload.amount);
      this.audit.record('budget_reset', conversationId, { mode: payload.mode, amount: payload.amount });
      if (!this.budget.isBlocked(conversationId)) {
        await this.turns.resumeDeferred(conversationId);
      }
    });

    this.registry.onEvent('tool_result_posted', (event) => {
      if (!event.payload.placeholder) {
        this.pendingCalls.markSettledExternally(event.payload.invocationId);
      }
    });

    const delegate = this.options.delegateTool ?? true;
    if (delegate) {
      this.registry.onToolCall(
        createDelegateSubchatsTool(typeof delegate === 'object' ? { defaultProfile: delegate.defaultProfile } : {})
      );
    }
  }
}
