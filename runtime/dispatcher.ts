/**
 * Single-flight loop draining the event park. Exactly one handler, router call or tick hook
 * runs at a time; a handler fault is logged with the event identity and the loop moves on.
 */

import type { Logger } from 'pino';
import {
  describeEvent,
  type EventKind,
  type RuntimeEvent,
  type RuntimeEventOf,
  type ToolInvocationEvent
} from '../core/contracts/events';
import type { PendingToolCall, ToolOutcome } from '../core/contracts/tools';
import { UnhandledToolError } from '../core/errors';
import type { EventPark } from '../events/event-park';
import { createComponentLogger } from '../logging/logger';
import type { RuntimeAuditTrail } from '../security/audit-logger';
import type { HandlerRegistry } from './handler-registry';

/**
 * What to do with an invocation for a tool that is neither handled in-process nor declared
 * external. `shutdown` stops the loop; `leave-pending` is meant for tests.
 */
export type UnhandledToolPolicy = 'shutdown' | 'leave-pending';

export interface ToolInvocationRouter {
  route(call: PendingToolCall): Promise<ToolOutcome>;
}

export interface DispatcherHooks {
  /** Runs at every loop boundary, inside the single flight. */
  onTick?: () => Promise<void> | void;
  /** Caps the next idle sleep, e.g. to wake for the nearest subchat deadline. */
  nextWakeInMs?: () => number | undefined;
  /** Runs before each dispatch; returning false drops the event. */
  beforeDispatch?: (event: RuntimeEvent) => boolean;
}

export interface DispatcherOptions {
  park: EventPark;
  registry: HandlerRegistry;
  router: ToolInvocationRouter;
  unhandledToolPolicy?: UnhandledToolPolicy;
  hooks?: DispatcherHooks;
  audit?: RuntimeAuditTrail;
  logger?: Logger;
}

export interface RunOptions {
  /** Longest idle sleep before the park is checked again. */
  sleepIfIdleMs: number;
  signal?: AbortSignal;
}

export type DispatcherExit =
  | { reason: 'signal' }
  | { reason: 'unhandled_tool'; error: UnhandledToolError };

export interface DispatcherStats {
  dispatched: number;
  failed: number;
  dropped: number;
}

export class Dispatcher {
  private readonly policy: UnhandledToolPolicy;
  private readonly hooks: DispatcherHooks;
  private readonly logger: Logger;
  private readonly stats: DispatcherStats = { dispatched: 0, failed: 0, dropped: 0 };
  private running = false;
  private fatal: UnhandledToolError | null = null;

  constructor(private readonly options: DispatcherOptions) {
    this.policy = options.unhandledToolPolicy ?? 'shutdown';
    this.hooks = options.hooks ?? {};
    this.logger = options.logger ?? createComponentLogger('dispatcher');
  }

  /**
   * Drains the park until the signal aborts or an unhandled tool stops the loop. The event in
   * flight when the signal fires is finished first.
   */
  async run(options: RunOptions): Promise<DispatcherExit> {
    const { sleepIfIdleMs, signal } = options;
    if (!Number.isFinite(sleepIfIdleMs) || sleepIfIdleMs < 0) {
      throw new Error(`sleepIfIdleMs must be a finite non-negative number. Got: ${sleepIfIdleMs}`);
    }
    if (this.running) {
      throw new Error('Dispatcher is already running');
    }
    this.running = true;
    this.options.registry.lock();

    try {
      while (!signal?.aborted && !this.fatal) {
        await this.tick();
        const event = this.options.park.take();
        if (event) {
          await this.dispatch(event);
          continue;
        }
        const wakeIn = this.hooks.nextWakeInMs?.();
        const sleepMs = wakeIn === undefined ? sleepIfIdleMs : Math.min(sleepIfIdleMs, wakeIn);
        await this.options.park.waitForWork(sleepMs, signal);
      }
    } finally {
      this.running = false;
    }

    if (this.fatal) {
      return { reason: 'unhandled_tool', error: this.fatal };
    }
    return { reason: 'signal' };
  }

  /** Dispatches everything currently parked, then returns. Stops early, leaving the rest parked, on an unhandled tool. */
  async drain(): Promise<void> {
    while (!this.fatal) {
      const event = this.options.park.take();
      if (!event) {
        return;
      }
      await this.tick();
      await this.dispatch(event);
    }
  }

  getStats(): DispatcherStats {
    return { ...this.stats };
  }

  private async tick(): Promise<void> {
    if (!this.hooks.onTick) {
      return;
    }
    try {
      await this.hooks.onTick();
    } catch (error) {
      this.logger.error({ err: error }, 'tick hook failed');
    }
  }

  private async dispatch(event: RuntimeEvent): Promise<void> {
    const identity = describeEvent(event);
    try {
      if (this.hooks.beforeDispatch && !this.hooks.beforeDispatch(event)) {
        this.stats.dropped++;
        this.logger.debug({ event: identity }, 'event dropped before dispatch');
        return;
      }
      if (event.kind === 'tool_invocation') {
        await this.dispatchToolInvocation(event);
      } else {
        await this.dispatchEvent(event);
      }
    } catch (error) {
      this.stats.failed++;
      this.logger.error({ err: error, event: identity, conversationId: event.conversationId }, 'handler failed');
    }
  }

  private async dispatchEvent(event: Exclude<RuntimeEvent, ToolInvocationEvent>): Promise<void> {
    if (!(await this.invoke(event))) {
      this.stats.dropped++;
      this.logger.debug({ event: describeEvent(event) }, 'no handler registered for event kind');
    }
  }

  /** Calls the handler registered for the event's kind. Returns false when there is none. */
  private async invoke<K extends Exclude<EventKind, 'tool_invocation'>>(event: RuntimeEventOf<K>): Promise<boolean> {
    const handler = this.options.registry.eventHandler(event.kind);
    if (!handler) {
      return false;
    }
    this.stats.dispatched++;
    await handler(event);
    return true;
  }

  private async dispatchToolInvocation(event: ToolInvocationEvent): Promise<void> {
    const { payload } = event;
    if (this.options.registry.claimOf(payload.toolName) === 'unknown') {
      this.options.audit?.record('tool_unhandled', event.conversationId, {
        invocationId: payload.invocationId,
        toolName: payload.toolName,
        policy: this.policy
      });
      if (this.policy === 'shutdown') {
        this.fatal = new UnhandledToolError(payload.toolName, payload.invocationId);
        this.logger.fatal(
          { toolName: payload.toolName, invocationId: payload.invocationId },
          'no handler for tool, stopping: the tool set shown to the model does not match this process'
        );
        return;
      }
      this.logger.warn({ toolName: payload.toolName, invocationId: payload.invocationId }, 'no handler for tool, leaving it pending');
    }

    this.stats.dispatched++;
    const outcome = await this.options.router.route({
      invocationId: payload.invocationId,
      conversationId: event.conversationId,
      toolName: payload.toolName,
      arguments: payload.arguments,
      createdAt: payload.createdAt,
      confirmedByHuman: payload.confirmedByHuman
    });
    this.logger.debug(
      { event: describeEvent(event), outcome: outcome.kind, detail: outcome.kind === 'failed' ? outcome.message : undefined },
      'tool invocation routed'
    );
  }
}
