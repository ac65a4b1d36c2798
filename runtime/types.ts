/**
 * Runtime types for the agent runtime layer.
 * Defines the options that compose it, its status report and its exit reasons.
 */

import type { Logger } from 'pino';
import type { RuntimeBackend } from '../core/contracts/backend';
import type { TurnControl } from '../core/contracts/control';
import type { EventSource } from '../events/event-source';
import type { RuntimeAuditLogger } from '../security/audit-logger';
import type { DispatcherExit, DispatcherStats, UnhandledToolPolicy } from './dispatcher';

/** Per-conversation spend limits. */
export interface BudgetOptions {
  /** Ceiling for every conversation without an explicit one. Default: 100. */
  ceiling?: number;
  /** Fraction of the ceiling surfaced to control scripts as the soft threshold. Default: 0.5. */
  softRatio?: number;
  /** Explicit ceilings. Key = conversationId. */
  ceilings?: Map<string, number>;
}

/** Options for constructing AgentRuntime. */
export interface AgentRuntimeOptions {
  /** Remote side: result posting, child creation, failure reports and generation. */
  backend: RuntimeBackend;
  /** Live feed of remote events. */
  eventSource: EventSource;
  /** Control hook run around every generation step. Default: no scripts, empty results. */
  control?: TurnControl;
  /** Longest idle sleep of the dispatch loop in ms. Default: 10000. */
  sleepIfIdleMs?: number;
  /** Default: 'shutdown'. */
  unhandledToolPolicy?: UnhandledToolPolicy;
  /** Tool names answered by external services. */
  externalTools?: string[];
  budget?: BudgetOptions;
  /** Deadline applied to every subchat group. Default: one hour. */
  subchatDeadlineMs?: number;
  /** Register the delegate_subchats tool. Default: true. */
  delegateTool?: boolean | { defaultProfile?: string };
  /** Audit logger for runtime events. */
  auditLogger?: RuntimeAuditLogger;
  /** Optional clock for deterministic tests. Default: Date.now */
  getTime?: () => number;
  /** Optional subchat group id generator. Default: uuid-based. */
  generateGroupId?: () => string;
  logger?: Logger;
}

export interface RuntimeStatus {
  running: boolean;
  parkDepth: number;
  pendingToolCalls: number;
  openSubchatGroups: number;
  blockedConversations: string[];
  deferredTurns: string[];
  dispatch: DispatcherStats;
}

export type RuntimeExit = DispatcherExit;
