/**
 * Runtime module: event dispatch, tool routing, subchats, turn control and budgets.
 */

export { AgentRuntime } from './agent-runtime';
export type { AgentRuntimeOptions, BudgetOptions, RuntimeExit, RuntimeStatus } from './types';
export { Dispatcher } from './dispatcher';
export type { DispatcherExit, DispatcherHooks, DispatcherStats, UnhandledToolPolicy } from './dispatcher';
export { HandlerRegistry } from './handler-registry';
export type { EventHandler, ToolClaim } from './handler-registry';
export { TurnRunner, CANCELLED_MESSAGE } from './turn-runner';
export type { TurnOutcome } from './turn-runner';
export { installShutdownHandlers } from './shutdown';
export { EventPark } from '../events/event-park';
export { InMemoryEventSource } from '../events/in-memory-event-source';
export { WebSocketEventSource } from '../events/websocket-event-source';
export type { EventSource, EventSubscription } from '../events/event-source';
export { HttpBackendClient } from '../backend/http-backend-client';
export { TurnControlEvaluator } from '../control/turn-control-evaluator';
export { BudgetTracker } from '../budget/budget-tracker';
export { SubchatOrchestrator, DEFAULT_SUBCHAT_DEADLINE_MS } from '../subchats/subchat-orchestrator';
export { ToolRouter, TOOL_ERROR_MESSAGE } from '../tools/tool-router';
export { toolResult, needsConfirmation, waitForChildren } from '../core/contracts/tools';
export type { ToolDefinition, ToolReply, ToolPart, ChildSpec } from '../core/contracts/tools';
export type { RuntimeEvent, EventKind } from '../core/contracts/events';
export type { RuntimeBackend } from '../core/contracts/backend';
