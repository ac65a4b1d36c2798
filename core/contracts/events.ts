/**
 * Runtime event contracts.
 * Every record surfaced by an event source is normalized into one of these shapes
 * before it reaches the park.
 */

export type EventKind =
  | 'message_appended'
  | 'conversation_updated'
  | 'tool_invocation'
  | 'tool_result_posted'
  | 'task_updated'
  | 'schedule_activated'
  | 'generation_requested'
  | 'budget_reset';

export type MessageRole = 'user' | 'assistant' | 'tool' | 'instruction' | 'system';

export interface MessageAppendedPayload {
  messageId: string;
  role: MessageRole;
  content: string;
  toolCallId?: string;
}

export interface ConversationUpdatedPayload {
  status?: string;
  title?: string;
  /** Control-script profile the conversation runs under. */
  controlProfile?: string;
  error?: string;
}

export interface ToolInvocationPayload {
  invocationId: string;
  toolName: string;
  /** Raw JSON text produced by the model. */
  arguments: string;
  createdAt: number;
  /** Set on re-delivery after a confirmation round-trip. */
  confirmedByHuman?: boolean;
}

export interface ToolResultPostedPayload {
  invocationId: string;
  /** Interim post made while subchats run; the invocation is still open. */
  placeholder?: boolean;
}

export interface TaskUpdatedPayload {
  taskId: string;
  [key: string]: unknown;
}

export interface ScheduleActivatedPayload {
  scheduleId: string;
  firstQuestion?: string;
}

export type GenerationRequestedPayload = Record<string, never>;

export interface BudgetResetPayload {
  /** `reset` zeroes spend (scheduled reset); `top_up` raises the ceiling. */
  mode: 'reset' | 'top_up';
  amount?: number;
}

interface EventPayloads {
  message_appended: MessageAppendedPayload;
  conversation_updated: ConversationUpdatedPayload;
  tool_invocation: ToolInvocationPayload;
  tool_result_posted: ToolResultPostedPayload;
  task_updated: TaskUpdatedPayload;
  schedule_activated: ScheduleActivatedPayload;
  generation_requested: GenerationRequestedPayload;
  budget_reset: BudgetResetPayload;
}

interface EventBase<K extends EventKind> {
  kind: K;
  conversationId: string;
  /** Per-source marker, non-decreasing within a conversation. */
  sequence: number;
  receivedAt: number;
  payload: EventPayloads[K];
}

export type RuntimeEventOf<K extends EventKind> = EventBase<K>;

export type RuntimeEvent = { [K in EventKind]: EventBase<K> }[EventKind];

export type ToolInvocationEvent = RuntimeEventOf<'tool_invocation'>;

export function describeEvent(event: RuntimeEvent): string {
  return `${event.kind}@${event.conversationId}#${event.sequence}`;
}
