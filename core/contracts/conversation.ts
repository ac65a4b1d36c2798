import type { MessageRole } from './events';

export interface TurnToolCall {
  invocationId: string;
  toolName: string;
  arguments: string;
}

export interface Turn {
  role: MessageRole;
  content: string;
  toolCalls: TurnToolCall[];
  /** Injected by the runtime rather than received or generated. */
  synthetic?: boolean;
}

/** Output of the opaque inference step. */
export interface GeneratedTurn {
  content: string;
  toolCalls: TurnToolCall[];
  cost: number;
}

export interface GenerationRequest {
  conversationId: string;
  profile: string;
  history: readonly Turn[];
}

export type ConversationKind = 'top_level' | 'child';

export type ConversationStatus =
  | 'active'
  | 'awaiting_children'
  | 'failed'
  | 'finalized'
  | 'terminated';

export interface ConversationRecord {
  id: string;
  kind: ConversationKind;
  profile: string;
  status: ConversationStatus;
  history: Turn[];
  /** Owning subchat group, for child conversations. */
  groupId?: string;
  failure?: string;
}
