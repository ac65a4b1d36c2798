/**
 * Tool invocation contracts shared by the router, the pending-call table and the backend.
 */

/** One element of a structured multi-part result (text, image, ...). */
export interface ToolPart {
  type: string;
  content: string;
}

export type ToolResultContent = string | ToolPart[];

export interface PendingToolCall {
  invocationId: string;
  conversationId: string;
  toolName: string;
  /** Raw JSON text produced by the model. */
  arguments: string;
  createdAt: number;
  confirmedByHuman?: boolean;
}

/** Opening content and control profile for one child conversation. */
export interface ChildSpec {
  content: string;
  profile: string;
  title?: string;
}

export interface ToolCallContext {
  invocationId: string;
  conversationId: string;
  toolName: string;
  confirmedByHuman?: boolean;
}

export interface ToolResultReply {
  signal: 'result';
  content: ToolResultContent;
  /** Spend charged to the calling conversation. */
  cost?: number;
}

export interface NeedsConfirmationReply {
  signal: 'needs_confirmation';
  setupKey: string;
  command: string;
  explanation: string;
}

export interface WaitForChildrenReply {
  signal: 'wait_for_children';
  children: ChildSpec[];
}

export type ToolReply =
  | string
  | ToolPart[]
  | ToolResultReply
  | NeedsConfirmationReply
  | WaitForChildrenReply;

export type InProcessToolHandler = (
  args: Record<string, unknown>,
  context: ToolCallContext
) => Promise<ToolReply> | ToolReply;

export interface ToolDefinition {
  name: string;
  description?: string;
  handler: InProcessToolHandler;
}

export function toolResult(content: ToolResultContent, cost?: number): ToolResultReply {
  return { signal: 'result', content, cost };
}

export function needsConfirmation(request: Omit<NeedsConfirmationReply, 'signal'>): NeedsConfirmationReply {
  return { signal: 'needs_confirmation', ...request };
}

export function waitForChildren(children: ChildSpec[]): WaitForChildrenReply {
  return { signal: 'wait_for_children', children };
}

export type ToolResultStatus = 'ok' | 'error' | 'cancelled' | 'timeout';

/** What the backend receives for an invocation. Exactly one non-placeholder post per invocation. */
export interface ToolResultPost {
  invocationId: string;
  conversationId: string;
  content: ToolResultContent;
  status: ToolResultStatus;
  cost: number;
  placeholder?: boolean;
  subchats?: string[];
}

export interface ConfirmationRequest {
  invocationId: string;
  conversationId: string;
  setupKey: string;
  command: string;
  explanation: string;
}

/** Tagged outcome of routing one invocation. */
export type ToolOutcome =
  | { kind: 'success'; content: ToolResultContent; cost: number }
  | { kind: 'failed'; message: string }
  | { kind: 'needs_confirmation'; request: ConfirmationRequest }
  | { kind: 'pending_children'; groupId: string; childIds: string[] }
  | { kind: 'external' }
  | { kind: 'skipped'; reason: 'already_settled' | 'conversation_closed' };
