/**
 * External collaborators of the runtime. Implementations live in backend/; tests use in-process fakes.
 */

import type { GeneratedTurn, GenerationRequest } from './conversation';
import type { ChildSpec, ConfirmationRequest, ToolResultPost } from './tools';

export interface ToolResultSink {
  postToolResult(post: ToolResultPost): Promise<void>;
  requestConfirmation(request: ConfirmationRequest): Promise<void>;
}

export interface CreateChildrenRequest {
  parentInvocationId: string;
  parentConversationId: string;
  specs: ChildSpec[];
}

export interface ConversationGateway {
  /** Returns one child conversation id per spec, in spec order. */
  createChildConversations(request: CreateChildrenRequest): Promise<string[]>;
  failConversation(conversationId: string, error: string): Promise<void>;
  /** Appends a runtime-authored instruction message to the conversation. */
  postInstruction(conversationId: string, content: string): Promise<void>;
}

/** The language-model inference call, treated as opaque. */
export interface GenerationStep {
  generate(request: GenerationRequest): Promise<GeneratedTurn>;
}

export type RuntimeBackend = ToolResultSink & ConversationGateway & GenerationStep;
