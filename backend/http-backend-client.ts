/**
 * JSON-over-HTTP client for the remote side: tool results, confirmation requests, child
 * conversations, conversation failure, instructions and the opaque generation step.
 */

import { z } from 'zod';
import type { CreateChildrenRequest, RuntimeBackend } from '../core/contracts/backend';
import type { GeneratedTurn, GenerationRequest } from '../core/contracts/conversation';
import type { ConfirmationRequest, ToolResultPost } from '../core/contracts/tools';

export interface HttpBackendClientOptions {
  baseUrl: string;
  agentId: string;
  token?: string;
  /** Per-request timeout. Default: 30000. */
  timeoutMs?: number;
}

export class BackendRequestError extends Error {
  constructor(readonly path: string, readonly status: number) {
    super(`Backend request ${path} failed with status ${status}`);
    this.name = 'BackendRequestError';
  }
}

const childrenResponseSchema = z.object({
  conversation_ids: z.array(z.string().min(1))
});

const generateResponseSchema = z.object({
  content: z.string(),
  tool_calls: z
    .array(
      z.object({
        invocation_id: z.string().min(1),
        tool_name: z.string().min(1),
        arguments: z.string().default('{}')
      })
    )
    .default([]),
  cost: z.number().finite().nonnegative().default(0)
});

function trimSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

async function fetchWithTimeout(url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timeout);
  }
}

export class HttpBackendClient implements RuntimeBackend {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: HttpBackendClientOptions) {
    if (!options.baseUrl) {
      throw new Error('Backend base URL required');
    }
    const timeoutMs = options.timeoutMs ?? 30_000;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new Error(`timeoutMs must be a finite positive number. Got: ${options.timeoutMs}`);
    }
    this.baseUrl = trimSlash(options.baseUrl);
    this.timeoutMs = timeoutMs;
  }

  async postToolResult(post: ToolResultPost): Promise<void> {
    await this.request('/v1/tool-results', {
      invocation_id: post.invocationId,
      conversation_id: post.conversationId,
      content: post.content,
      status: post.status,
      cost: post.cost,
      as_placeholder: post.placeholder ?? false,
      subchats: post.subchats
    });
  }

  async requestConfirmation(request: ConfirmationRequest): Promise<void> {
    await this.request('/v1/confirmations', {
      invocation_id: request.invocationId,
      conversation_id: request.conversationId,
      setup_key: request.setupKey,
      command: request.command,
      explanation: request.explanation
    });
  }

  async createChildConversations(request: CreateChildrenRequest): Promise<string[]> {
    const data = await this.requestJson(`/v1/conversations/${encodeURIComponent(request.parentConversationId)}/children`, {
      parent_invocation_id: request.parentInvocationId,
      children: request.specs.map((spec) => ({
        content: spec.content,
        control_profile: spec.profile,
        title: spec.title
      }))
    });
    const parsed = childrenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error('Backend response missing conversation_ids');
    }
    return parsed.data.conversation_ids;
  }

  async failConversation(conversationId: string, error: string): Promise<void> {
    await this.request(`/v1/conversations/${encodeURIComponent(conversationId)}/fail`, { error });
  }

  async postInstruction(conversationId: string, content: string): Promise<void> {
    await this.request(`/v1/conversations/${encodeURIComponent(conversationId)}/messages`, {
      role: 'instruction',
      content
    });
  }

  async generate(request: GenerationRequest): Promise<GeneratedTurn> {
    const data = await this.requestJson('/v1/generate', {
      conversation_id: request.conversationId,
      control_profile: request.profile,
      history: request.history.map((turn) => ({
        role: turn.role,
        content: turn.content,
        tool_calls: turn.toolCalls.map((call) => ({
          invocation_id: call.invocationId,
          tool_name: call.toolName,
          arguments: call.arguments
        }))
      }))
    });
    const parsed = generateResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error('Backend generation response is malformed');
    }
    return {
      content: parsed.data.content,
      cost: parsed.data.cost,
      toolCalls: parsed.data.tool_calls.map((call) => ({
        invocationId: call.invocation_id,
        toolName: call.tool_name,
        arguments: call.arguments
      }))
    };
  }

  /** Sends a request whose response body is not needed. */
  private async request(path: string, body: Record<string, unknown>): Promise<void> {
    await this.send(path, body);
  }

  private async requestJson(path: string, body: Record<string, unknown>): Promise<unknown> {
    const response = await this.send(path, body);
    const data: unknown = await response.json();
    return data;
  }

  private async send(path: string, body: Record<string, unknown>): Promise<Response> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'X-Agent-Id': this.options.agentId
    };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }

    const response = await fetchWithTimeout(
      `${this.baseUrl}${path}`,
      { method: 'POST', headers, body: JSON.stringify(body) },
      this.timeoutMs
    );
    if (!response.ok) {
      throw new BackendRequestError(path, response.status);
    }
    return response;
  }
}
