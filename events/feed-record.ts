/**
 * Wire format of the remote event feed and its normalization into RuntimeEvent.
 */

import { z } from 'zod';
import type { RuntimeEvent } from '../core/contracts/events';

const roleSchema = z.enum(['user', 'assistant', 'tool', 'instruction', 'system']);

const messageAppended = z.object({
  message_id: z.string().min(1),
  role: roleSchema,
  content: z.string(),
  tool_call_id: z.string().optional()
});

const conversationUpdated = z.object({
  status: z.string().optional(),
  title: z.string().optional(),
  control_profile: z.string().min(1).optional(),
  error: z.string().optional()
});

const toolInvocation = z.object({
  invocation_id: z.string().min(1),
  tool_name: z.string().min(1),
  arguments: z.string().default('{}'),
  created_at: z.number().optional(),
  confirmed_by_human: z.boolean().optional()
});

const toolResultPosted = z.object({
  invocation_id: z.string().min(1),
  as_placeholder: z.boolean().optional()
});

const taskUpdated = z.object({ task_id: z.string().min(1) }).passthrough();

const scheduleActivated = z.object({
  schedule_id: z.string().min(1),
  first_question: z.string().optional()
});

const budgetReset = z.object({
  mode: z.enum(['reset', 'top_up']).default('reset'),
  amount: z.number().finite().nonnegative().optional()
});

const envelope = z.object({
  kind: z.string(),
  conversation_id: z.string().min(1),
  sequence_marker: z.number().int().nonnegative(),
  payload: z.unknown().default({})
});

export type FeedRecord = z.input<typeof envelope>;

export type ParseResult =
  | { ok: true; event: RuntimeEvent }
  | { ok: false; reason: string };

function issuesOf(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Validates one feed record. Unknown kinds and malformed payloads are rejected, never thrown.
 */
export function parseFeedRecord(raw: unknown, receivedAt: number = Date.now()): ParseResult {
  const head = envelope.safeParse(raw);
  if (!head.success) {
    return { ok: false, reason: issuesOf(head.error) };
  }
  const { kind, conversation_id: conversationId, sequence_marker: sequence, payload } = head.data;
  const base = { conversationId, sequence, receivedAt };

  switch (kind) {
    case 'message_appended': {
      const parsed = messageAppended.safeParse(payload);
      if (!parsed.success) {
        return { ok: false, reason: issuesOf(parsed.error) };
      }
      const p = parsed.data;
      return {
        ok: true,
        event: {
          ...base,
          kind,
          payload: { messageId: p.message_id, role: p.role, content: p.content, toolCallId: p.tool_call_id }
        }
      };
    }
    case 'conversation_updated': {
      const parsed = conversationUpdated.safeParse(payload);
      if (!parsed.success) {
        return { ok: false, reason: issuesOf(parsed.error) };
      }
      const p = parsed.data;
      return {
        ok: true,
        event: {
          ...base,
          kind,
          payload: { status: p.status, title: p.title, controlProfile: p.control_profile, error: p.error }
        }
      };
    }
    case 'tool_invocation': {
      const parsed = toolInvocation.safeParse(payload);
      if (!parsed.success) {
        return { ok: false, reason: issuesOf(parsed.error) };
      }
      const p = parsed.data;
      return {
        ok: true,
        event: {
          ...base,
          kind,
          payload: {
            invocationId: p.invocation_id,
            toolName: p.tool_name,
            arguments: p.arguments,
            createdAt: p.created_at ?? receivedAt,
            confirmedByHuman: p.confirmed_by_human
          }
        }
      };
    }
    case 'tool_result_posted': {
      const parsed = toolResultPosted.safeParse(payload);
      if (!parsed.success) {
        return { ok: false, reason: issuesOf(parsed.error) };
      }
      return {
        ok: true,
        event: {
          ...base,
          kind,
          payload: { invocationId: parsed.data.invocation_id, placeholder: parsed.data.as_placeholder }
        }
      };
    }
    case 'task_updated': {
      const parsed = taskUpdated.safeParse(payload);
      if (!parsed.success) {
        return { ok: false, reason: issuesOf(parsed.error) };
      }
      const { task_id: taskId, ...rest } = parsed.data;
      return { ok: true, event: { ...base, kind, payload: { ...rest, taskId } } };
    }
    case 'schedule_activated': {
      const parsed = scheduleActivated.safeParse(payload);
      if (!parsed.success) {
        return { ok: false, reason: issuesOf(parsed.error) };
      }
      return {
        ok: true,
        event: {
          ...base,
          kind,
          payload: { scheduleId: parsed.data.schedule_id, firstQuestion: parsed.data.first_question }
        }
      };
    }
    case 'generation_requested':
      return { ok: true, event: { ...base, kind, payload: {} } };
    case 'budget_reset': {
      const parsed = budgetReset.safeParse(payload);
      if (!parsed.success) {
        return { ok: false, reason: issuesOf(parsed.error) };
      }
      return { ok: true, event: { ...base, kind, payload: { mode: parsed.data.mode, amount: parsed.data.amount } } };
    }
    default:
      return { ok: false, reason: `unknown event kind ${kind}` };
  }
}
