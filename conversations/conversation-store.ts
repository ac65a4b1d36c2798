/**
 * Local mirror of the conversations this process drives: turn history, status and, for
 * children, the owning subchat group. Message storage proper lives on the remote side.
 */

import type { MessageRole, RuntimeEvent } from '../core/contracts/events';
import type { ConversationRecord, ConversationStatus, Turn } from '../core/contracts/conversation';

export const DEFAULT_PROFILE = 'default';

const CLOSED_STATUSES: ReadonlySet<ConversationStatus> = new Set(['failed', 'finalized', 'terminated']);

const LOCALLY_AUTHORED_ROLES: ReadonlySet<MessageRole> = new Set(['assistant', 'instruction']);

export function isClosedStatus(status: ConversationStatus): boolean {
  return CLOSED_STATUSES.has(status);
}

export interface ConversationStoreOptions {
  /** How many retired conversation ids are remembered so their late events can be refused. Default: 10000. */
  retiredMemory?: number;
}

export class ConversationStore {
  private readonly records = new Map<string, ConversationRecord>();
  /** Children whose opening message was recorded locally and may still be echoed by the feed. */
  private readonly openingEcho = new Map<string, string>();
  /** Retired conversation id -> its final status. */
  private readonly retired = new Map<string, ConversationStatus>();
  private readonly retiredMemory: number;

  constructor(options: ConversationStoreOptions = {}) {
    const retiredMemory = options.retiredMemory ?? 10_000;
    if (!Number.isFinite(retiredMemory) || retiredMemory < 1) {
      throw new Error(`retiredMemory must be a finite number >= 1. Got: ${options.retiredMemory}`);
    }
    this.retiredMemory = Math.floor(retiredMemory);
  }

  /** Returns the record, creating a top-level one on first sight. */
  ensure(conversationId: string): ConversationRecord {
    let record = this.records.get(conversationId);
    if (!record) {
      record = {
        id: conversationId,
        kind: 'top_level',
        profile: DEFAULT_PROFILE,
        status: 'active',
        history: []
      };
      this.records.set(conversationId, record);
    }
    return record;
  }

  get(conversationId: string): ConversationRecord | undefined {
    return this.records.get(conversationId);
  }

  registerChild(conversationId: string, groupId: string, profile: string, openingContent: string): ConversationRecord {
    const record: ConversationRecord = {
      id: conversationId,
      kind: 'child',
      profile,
      status: 'active',
      groupId,
      history: [{ role: 'user', content: openingContent, toolCalls: [] }]
    };
    this.records.set(conversationId, record);
    this.openingEcho.set(conversationId, openingContent);
    return record;
  }

  appendTurn(conversationId: string, turn: Turn): void {
    this.ensure(conversationId).history.push({ ...turn, toolCalls: [...turn.toolCalls] });
  }

  setStatus(conversationId: string, status: ConversationStatus, failure?: string): void {
    const record = this.ensure(conversationId);
    record.status = status;
    if (failure !== undefined) {
      record.failure = failure;
    }
  }

  /** Status of a live or retired conversation. */
  statusOf(conversationId: string): ConversationStatus | undefined {
    return this.records.get(conversationId)?.status ?? this.retired.get(conversationId);
  }

  isClosed(conversationId: string): boolean {
    const status = this.statusOf(conversationId);
    return status !== undefined && isClosedStatus(status);
  }

  isRetired(conversationId: string): boolean {
    return this.retired.has(conversationId);
  }

  /**
   * Mirrors remote-side changes carried by an event before it is dispatched.
   */
  observe(event: RuntimeEvent): void {
    switch (event.kind) {
      case 'message_appended': {
        const record = this.ensure(event.conversationId);
        const { role, content } = event.payload;
        // Assistant turns and instructions are appended locally when they are produced.
        if (LOCALLY_AUTHORED_ROLES.has(role)) {
          return;
        }
        const opening = this.openingEcho.get(event.conversationId);
        this.openingEcho.delete(event.conversationId);
        if (role === 'user' && opening === content) {
          return;
        }
        record.history.push({ role, content, toolCalls: [] });
        return;
      }
      case 'conversation_updated': {
        const record = this.ensure(event.conversationId);
        if (event.payload.controlProfile) {
          record.profile = event.payload.controlProfile;
        }
        return;
      }
      default:
        this.ensure(event.conversationId);
    }
  }

  /**
   * Drops a closed conversation's record and history, keeping only its id and final status.
   * Open conversations are left alone; returns whether the conversation was retired.
   */
  retire(conversationId: string): boolean {
    const record = this.records.get(conversationId);
    if (!record || !isClosedStatus(record.status)) {
      return false;
    }
    this.records.delete(conversationId);
    this.openingEcho.delete(conversationId);
    this.retired.set(conversationId, record.status);
    if (this.retired.size > this.retiredMemory) {
      const oldest = this.retired.keys().next();
      if (!oldest.done) {
        this.retired.delete(oldest.value);
      }
    }
    return true;
  }
}
