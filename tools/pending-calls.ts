import type { Logger } from 'pino';
import type { ToolResultSink } from '../core/contracts/backend';
import type { PendingToolCall, ToolResultPost } from '../core/contracts/tools';
import { createComponentLogger } from '../logging/logger';

export type FinalResultPost = Omit<ToolResultPost, 'placeholder' | 'subchats'>;

export interface PendingCallTableOptions {
  sink: ToolResultSink;
  /** How many settled invocation ids are remembered for late-result detection. Default: 1000. */
  settledMemory?: number;
  logger?: Logger;
}

/**
 * Invocations awaiting a result. A result is posted at most once per invocation: the first
 * settle wins and every later one (a handler finishing after a cancellation, a duplicate
 * delivery) is dropped.
 */
export class PendingCallTable {
  private readonly pending = new Map<string, PendingToolCall>();
  private readonly settled = new Set<string>();
  private readonly settledMemory: number;
  private readonly sink: ToolResultSink;
  private readonly logger: Logger;

  constructor(options: PendingCallTableOptions) {
    const settledMemory = options.settledMemory ?? 1000;
    if (!Number.isFinite(settledMemory) || settledMemory < 1) {
      throw new Error(`settledMemory must be a finite number >= 1. Got: ${options.settledMemory}`);
    }
    this.sink = options.sink;
    this.settledMemory = Math.floor(settledMemory);
    this.logger = options.logger ?? createComponentLogger('pending-calls');
  }

  /** Returns false when the invocation was already settled. */
  register(call: PendingToolCall): boolean {
    if (this.settled.has(call.invocationId)) {
      return false;
    }
    const existing = this.pending.get(call.invocationId);
    this.pending.set(call.invocationId, existing ? { ...existing, ...call } : { ...call });
    return true;
  }

  get(invocationId: string): PendingToolCall | undefined {
    return this.pending.get(invocationId);
  }

  isPending(invocationId: string): boolean {
    return this.pending.has(invocationId);
  }

  isSettled(invocationId: string): boolean {
    return this.settled.has(invocationId);
  }

  /**
   * Forgets every pending call of a conversation that closed. Nothing is posted; returns the
   * dropped invocation ids.
   */
  dropConversation(conversationId: string): string[] {
    const dropped: string[] = [];
    for (const [invocationId, call] of this.pending) {
      if (call.conversationId === conversationId) {
        this.pending.delete(invocationId);
        dropped.push(invocationId);
      }
    }
    return dropped;
  }

  get size(): number {
    return this.pending.size;
  }

  /**
   * Posts the final result. The invocation is marked settled before the post goes out, so a
   * second settle started while the first is in flight is dropped too. A failed post releases
   * the claim and rethrows, leaving the invocation open for another attempt.
   */
  async settle(post: FinalResultPost): Promise<boolean> {
    const call = this.pending.get(post.invocationId);
    if (!this.claim(post.invocationId)) {
      this.logger.debug(
        { invocationId: post.invocationId, status: post.status },
        'dropping result for settled invocation'
      );
      return false;
    }
    try {
      await this.sink.postToolResult(post);
    } catch (error) {
      this.settled.delete(post.invocationId);
      if (call) {
        this.pending.set(post.invocationId, call);
      }
      throw error;
    }
    return true;
  }

  /** Interim result shown while children work. Does not settle the invocation. */
  async postPlaceholder(post: Omit<ToolResultPost, 'placeholder' | 'status' | 'cost'>): Promise<void> {
    if (this.settled.has(post.invocationId)) {
      return;
    }
    await this.sink.postToolResult({ ...post, status: 'ok', cost: 0, placeholder: true });
  }

  /** Another party posted the result (an external service). Returns false if it was already settled. */
  markSettledExternally(invocationId: string): boolean {
    return this.claim(invocationId);
  }

  private claim(invocationId: string): boolean {
    if (this.settled.has(invocationId)) {
      return false;
    }
    this.pending.delete(invocationId);
    this.settled.add(invocationId);
    if (this.settled.size > this.settledMemory) {
      const oldest = this.settled.values().next();
      if (!oldest.done) {
        this.settled.delete(oldest.value);
      }
    }
    return true;
  }
}
