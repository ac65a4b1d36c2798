/**
 * Fan-out/fan-in of child conversations on behalf of one tool invocation.
 *
 * A group resolves exactly once: with the ordered list of child values when every child has
 * reported, or with a timeout error when the deadline passes first. After resolution every
 * further report for the group is a no-op, the group is dropped and its children retired.
 * The parent stays parked while any of its groups is open.
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import type { ConversationGateway } from '../core/contracts/backend';
import type { ChildSpec, PendingToolCall } from '../core/contracts/tools';
import { errorMessage } from '../core/errors';
import type { ConversationStore } from '../conversations/conversation-store';
import { createComponentLogger } from '../logging/logger';
import type { RuntimeAuditTrail } from '../security/audit-logger';
import type { PendingCallTable } from '../tools/pending-calls';
import type { ChildSpawner } from '../tools/tool-router';

/** Fixed ceiling on how long a group may wait for its children. */
export const DEFAULT_SUBCHAT_DEADLINE_MS = 60 * 60 * 1000;

/** Placeholder content posted to the parent invocation while children run. */
export const WAIT_PLACEHOLDER = 'WAIT_SUBCHATS';

export interface SubchatOrchestratorOptions {
  gateway: ConversationGateway;
  pendingCalls: PendingCallTable;
  store: ConversationStore;
  /** Applies to every group this orchestrator creates. Default: one hour. */
  deadlineMs?: number;
  getTime?: () => number;
  generateGroupId?: () => string;
  /** Called for each child forced into the terminated state. */
  onChildTerminated?: (childId: string) => void;
  /** Called for each child once its group is closed and its record retired. */
  onChildRetired?: (childId: string) => void;
  audit?: RuntimeAuditTrail;
  logger?: Logger;
}

interface ChildSlot {
  childId: string;
  done: boolean;
  value: unknown;
}

export interface SubchatGroup {
  groupId: string;
  parentInvocationId: string;
  parentConversationId: string;
  children: ChildSlot[];
  createdAt: number;
  deadlineAt: number;
  resolved: boolean;
}

export interface SubchatGroupView {
  groupId: string;
  parentInvocationId: string;
  childIds: string[];
  completed: number;
  deadlineAt: number;
}

export function subchatTimeoutMessage(deadlineMs: number, open: number, total: number): string {
  return `Subchat timeout: ${open} of ${total} subchats did not finish within ${deadlineMs} ms`;
}

export class SubchatOrchestrator implements ChildSpawner {
  private readonly groups = new Map<string, SubchatGroup>();
  private readonly groupOfChild = new Map<string, string>();
  private readonly deadlineMs: number;
  private readonly getTime: () => number;
  private readonly generateGroupId: () => string;
  private readonly logger: Logger;

  constructor(private readonly options: SubchatOrchestratorOptions) {
    const deadlineMs = options.deadlineMs ?? DEFAULT_SUBCHAT_DEADLINE_MS;
    if (!Number.isFinite(deadlineMs) || deadlineMs <= 0) {
      throw new Error(`deadlineMs must be a finite positive number. Got: ${options.deadlineMs}`);
    }
    this.deadlineMs = deadlineMs;
    this.getTime = options.getTime ?? (() => Date.now());
    this.generateGroupId = options.generateGroupId ?? (() => `group-${randomUUID()}`);
    this.logger = options.logger ?? createComponentLogger('subchats');
  }

  /**
   * Creates one child per spec and parks the parent until the group resolves. When the
   * placeholder cannot be posted the group is abandoned: its children are terminated, the
   * parent is released and the error is rethrown.
   */
  async spawn(parent: PendingToolCall, specs: ChildSpec[]): Promise<{ groupId: string; childIds: string[] }> {
    if (specs.length === 0) {
      throw new Error('At least one child spec is required');
    }
    const childIds = await this.options.gateway.createChildConversations({
      parentInvocationId: parent.invocationId,
      parentConversationId: parent.conversationId,
      specs
    });
    if (childIds.length !== specs.length) {
      throw new Error(`Expected ${specs.length} child conversations, backend created ${childIds.length}`);
    }

    const groupId = this.generateGroupId();
    const now = this.getTime();
    const group: SubchatGroup = {
      groupId,
      parentInvocationId: parent.invocationId,
      parentConversationId: parent.conversationId,
      children: childIds.map((childId) => ({ childId, done: false, value: undefined })),
      createdAt: now,
      deadlineAt: now + this.deadlineMs,
      resolved: false
    };
    this.groups.set(groupId, group);

    childIds.forEach((childId, index) => {
      const spec = specs[index];
      this.groupOfChild.set(childId, groupId);
      this.options.store.registerChild(childId, groupId, spec?.profile ?? '', spec?.content ?? '');
    });
    this.options.store.setStatus(parent.conversationId, 'awaiting_children');

    try {
      await this.options.pendingCalls.postPlaceholder({
        invocationId: parent.invocationId,
        conversationId: parent.conversationId,
        content: WAIT_PLACEHOLDER,
        subchats: childIds
      });
    } catch (error) {
      await this.abandon(group, errorMessage(error));
      throw error;
    }

    this.options.audit?.record('subchat_spawned', parent.conversationId, {
      groupId,
      invocationId: parent.invocationId,
      childIds
    });
    this.logger.info({ groupId, invocationId: parent.invocationId, children: childIds.length }, 'subchat group spawned');

    return { groupId, childIds };
  }

  /**
   * Records a child's terminal value. Returns false when the report changed nothing
   * (unknown group, resolved group, or a child that already reported). Rethrows when the
   * group's result could not be posted; the next checkDeadlines retries it.
   */
  async onChildFinalized(groupId: string, childId: string, value: unknown): Promise<boolean> {
    const group = this.groups.get(groupId);
    if (!group || group.resolved) {
      this.logger.debug({ groupId, childId }, 'ignoring finalization for resolved group');
      return false;
    }
    const slot = group.children.find((child) => child.childId === childId);
    if (!slot || slot.done) {
      return false;
    }
    slot.done = true;
    slot.value = value;
    if (this.options.store.statusOf(childId) !== 'failed') {
      this.options.store.setStatus(childId, 'finalized');
    }

    if (group.children.every((child) => child.done)) {
      await this.resolveWithValues(group);
    }
    return true;
  }

  /** A failed child fills its slot with an error marker so the group can still complete. */
  onChildFailed(groupId: string, childId: string, error: string): Promise<boolean> {
    return this.onChildFinalized(groupId, childId, { error });
  }

  /**
   * Resolves every group whose deadline has passed with a timeout error, and retries groups
   * whose children all reported but whose result post failed. Returns the resolved group ids.
   */
  async checkDeadlines(): Promise<string[]> {
    const now = this.getTime();
    const resolved: string[] = [];
    for (const group of [...this.groups.values()]) {
      if (group.resolved) {
        continue;
      }
      const complete = group.children.every((child) => child.done);
      if (!complete && now < group.deadlineAt) {
        continue;
      }
      try {
        if (complete) {
          await this.resolveWithValues(group);
        } else {
          await this.resolveWithTimeout(group);
        }
        resolved.push(group.groupId);
      } catch (error) {
        this.logger.warn(
          { groupId: group.groupId, error: errorMessage(error) },
          'subchat result not delivered, retrying on the next tick'
        );
      }
    }
    return resolved;
  }

  /** Milliseconds until the nearest open deadline, if any group is open. */
  nextDeadlineIn(): number | undefined {
    const now = this.getTime();
    let nearest: number | undefined;
    for (const group of this.groups.values()) {
      if (!group.resolved) {
        nearest = nearest === undefined ? group.deadlineAt : Math.min(nearest, group.deadlineAt);
      }
    }
    return nearest === undefined ? undefined : Math.max(0, nearest - now);
  }

  groupIdOf(childId: string): string | undefined {
    return this.groupOfChild.get(childId);
  }

  openGroups(): SubchatGroupView[] {
    return [...this.groups.values()]
      .filter((group) => !group.resolved)
      .map((group) => ({
        groupId: group.groupId,
        parentInvocationId: group.parentInvocationId,
        childIds: group.children.map((child) => child.childId),
        completed: group.children.filter((child) => child.done).length,
        deadlineAt: group.deadlineAt
      }));
  }

  private async resolveWithValues(group: SubchatGroup): Promise<void> {
    group.resolved = true;
    try {
      await this.options.pendingCalls.settle({
        invocationId: group.parentInvocationId,
        conversationId: group.parentConversationId,
        content: JSON.stringify(group.children.map((child) => child.value)),
        status: 'ok',
        cost: 0
      });
    } catch (error) {
      group.resolved = false;
      throw error;
    }
    this.options.audit?.record('subchat_resolved', group.parentConversationId, {
      groupId: group.groupId,
      invocationId: group.parentInvocationId
    });
    this.logger.info({ groupId: group.groupId }, 'subchat group resolved');
    this.close(group);
  }

  private async resolveWithTimeout(group: SubchatGroup): Promise<void> {
    const open = group.children.filter((child) => !child.done);
    group.resolved = true;
    try {
      await this.options.pendingCalls.settle({
        invocationId: group.parentInvocationId,
        conversationId: group.parentConversationId,
        content: subchatTimeoutMessage(this.deadlineMs, open.length, group.children.length),
        status: 'timeout',
        cost: 0
      });
    } catch (error) {
      group.resolved = false;
      throw error;
    }
    this.terminate(open);
    this.options.audit?.record('subchat_timed_out', group.parentConversationId, {
      groupId: group.groupId,
      invocationId: group.parentInvocationId,
      terminated: open.map((child) => child.childId)
    });
    this.logger.warn({ groupId: group.groupId, open: open.length }, 'subchat group timed out');
    this.close(group);
  }

  /** Tears down a group whose parent never learned about it. */
  private async abandon(group: SubchatGroup, reason: string): Promise<void> {
    group.resolved = true;
    this.terminate(group.children);
    this.logger.error({ groupId: group.groupId, error: reason }, 'subchat group abandoned, placeholder not posted');
    for (const child of group.children) {
      try {
        await this.options.gateway.failConversation(child.childId, 'Subchat group abandoned');
      } catch (error) {
        this.logger.warn({ childId: child.childId, error: errorMessage(error) }, 'could not report abandoned subchat');
      }
    }
    this.close(group);
  }

  private terminate(children: ChildSlot[]): void {
    for (const child of children) {
      this.options.store.setStatus(child.childId, 'terminated');
      this.options.onChildTerminated?.(child.childId);
    }
  }

  /** Forgets a resolved group and retires its children, then releases the parent. */
  private close(group: SubchatGroup): void {
    this.groups.delete(group.groupId);
    for (const child of group.children) {
      this.groupOfChild.delete(child.childId);
      this.options.store.retire(child.childId);
      this.options.onChildRetired?.(child.childId);
    }
    const parentId = group.parentConversationId;
    const stillWaiting = [...this.groups.values()].some((other) => other.parentConversationId === parentId);
    if (!stillWaiting && this.options.store.statusOf(parentId) === 'awaiting_children') {
      this.options.store.setStatus(parentId, 'active');
    }
  }
}
