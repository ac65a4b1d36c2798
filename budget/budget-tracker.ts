/**
 * Per-conversation spend counters with a soft warning threshold and a hard ceiling.
 * A conversation whose spend reaches its ceiling stays blocked until a reset or top-up.
 */

import { BudgetError } from '../core/errors';

export interface BudgetTrackerOptions {
  /** Ceiling for conversations without an explicit one. */
  defaultCeiling: number;
  /** Fraction of the ceiling at which the soft threshold is reached. Default: 0.5. */
  softRatio?: number;
  /** Explicit ceilings. Key = conversationId. */
  ceilings?: Map<string, number>;
}

export interface BudgetSnapshot {
  spent: number;
  ceiling: number;
  blocked: boolean;
  softThresholdReached: boolean;
}

interface BudgetState {
  spent: number;
  ceiling: number;
  blocked: boolean;
}

export type BudgetResetMode = 'reset' | 'top_up';

export class BudgetTracker {
  private readonly states = new Map<string, BudgetState>();
  private readonly defaultCeiling: number;
  private readonly softRatio: number;

  constructor(options: BudgetTrackerOptions) {
    if (!Number.isFinite(options.defaultCeiling) || options.defaultCeiling <= 0) {
      throw new BudgetError(`defaultCeiling must be a finite positive number. Got: ${options.defaultCeiling}`);
    }
    const softRatio = options.softRatio ?? 0.5;
    if (!Number.isFinite(softRatio) || softRatio <= 0 || softRatio > 1) {
      throw new BudgetError(`softRatio must be in (0, 1]. Got: ${options.softRatio}`);
    }
    this.defaultCeiling = options.defaultCeiling;
    this.softRatio = softRatio;
    for (const [conversationId, ceiling] of options.ceilings ?? []) {
      this.setCeiling(conversationId, ceiling);
    }
  }

  /**
   * Adds spend. Returns true when this charge flipped the conversation into the blocked state.
   */
  charge(conversationId: string, amount: number): boolean {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new BudgetError(`Charge must be a finite non-negative number. Got: ${amount}`);
    }
    const state = this.stateOf(conversationId);
    state.spent += amount;
    if (!state.blocked && state.spent >= state.ceiling) {
      state.blocked = true;
      return true;
    }
    return false;
  }

  remaining(conversationId: string): number {
    const state = this.stateOf(conversationId);
    return Math.max(0, state.ceiling - state.spent);
  }

  isBlocked(conversationId: string): boolean {
    return this.states.get(conversationId)?.blocked ?? false;
  }

  isSoftThresholdReached(conversationId: string): boolean {
    const state = this.stateOf(conversationId);
    return state.spent >= state.ceiling * this.softRatio;
  }

  snapshot(conversationId: string): BudgetSnapshot {
    const state = this.stateOf(conversationId);
    return {
      spent: state.spent,
      ceiling: state.ceiling,
      blocked: state.blocked,
      softThresholdReached: state.spent >= state.ceiling * this.softRatio
    };
  }

  setCeiling(conversationId: string, ceiling: number): void {
    if (!Number.isFinite(ceiling) || ceiling <= 0) {
      throw new BudgetError(`Ceiling must be a finite positive number. Got: ${ceiling}`);
    }
    const state = this.stateOf(conversationId);
    state.ceiling = ceiling;
  }

  /**
   * External reset: `reset` zeroes spend (scheduled reset), `top_up` raises the ceiling by `amount`.
   * Returns true when the conversation was blocked and no longer is.
   */
  reset(conversationId: string, mode: BudgetResetMode, amount = 0): boolean {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new BudgetError(`Reset amount must be a finite non-negative number. Got: ${amount}`);
    }
    const state = this.stateOf(conversationId);
    const wasBlocked = state.blocked;
    if (mode === 'reset') {
      state.spent = 0;
    } else {
      state.ceiling += amount;
    }
    state.blocked = state.spent >= state.ceiling;
    return wasBlocked && !state.blocked;
  }

  blockedConversations(): string[] {
    return [...this.states.entries()].filter(([, state]) => state.blocked).map(([id]) => id);
  }

  forget(conversationId: string): void {
    this.states.delete(conversationId);
  }

  private stateOf(conversationId: string): BudgetState {
    let state = this.states.get(conversationId);
    if (!state) {
      state = { spent: 0, ceiling: this.defaultCeiling, blocked: false };
      this.states.set(conversationId, state);
    }
    return state;
  }
}
