import type { GeneratedTurn, Turn } from './conversation';

export type ControlPhase = 'before_turn' | 'after_turn';

export interface ControlContext {
  conversationId: string;
  profile: string;
  isChild: boolean;
  history: readonly Turn[];
  spendSoFar: number;
  spendCeiling: number;
  softThresholdReached: boolean;
}

/**
 * Declared outputs of one control-script run. Every field is optional; a field the script
 * left unset or set to an unexpected shape is absent here.
 */
export interface ControlScriptResult {
  hardError?: string;
  cancelInvocationIds?: string[];
  injectInstruction?: string;
  /** Wrapped so that `null` can be a legitimate terminal value. */
  terminal?: { value: unknown };
}

export interface TurnControl {
  beforeTurn(ctx: ControlContext): ControlScriptResult;
  afterTurn(ctx: ControlContext, generated: GeneratedTurn): ControlScriptResult;
}
