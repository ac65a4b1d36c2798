import type { ControlScriptResult } from '../core/contracts/control';

/** Runtime actions a control result can trigger on one conversation. */
export interface ControlTarget {
  readonly isChild: boolean;
  fail(message: string): Promise<void>;
  cancel(invocationIds: string[]): Promise<void>;
  inject(instruction: string): Promise<void>;
  finalize(value: unknown): Promise<void>;
  /** Terminal value on a conversation that has no parent to receive it. */
  ignoreTerminal(value: unknown): void;
}

export type ControlVerdict = 'continue' | 'halt';

/**
 * Applies outputs in fixed order: hard error, cancellations, injected instruction, terminal value.
 * A hard error stops the sequence; a child's terminal value ends its generation.
 */
export async function applyControlResult(
  result: ControlScriptResult,
  target: ControlTarget
): Promise<ControlVerdict> {
  if (result.hardError !== undefined) {
    await target.fail(result.hardError);
    return 'halt';
  }
  if (result.cancelInvocationIds && result.cancelInvocationIds.length > 0) {
    await target.cancel(result.cancelInvocationIds);
  }
  if (result.injectInstruction !== undefined) {
    await target.inject(result.injectInstruction);
  }
  if (result.terminal) {
    if (!target.isChild) {
      target.ignoreTerminal(result.terminal.value);
      return 'continue';
    }
    await target.finalize(result.terminal.value);
    return 'halt';
  }
  return 'continue';
}
