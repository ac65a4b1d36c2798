/**
 * Runs a conversation's control script around each generation step and translates the
 * script's declared globals into a typed ControlScriptResult.
 *
 * Script inputs: conversation_id, turn_history, spend_so_far, spend_ceiling,
 * soft_threshold_reached, is_child, phase, generated_turn (after a turn, else null).
 * Script outputs: hard_error, cancel_invocation_ids, inject_instruction, terminal_value.
 */

import fs from 'fs';
import path from 'path';
import type { Script } from 'vm';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { GeneratedTurn, Turn } from '../core/contracts/conversation';
import type { ControlContext, ControlPhase, ControlScriptResult, TurnControl } from '../core/contracts/control';
import { ControlScriptError, errorMessage } from '../core/errors';
import { createComponentLogger } from '../logging/logger';
import { ScriptSandbox, type SandboxRun } from './script-sandbox';

export const CONTROL_OUTPUT_NAMES = [
  'hard_error',
  'cancel_invocation_ids',
  'inject_instruction',
  'terminal_value'
] as const;

const hardErrorSchema = z.string().min(1);
const cancelListSchema = z.array(z.string().min(1));
const injectSchema = z.string().min(1);

export interface TurnControlEvaluatorOptions {
  /** Profile name -> script source. */
  scripts?: Map<string, string>;
  timeoutMs?: number;
  logger?: Logger;
}

function serializeTurn(turn: Turn): Record<string, unknown> {
  return {
    role: turn.role,
    content: turn.content,
    synthetic: turn.synthetic ?? false,
    tool_calls: turn.toolCalls.map((call) => ({
      invocation_id: call.invocationId,
      tool_name: call.toolName,
      arguments: call.arguments
    }))
  };
}

export class TurnControlEvaluator implements TurnControl {
  private readonly sandbox: ScriptSandbox;
  private readonly compiled = new Map<string, Script>();
  private readonly logger: Logger;

  /**
   * Loads every `<profile>.js` file in a directory. Unreadable or invalid scripts fail startup.
   */
  static fromDirectory(directory: string, options: Omit<TurnControlEvaluatorOptions, 'scripts'> = {}): TurnControlEvaluator {
    const scripts = new Map<string, string>();
    for (const entry of fs.readdirSync(directory)) {
      if (path.extname(entry) !== '.js') {
        continue;
      }
      scripts.set(path.basename(entry, '.js'), fs.readFileSync(path.join(directory, entry), 'utf8'));
    }
    return new TurnControlEvaluator({ ...options, scripts });
  }

  constructor(options: TurnControlEvaluatorOptions = {}) {
    this.sandbox = new ScriptSandbox({ timeoutMs: options.timeoutMs, outputNames: CONTROL_OUTPUT_NAMES });
    this.logger = options.logger ?? createComponentLogger('turn-control');
    for (const [profile, source] of options.scripts ?? []) {
      this.compiled.set(profile, this.sandbox.compile(profile, source));
    }
  }

  hasProfile(profile: string): boolean {
    return this.compiled.has(profile);
  }

  beforeTurn(ctx: ControlContext): ControlScriptResult {
    return this.evaluate(ctx, 'before_turn', null);
  }

  afterTurn(ctx: ControlContext, generated: GeneratedTurn): ControlScriptResult {
    return this.evaluate(ctx, 'after_turn', generated);
  }

  private evaluate(ctx: ControlContext, phase: ControlPhase, generated: GeneratedTurn | null): ControlScriptResult {
    const script = this.compiled.get(ctx.profile);
    if (!script) {
      return {};
    }

    const inputs = {
      conversation_id: ctx.conversationId,
      turn_history: ctx.history.map(serializeTurn),
      spend_so_far: ctx.spendSoFar,
      spend_ceiling: ctx.spendCeiling,
      soft_threshold_reached: ctx.softThresholdReached,
      is_child: ctx.isChild,
      phase,
      generated_turn: generated
        ? serializeTurn({ role: 'assistant', content: generated.content, toolCalls: generated.toolCalls })
        : null
    };

    let run: SandboxRun;
    try {
      run = this.sandbox.run(ctx.profile, script, inputs);
    } catch (error) {
      if (!(error instanceof ControlScriptError)) {
        throw error;
      }
      this.logger.warn({ conversationId: ctx.conversationId, phase, error: errorMessage(error) }, 'control script failed');
      return {};
    }

    for (const line of run.printed) {
      this.logger.debug({ conversationId: ctx.conversationId, profile: ctx.profile, phase }, line);
    }
    if (run.unserializable.length > 0) {
      this.logger.warn({ conversationId: ctx.conversationId, fields: run.unserializable }, 'control script output not serializable');
    }

    return this.interpret(ctx, run.outputs);
  }

  private interpret(ctx: ControlContext, outputs: Map<string, unknown>): ControlScriptResult {
    const result: ControlScriptResult = {};
    const malformed: string[] = [];

    if (outputs.has('hard_error')) {
      const parsed = hardErrorSchema.safeParse(outputs.get('hard_error'));
      if (parsed.success) {
        result.hardError = parsed.data;
      } else {
        malformed.push('hard_error');
      }
    }
    if (outputs.has('cancel_invocation_ids')) {
      const parsed = cancelListSchema.safeParse(outputs.get('cancel_invocation_ids'));
      if (parsed.success) {
        result.cancelInvocationIds = parsed.data;
      } else {
        malformed.push('cancel_invocation_ids');
      }
    }
    if (outputs.has('inject_instruction')) {
      const parsed = injectSchema.safeParse(outputs.get('inject_instruction'));
      if (parsed.success) {
        result.injectInstruction = parsed.data;
      } else {
        malformed.push('inject_instruction');
      }
    }
    if (outputs.has('terminal_value')) {
      result.terminal = { value: outputs.get('terminal_value') };
    }

    if (malformed.length > 0) {
      this.logger.warn({ conversationId: ctx.conversationId, fields: malformed }, 'ignoring malformed control script outputs');
    }
    return result;
  }
}
