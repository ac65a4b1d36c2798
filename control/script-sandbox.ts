import vm from 'vm';
import { z } from 'zod';
import { ControlScriptError, errorMessage } from '../core/errors';

export interface ScriptSandboxOptions {
  /** Wall-clock budget per evaluation, in milliseconds. Default: 250. */
  timeoutMs?: number;
  /** Global names read back after the script ran. */
  outputNames: readonly string[];
}

export interface SandboxRun {
  /** Output name -> value, only for names the script set to a JSON-serializable value. */
  outputs: Map<string, unknown>;
  printed: string[];
  /** Output names the script set to a value JSON cannot represent. */
  unserializable: string[];
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

// Inputs arrive as one JSON string so no host object is reachable from the script.
const PRELUDE = `
var __input = JSON.parse(__inputs);
delete globalThis.__inputs;
for (var __key in __input) { globalThis[__key] = __input[__key]; }
var __printed = [];
function print() { __printed.push(Array.prototype.map.call(arguments, String).join(' ')); }
Math.random = function () { throw new Error('Math.random is not available in control scripts'); };
(function (NativeDate) {
  function clockError() { return new Error('the current time is not available in control scripts'); }
  function Date(value) {
    if (!new.target || arguments.length === 0) { throw clockError(); }
    return Reflect.construct(NativeDate, arguments, new.target);
  }
  Date.prototype = NativeDate.prototype;
  Date.prototype.constructor = Date;
  Date.UTC = NativeDate.UTC;
  Date.parse = NativeDate.parse;
  Date.now = function () { throw clockError(); };
  globalThis.Date = Date;
})(Date);
`;

const readbackSchema = z.object({
  outputs: z.record(z.string()),
  printed: z.array(z.string()),
  unserializable: z.array(z.string())
});

/**
 * Evaluates untrusted, short control scripts in a fresh V8 context with a hard timeout.
 * Code generation from strings is disabled and promise jobs run inside the timed evaluation.
 * This bounds runaway scripts; it is not a security boundary against hostile code.
 */
export class ScriptSandbox {
  private readonly timeoutMs: number;
  private readonly prelude = new vm.Script(PRELUDE, { filename: 'control-prelude.js' });
  private readonly readback: vm.Script;

  constructor(options: ScriptSandboxOptions) {
    const timeoutMs = options.timeoutMs ?? 250;
    if (!Number.isFinite(timeoutMs) || timeoutMs < 1) {
      throw new Error(`timeoutMs must be a finite number >= 1. Got: ${options.timeoutMs}`);
    }
    for (const name of options.outputNames) {
      if (!IDENTIFIER.test(name)) {
        throw new Error(`Invalid output name: ${name}`);
      }
    }
    this.timeoutMs = Math.floor(timeoutMs);
    this.readback = new vm.Script(buildReadback(options.outputNames), { filename: 'control-readback.js' });
  }

  compile(name: string, source: string): vm.Script {
    try {
      return new vm.Script(source, { filename: `${name}.js` });
    } catch (error) {
      throw new ControlScriptError(name, `syntax error: ${errorMessage(error)}`);
    }
  }

  run(name: string, script: vm.Script, inputs: Record<string, unknown>): SandboxRun {
    const context = vm.createContext(
      { __inputs: JSON.stringify(inputs) },
      { codeGeneration: { strings: false, wasm: false }, microtaskMode: 'afterEvaluate' }
    );

    let raw: unknown;
    try {
      this.prelude.runInContext(context, { timeout: this.timeoutMs });
      script.runInContext(context, { timeout: this.timeoutMs });
      raw = this.readback.runInContext(context, { timeout: this.timeoutMs });
    } catch (error) {
      throw new ControlScriptError(name, errorMessage(error));
    }

    // The script can replace JSON inside its context, so nothing read back is trusted.
    try {
      const parsed = readbackSchema.parse(typeof raw === 'string' ? JSON.parse(raw) : raw);
      const outputs = new Map<string, unknown>();
      for (const [key, text] of Object.entries(parsed.outputs)) {
        const value: unknown = JSON.parse(text);
        outputs.set(key, value);
      }
      return { outputs, printed: parsed.printed, unserializable: parsed.unserializable };
    } catch (error) {
      throw new ControlScriptError(name, `output readback failed: ${errorMessage(error)}`);
    }
  }
}

/**
 * Reads each output by identifier so both globals and top-level let/const bindings are seen.
 * A value that cannot be serialized is left out.
 */
function buildReadback(names: readonly string[]): string {
  const reads = names
    .map(
      (name) => `
  if (typeof ${name} !== 'undefined') {
    try {
      var __text = JSON.stringify(${name});
      if (typeof __text === 'string') { __out[${JSON.stringify(name)}] = __text; }
    } catch (__error) {
      __skipped.push(${JSON.stringify(name)});
    }
  }`
    )
    .join('');
  return `(function () {
  var __out = {};
  var __skipped = [];
  ${reads}
  return JSON.stringify({ outputs: __out, printed: __printed.map(String), unserializable: __skipped });
})();`;
}
