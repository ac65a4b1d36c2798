import { z } from 'zod';
import { ConfigError } from '../core/errors';

const positiveNumber = (fallback: number) => z.coerce.number().finite().positive().default(fallback);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  AGENT_ID: z.string().trim().min(1, 'AGENT_ID is required'),
  BACKEND_URL: z.string().trim().url('BACKEND_URL must be a URL'),
  FEED_URL: z
    .string()
    .trim()
    .url('FEED_URL must be a URL')
    .refine((value) => /^wss?:\/\//.test(value), { message: 'FEED_URL must use ws:// or wss://' }),
  BACKEND_TOKEN: optionalString,
  BACKEND_TIMEOUT_MS: positiveNumber(30_000),
  SLEEP_IF_IDLE_MS: z.coerce.number().finite().nonnegative().default(10_000),
  UNHANDLED_TOOL_POLICY: z.enum(['shutdown', 'leave-pending']).default('shutdown'),
  EXTERNAL_TOOLS: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? '')
        .split(',')
        .map((name) => name.trim())
        .filter((name) => name.length > 0)
    ),
  BUDGET_CEILING: positiveNumber(100),
  BUDGET_SOFT_RATIO: z.coerce.number().finite().gt(0).max(1).default(0.5),
  CONTROL_SCRIPT_TIMEOUT_MS: positiveNumber(250),
  CONTROL_SCRIPTS_DIR: optionalString,
  SUBCHAT_DEADLINE_MS: positiveNumber(60 * 60 * 1000),
  OPS_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  NODE_ENV: z.string().default('development')
});

export interface RuntimeConfig {
  agentId: string;
  backendUrl: string;
  feedUrl: string;
  backendToken?: string;
  backendTimeoutMs: number;
  sleepIfIdleMs: number;
  unhandledToolPolicy: 'shutdown' | 'leave-pending';
  externalTools: string[];
  budgetCeiling: number;
  budgetSoftRatio: number;
  controlScriptTimeoutMs: number;
  controlScriptsDir?: string;
  subchatDeadlineMs: number;
  opsPort?: number;
  logLevel?: string;
  nodeEnv: string;
}

/**
 * Reads and validates runtime configuration from environment variables.
 * Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const input = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }
  const values = parsed.data;
  return {
    agentId: values.AGENT_ID,
    backendUrl: values.BACKEND_URL,
    feedUrl: values.FEED_URL,
    backendToken: values.BACKEND_TOKEN,
    backendTimeoutMs: values.BACKEND_TIMEOUT_MS,
    sleepIfIdleMs: values.SLEEP_IF_IDLE_MS,
    unhandledToolPolicy: values.UNHANDLED_TOOL_POLICY,
    externalTools: values.EXTERNAL_TOOLS,
    budgetCeiling: values.BUDGET_CEILING,
    budgetSoftRatio: values.BUDGET_SOFT_RATIO,
    controlScriptTimeoutMs: values.CONTROL_SCRIPT_TIMEOUT_MS,
    controlScriptsDir: values.CONTROL_SCRIPTS_DIR,
    subchatDeadlineMs: values.SUBCHAT_DEADLINE_MS,
    opsPort: values.OPS_PORT,
    logLevel: values.LOG_LEVEL,
    nodeEnv: values.NODE_ENV
  };
}
