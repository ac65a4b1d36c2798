import type { Logger } from 'pino';
import { createComponentLogger } from '../logging/logger';
import { errorMessage } from '../core/errors';

export type RuntimeAuditEvent =
  | 'tool_call'
  | 'tool_unhandled'
  | 'tool_cancelled'
  | 'confirmation_requested'
  | 'subchat_spawned'
  | 'subchat_resolved'
  | 'subchat_timed_out'
  | 'generation_blocked_budget'
  | 'budget_reset'
  | 'control_hard_error'
  | 'runtime_shutdown';

export interface RuntimeAuditEntry {
  timestamp: number;
  event: RuntimeAuditEvent;
  conversationId?: string;
  data?: Record<string, unknown>;
}

export interface RuntimeAuditLogger {
  logRuntimeEvent(entry: RuntimeAuditEntry): void | Promise<void>;
}

export interface RedactionOptions {
  /** Extra key fragments to redact (case-insensitive partial match). */
  sensitiveFields?: string[];
}

const DEFAULT_SENSITIVE_FIELDS = [
  'password',
  'secret',
  'apikey',
  'api_key',
  'token',
  'credential',
  'authorization',
  'bearer',
  'cookie',
  'session'
];

function sensitiveFieldsFor(options: RedactionOptions): string[] {
  return options.sensitiveFields
    ? [...DEFAULT_SENSITIVE_FIELDS, ...options.sensitiveFields]
    : DEFAULT_SENSITIVE_FIELDS;
}

/**
 * Masks `key: value` / `key=value` pairs for sensitive keys and long opaque tokens.
 */
export function redactString(text: string, options: RedactionOptions = {}): string {
  let redacted = text;
  for (const field of sensitiveFieldsFor(options)) {
    const pattern = new RegExp(`(${field}\\s*[:=]\\s*)([^\\s,;}\\]\\)]+)`, 'gi');
    redacted = redacted.replace(pattern, (match: string, prefix: string, value: string) =>
      value.length > 8 || /[-_]/.test(value) ? `${prefix}[REDACTED]` : match
    );
  }
  return redacted.replace(/\b[a-zA-Z0-9_-]{32,}\b/g, '[REDACTED]');
}

export function redactValue(
  value: unknown,
  options: RedactionOptions = {},
  visited: WeakSet<object> = new WeakSet()
): unknown {
  if (typeof value === 'string') {
    return redactString(value, options);
  }
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (visited.has(value)) {
    return '[CIRCULAR]';
  }
  visited.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, options, visited));
  }

  const fields = sensitiveFieldsFor(options);
  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    const lowerKey = key.toLowerCase();
    result[key] = fields.some((field) => lowerKey.includes(field))
      ? '[REDACTED]'
      : redactValue(nested, options, visited);
  }
  return result;
}

/** Writes audit entries as structured log lines. */
export class PinoAuditLogger implements RuntimeAuditLogger {
  constructor(private readonly logger: Logger = createComponentLogger('audit')) {}

  logRuntimeEvent(entry: RuntimeAuditEntry): void {
    this.logger.info(
      {
        audit: entry.event,
        conversationId: entry.conversationId,
        at: new Date(entry.timestamp).toISOString(),
        ...entry.data
      },
      `[AUDIT] ${entry.event}`
    );
  }
}

/**
 * Front door used by runtime components: redacts payloads and never lets an audit
 * failure reach the caller.
 */
export class RuntimeAuditTrail {
  constructor(
    private readonly sink: RuntimeAuditLogger | undefined,
    private readonly getTime: () => number = () => Date.now(),
    private readonly redaction: RedactionOptions = {},
    private readonly fallback: Logger = createComponentLogger('audit')
  ) {}

  record(event: RuntimeAuditEvent, conversationId?: string, data?: Record<string, unknown>): void {
    if (!this.sink) {
      return;
    }
    const entry: RuntimeAuditEntry = {
      timestamp: this.getTime(),
      event,
      conversationId,
      data: data ? toRecord(redactValue(data, this.redaction)) : undefined
    };
    try {
      const result = this.sink.logRuntimeEvent(entry);
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.reportFailure(event, error));
      }
    } catch (error) {
      this.reportFailure(event, error);
    }
  }

  private reportFailure(event: RuntimeAuditEvent, error: unknown): void {
    this.fallback.warn({ audit: event, error: errorMessage(error) }, 'audit sink failed');
  }
}

function toRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return { value };
}
