import type { Logger } from 'pino';
import { HttpBackendClient } from '../backend/http-backend-client';
import type { RuntimeConfig } from '../config/config';
import type { RuntimeBackend } from '../core/contracts/backend';
import type { TurnControl } from '../core/contracts/control';
import { Container, createToken } from '../core/di/container';
import { TurnControlEvaluator } from '../control/turn-control-evaluator';
import type { EventSource } from '../events/event-source';
import { WebSocketEventSource } from '../events/websocket-event-source';
import rootLogger from '../logging/logger';
import { AgentRuntime } from '../runtime/agent-runtime';
import { PinoAuditLogger, type RuntimeAuditLogger } from '../security/audit-logger';

export const TOKENS = {
  config: createToken<RuntimeConfig>('config'),
  logger: createToken<Logger>('logger'),
  backend: createToken<RuntimeBackend>('backend'),
  eventSource: createToken<EventSource>('eventSource'),
  control: createToken<TurnControl>('control'),
  auditLogger: createToken<RuntimeAuditLogger>('auditLogger'),
  runtime: createToken<AgentRuntime>('runtime')
};

export interface ContainerContext {
  container: Container;
  runtime: AgentRuntime;
  /** Flushes buffered log output. Call once the runtime has stopped. */
  cleanup(): Promise<void>;
}

/** Replacements for the remote-facing services, used by tests and embedders. */
export interface ContainerOverrides {
  backend?: RuntimeBackend;
  eventSource?: EventSource;
  control?: TurnControl;
  auditLogger?: RuntimeAuditLogger;
  logger?: Logger;
}

/**
 * Composition root: builds every runtime service from validated configuration.
 * Control scripts that fail to compile throw here, before the feed is touched.
 */
export function buildContainer(config: RuntimeConfig, overrides: ContainerOverrides = {}): ContainerContext {
  const container = new Container();
  const logger = overrides.logger ?? rootLogger;
  if (!overrides.logger && config.logLevel) {
    logger.level = config.logLevel;
  }

  container.registerValue(TOKENS.config, config);
  container.registerValue(TOKENS.logger, logger);

  container.register(
    TOKENS.backend,
    () =>
      overrides.backend ??
      new HttpBackendClient({
        baseUrl: config.backendUrl,
        agentId: config.agentId,
        token: config.backendToken,
        timeoutMs: config.backendTimeoutMs
      }),
    { singleton: true }
  );

  container.register(
    TOKENS.eventSource,
    (c) =>
      overrides.eventSource ??
      new WebSocketEventSource({
        url: config.feedUrl,
        agentId: config.agentId,
        token: config.backendToken,
        logger: c.resolve(TOKENS.logger).child({ component: 'feed' })
      }),
    { singleton: true }
  );

  container.register(
    TOKENS.control,
    (c) => {
      if (overrides.control) {
        return overrides.control;
      }
      const options = {
        timeoutMs: config.controlScriptTimeoutMs,
        logger: c.resolve(TOKENS.logger).child({ component: 'turn-control' })
      };
      return config.controlScriptsDir
        ? TurnControlEvaluator.fromDirectory(config.controlScriptsDir, options)
        : new TurnControlEvaluator(options);
    },
    { singleton: true }
  );

  container.register(
    TOKENS.auditLogger,
    (c) => overrides.auditLogger ?? new PinoAuditLogger(c.resolve(TOKENS.logger).child({ component: 'audit' })),
    { singleton: true }
  );

  container.register(
    TOKENS.runtime,
    (c) =>
      new AgentRuntime({
        backend: c.resolve(TOKENS.backend),
        eventSource: c.resolve(TOKENS.eventSource),
        control: c.resolve(TOKENS.control),
        auditLogger: c.resolve(TOKENS.auditLogger),
        sleepIfIdleMs: config.sleepIfIdleMs,
        unhandledToolPolicy: config.unhandledToolPolicy,
        externalTools: config.externalTools,
        budget: { ceiling: config.budgetCeiling, softRatio: config.budgetSoftRatio },
        subchatDeadlineMs: config.subchatDeadlineMs,
        logger: c.resolve(TOKENS.logger).child({ component: 'runtime' })
      }),
    { singleton: true }
  );

  return {
    container,
    runtime: container.resolve(TOKENS.runtime),
    async cleanup() {
      logger.flush();
    }
  };
}
