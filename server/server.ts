import Fastify, { type FastifyInstance } from 'fastify';
import type { RuntimeStatus } from '../runtime/types';

export interface StatusProvider {
  status(): RuntimeStatus;
}

export interface OpsServerOptions {
  logger?: boolean;
}

/**
 * Read-only operations surface: liveness and a snapshot of runtime state.
 */
export function buildOpsServer(runtime: StatusProvider, options: OpsServerOptions = {}): FastifyInstance {
  const fastify = Fastify({ logger: options.logger ?? false });

  fastify.get('/health', async () => ({ status: 'ok' }));

  fastify.get('/status', async () => {
    const status = runtime.status();
    return {
      running: status.running,
      parkDepth: status.parkDepth,
      pendingToolCalls: status.pendingToolCalls,
      openSubchatGroups: status.openSubchatGroups,
      blockedConversations: status.blockedConversations,
      deferredTurns: status.deferredTurns,
      dispatch: status.dispatch
    };
  });

  return fastify;
}
