import type { FastifyInstance } from 'fastify';
import { loadConfig, type RuntimeConfig } from '../config/config';
import { ConfigError, DuplicateRegistrationError, errorMessage } from '../core/errors';
import logger from '../logging/logger';
import { installShutdownHandlers } from '../runtime/shutdown';
import { buildContainer, type ContainerContext, type ContainerOverrides } from '../server/container';
import { buildOpsServer } from '../server/server';

/**
 * Starts one runtime process. Resolves with the process exit code:
 * 0 after a requested shutdown, 1 on a startup failure or an unhandled tool.
 */
export async function main(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ContainerOverrides = {}
): Promise<number> {
  let config: RuntimeConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error({ issues: error.issues }, error.message);
      return 1;
    }
    throw error;
  }

  let context: ContainerContext;
  try {
    context = buildContainer(config, overrides);
  } catch (error) {
    const kind = error instanceof DuplicateRegistrationError ? 'duplicate_registration' : 'startup';
    logger.error({ kind, error: errorMessage(error) }, 'runtime failed to start');
    return 1;
  }
  const { runtime } = context;

  let ops: FastifyInstance | undefined;
  if (config.opsPort !== undefined) {
    ops = buildOpsServer(runtime);
    try {
      await ops.listen({ port: config.opsPort, host: '0.0.0.0' });
      logger.info({ port: config.opsPort }, 'ops server listening');
    } catch (error) {
      logger.error({ port: config.opsPort, error: errorMessage(error) }, 'ops server failed to start');
      return 1;
    }
  }

  const controller = new AbortController();
  const dispose = installShutdownHandlers({ controller, logger });

  try {
    logger.info({ agentId: config.agentId, tools: runtime.toolNames() }, 'runtime started');
    const exit = await runtime.run(controller.signal);
    if (exit.reason === 'unhandled_tool') {
      logger.fatal({ toolName: exit.error.toolName }, 'runtime stopped on an unhandled tool');
      return 1;
    }
    logger.info('runtime stopped');
    return 0;
  } finally {
    dispose();
    await ops?.close();
    await context.cleanup();
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.fatal({ error: errorMessage(error) }, 'runtime crashed');
      process.exitCode = 1;
    }
  );
}
