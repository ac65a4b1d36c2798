import pino, { type Logger } from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  if (isTest) {
    return 'silent';
  }
  return isProduction ? 'info' : 'debug';
}

const logger: Logger = pino({
  level: defaultLevel(),
  base: { service: 'event-runtime' },
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true }
        }
      })
});

/**
 * Creates a child logger scoped to one runtime component.
 */
export function createComponentLogger(component: string, extra?: Record<string, unknown>): Logger {
  return logger.child({ component, ...extra });
}

export type { Logger };
export default logger;
