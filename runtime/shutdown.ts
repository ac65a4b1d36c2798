import type { Logger } from 'pino';

type SignalListener = (signal: NodeJS.Signals) => void;

export interface SignalTarget {
  on(signal: NodeJS.Signals, listener: SignalListener): unknown;
  off(signal: NodeJS.Signals, listener: SignalListener): unknown;
}

export interface ShutdownOptions {
  controller: AbortController;
  logger: Logger;
  /** Default: process. */
  target?: SignalTarget;
  /** Called on the second signal. Default: process.exit. */
  forceExit?: (code: number) => void;
  signals?: NodeJS.Signals[];
}

/**
 * First SIGINT/SIGTERM aborts the run token so the loop finishes its current event and unwinds.
 * A second signal exits immediately with code 1. Returns a function that removes the listeners.
 */
export function installShutdownHandlers(options: ShutdownOptions): () => void {
  const target: SignalTarget = options.target ?? process;
  const forceExit = options.forceExit ?? ((code: number) => process.exit(code));
  const signals = options.signals ?? ['SIGINT', 'SIGTERM'];
  let received = 0;

  const onSignal: SignalListener = (signal) => {
    received++;
    if (received === 1) {
      options.logger.info({ signal }, 'shutdown requested, finishing current event');
      options.controller.abort();
      return;
    }
    options.logger.warn({ signal }, 'second signal, exiting now');
    forceExit(1);
  };

  for (const signal of signals) {
    target.on(signal, onSignal);
  }
  return () => {
    for (const signal of signals) {
      target.off(signal, onSignal);
    }
  };
}
