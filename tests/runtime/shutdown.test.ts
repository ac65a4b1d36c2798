import { EventEmitter } from 'node:events';
import pino from 'pino';
import { installShutdownHandlers } from '../../runtime/shutdown';

function setup() {
  const target = new EventEmitter();
  const controller = new AbortController();
  const forceExit = jest.fn();
  const dispose = installShutdownHandlers({
    controller,
    logger: pino({ level: 'silent' }),
    target,
    forceExit
  });
  return { target, controller, forceExit, dispose };
}

describe('installShutdownHandlers', () => {
  it('aborts the run on the first signal', () => {
    const { target, controller, forceExit } = setup();

    target.emit('SIGTERM', 'SIGTERM');

    expect(controller.signal.aborted).toBe(true);
    expect(forceExit).not.toHaveBeenCalled();
  });

  it('exits with code 1 on a second signal', () => {
    const { target, forceExit } = setup();

    target.emit('SIGINT', 'SIGINT');
    target.emit('SIGTERM', 'SIGTERM');

    expect(forceExit).toHaveBeenCalledTimes(1);
    expect(forceExit).toHaveBeenCalledWith(1);
  });

  it('removes its listeners when disposed', () => {
    const { target, controller, dispose } = setup();

    dispose();
    target.emit('SIGINT', 'SIGINT');

    expect(target.listenerCount('SIGINT')).toBe(0);
    expect(target.listenerCount('SIGTERM')).toBe(0);
    expect(controller.signal.aborted).toBe(false);
  });
});
