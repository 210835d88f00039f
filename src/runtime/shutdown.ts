import { createLogger } from '@/shared/logging/logger';
import { RC_OK } from '@/domain/exitCodes';
import type { Runtime } from '@/runtime/bootstrap';

const FORCE_EXIT_MS = 8000;

/**
 * SIGINT/SIGTERM stop the runtime and exit. A second signal, or a stop that
 * never settles, exits immediately with status 1. The returned function runs
 * the same sequence with a chosen exit code.
 */
export function registerShutdownHandlers(
  runtime: Pick<Runtime, 'stop'>,
  log = createLogger('Server'),
  exit: (code: number) => void = (code) => process.exit(code),
): (code?: number) => Promise<void> {
  let shuttingDown = false;

  const shutdown = async (code: number = RC_OK): Promise<void> => {
    if (shuttingDown) {
      log.warn('second shutdown signal; exiting now');
      exit(1);
      return;
    }
    shuttingDown = true;
    log.info('shutting down');

    const forceExit = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit');
      exit(1);
    }, FORCE_EXIT_MS);
    forceExit.unref();

    await runtime.stop();
    clearTimeout(forceExit);
    exit(code);
  };

  const onSignal = (): void => {
    void shutdown();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  return shutdown;
}
