import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';

export type StopResult =
  | { kind: 'stopped' }
  | { kind: 'timeout' }
  | { kind: 'error'; error: unknown };

/**
 * Stops one service, giving up after `timeoutMs`. A stop that fails after the
 * timeout is still logged once it settles.
 */
export async function stopWithTimeout(
  name: string,
  stopFn: () => Promise<void>,
  timeoutMs: number,
  log: ComponentLogger = createLogger('Server'),
): Promise<StopResult> {
  const pending: Promise<StopResult> = stopFn().then(
    (): StopResult => ({ kind: 'stopped' }),
    (error: unknown): StopResult => ({ kind: 'error', error }),
  );
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<StopResult>((resolve) => {
    timer = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
  });

  const result = await Promise.race([pending, timeout]).finally(() => clearTimeout(timer));

  switch (result.kind) {
    case 'stopped':
      log.debug(`${name} stopped`);
      break;
    case 'timeout':
      log.warn(`${name} stop timed out`, { timeoutMs });
      void pending.then((late) => {
        if (late.kind === 'error') {
          log.error(`failed to stop ${name}`, { message: errorMessage(late.error) });
        }
      });
      break;
    case 'error':
      log.error(`failed to stop ${name}`, { message: errorMessage(result.error) });
      break;
  }
  return result;
}
