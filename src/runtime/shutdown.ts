import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import type { Runtime } from '@/runtime/bootstrap';

const FORCE_EXIT_MS = 8000;
const SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Stops the runtime on SIGINT/SIGTERM and exits. A second signal while the
 * stop is running is ignored; a stop that outlives `forceExitMs` exits with 1.
 */
export function registerShutdownHandlers(
  runtime: Runtime,
  log = createLogger('Server'),
  forceExitMs = FORCE_EXIT_MS,
): void {
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      log.debug('shutdown already in progress', { signal });
      return;
    }
    shuttingDown = true;
    log.info('shutdown requested', { signal });

    const forceExit = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit', { forceExitMs });
      process.exit(1);
    }, forceExitMs);
    forceExit.unref();

    try {
      await runtime.stop();
      log.info('shutdown complete');
    } catch (error) {
      log.error('shutdown failed', { message: errorMessage(error) });
      process.exitCode = 1;
    }
    clearTimeout(forceExit);
    process.exit(process.exitCode ?? 0);
  };

  for (const signal of SIGNALS) {
    process.on(signal, (received) => void shutdown(received));
  }
}
