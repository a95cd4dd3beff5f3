import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { systemTimers } from '@/infrastructure/time/systemTime';
import type { TimerPort } from '@/ports/TimerPort';

/** A runtime component that needs an orderly stop. */
export type LifecycleService = {
  name: string;
  stop: () => Promise<void>;
};

export type StopResult =
  | { kind: 'stopped' }
  | { kind: 'timeout' }
  | { kind: 'error'; error: unknown };

export type StopLogger = Pick<ComponentLogger, 'info' | 'warn' | 'error'>;

export type StopOptions = {
  timeoutMs: number;
  timers?: TimerPort;
  log?: StopLogger;
};

/**
 * Races `service.stop()` against a timeout. A stop that loses the race keeps
 * running; if it later fails, the failure is still logged.
 */
export async function stopWithTimeout(service: LifecycleService, options: StopOptions): Promise<StopResult> {
  const { timeoutMs } = options;
  const timers = options.timers ?? systemTimers;
  const log = options.log ?? createLogger('Server');

  const stopping: Promise<StopResult> = service.stop().then(
    (): StopResult => ({ kind: 'stopped' }),
    (error: unknown): StopResult => ({ kind: 'error', error }),
  );
  let timer = { cancel: () => {} };
  const timedOut = new Promise<StopResult>((resolve) => {
    timer = timers.setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
  });

  const result = await Promise.race([stopping, timedOut]);
  timer.cancel();

  switch (result.kind) {
    case 'stopped':
      log.info(`service ${service.name} stopped`);
      break;
    case 'error':
      log.error(`failed to stop ${service.name}`, { message: errorMessage(result.error) });
      break;
    case 'timeout':
      log.warn(`service ${service.name} stop timed out`, { timeoutMs });
      void stopping.then((late) => {
        if (late.kind === 'error') {
          log.error(`failed to stop ${service.name}`, { message: errorMessage(late.error) });
        }
      });
      break;
  }
  return result;
}

/** Stops every service concurrently; resolves with each outcome by name. */
export async function stopAll(
  services: LifecycleService[],
  options: StopOptions,
): Promise<Record<string, StopResult['kind']>> {
  const results = await Promise.all(services.map((service) => stopWithTimeout(service, options)));
  const outcome: Record<string, StopResult['kind']> = {};
  services.forEach((service, index) => {
    outcome[service.name] = results[index]?.kind ?? 'timeout';
  });
  return outcome;
}
