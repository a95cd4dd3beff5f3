import type { StoragePort } from '@/ports/StoragePort';
import type { NotifierPort } from '@/ports/NotifierPort';
import type { ConfigPort } from '@/ports/ConfigPort';
import type { ClockPort } from '@/ports/ClockPort';
import type { TimerPort } from '@/ports/TimerPort';
import { StorageAdapter } from '@/adapters/storage/StorageAdapter';
import { ConfigAdapter } from '@/adapters/config/ConfigAdapter';
import { ConfigRepository } from '@/application/config/configRepository';
import { SessionConnectionRegistry } from '@/adapters/http/events/sessionConnectionRegistry';
import { EventsNotifier } from '@/adapters/http/events/eventsNotifier';
import { systemClock, systemTimers } from '@/infrastructure/time/systemTime';

export type RuntimePorts = {
  storage: StoragePort;
  config: ConfigPort;
  clock: ClockPort;
  timers: TimerPort;
  connections: SessionConnectionRegistry;
  notifier: NotifierPort;
};

export type RuntimePortOptions = Partial<Pick<RuntimePorts, 'clock' | 'timers' | 'storage'>> & {
  configFile: string;
};

export function createRuntimePorts(options: RuntimePortOptions): RuntimePorts {
  const storage = options.storage ?? new StorageAdapter();
  const clock = options.clock ?? systemClock;
  const connections = new SessionConnectionRegistry();
  return {
    storage,
    config: new ConfigAdapter(new ConfigRepository(storage, options.configFile)),
    clock,
    timers: options.timers ?? systemTimers,
    connections,
    notifier: new EventsNotifier(connections, clock),
  };
}
