import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { HOUR_MS, nextHourBoundary } from '@/domain/rotation/selectionKey';
import type { ClockPort } from '@/ports/ClockPort';
import type { TimerHandle, TimerPort } from '@/ports/TimerPort';

/** Fire slightly after the boundary so local time has already rolled over. */
export const DEFAULT_HOUR_OFFSET_MS = 500;

export interface HourSchedulerOptions {
  sessionId: string;
  clock: ClockPort;
  timers: TimerPort;
  onFire: (sessionId: string) => Promise<void>;
  offsetMs?: number;
  intervalMs?: number;
  log?: ComponentLogger;
}

/**
 * Wall-clock aligned periodic trigger: first firing at the next top of the
 * hour, then every interval. Holds the session id only; the callback resolves
 * the session when it runs.
 */
export class HourScheduler {
  private readonly log: ComponentLogger;
  private readonly offsetMs: number;
  private readonly intervalMs: number;
  private firstTimer: TimerHandle | null = null;
  private repeatTimer: TimerHandle | null = null;
  private nextFireAt: number | null = null;
  private fireCount = 0;

  constructor(private readonly options: HourSchedulerOptions) {
    this.log = options.log ?? createLogger('Rotation', 'HourScheduler');
    this.offsetMs = options.offsetMs ?? DEFAULT_HOUR_OFFSET_MS;
    this.intervalMs = options.intervalMs ?? HOUR_MS;
  }

  public get armed(): boolean {
    return this.firstTimer !== null || this.repeatTimer !== null;
  }

  public get firings(): number {
    return this.fireCount;
  }

  public getNextFireAt(): number | null {
    return this.nextFireAt;
  }

  /** (Re)arms the trigger; any previously armed timers are cleared first. */
  public start(): void {
    this.stop();
    const now = this.options.clock.now();
    const fireAt = nextHourBoundary(now, this.offsetMs);
    this.nextFireAt = fireAt;
    this.log.info('hour trigger armed', {
      sessionId: this.options.sessionId,
      nextHour: new Date(fireAt).toISOString(),
      delayMs: fireAt - now,
    });
    this.firstTimer = this.options.timers.setTimeout(() => {
      this.firstTimer = null;
      this.repeatTimer = this.options.timers.setInterval(() => this.fire(), this.intervalMs);
      this.fire();
    }, fireAt - now);
  }

  public stop(): void {
    this.firstTimer?.cancel();
    this.repeatTimer?.cancel();
    this.firstTimer = null;
    this.repeatTimer = null;
    this.nextFireAt = null;
  }

  private fire(): void {
    this.fireCount += 1;
    if (this.nextFireAt !== null) {
      this.nextFireAt += this.intervalMs;
    }
    const { sessionId } = this.options;
    this.log.debug('hour trigger fired', { sessionId, firing: this.fireCount });
    void this.options.onFire(sessionId).catch((error) => {
      this.log.error('hour transition failed', { sessionId, message: errorMessage(error) });
    });
  }
}
