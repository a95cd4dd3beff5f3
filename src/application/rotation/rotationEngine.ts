import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { CatalogMissError, DecodeError, SessionStartError } from '@/domain/rotation/errors';
import {
  createSelectionKey,
  currentSlotHour,
  describeKey,
  sameSelection,
  toLegacyKey,
  type SelectionKey,
} from '@/domain/rotation/selectionKey';
import { weatherDigit } from '@/domain/rotation/weather';
import type { DecodedTrack } from '@/domain/rotation/types';
import type { WeatherCache } from '@/application/weather/weatherCache';
import type { KeyDerivation } from '@/application/rotation/keyDerivation';
import type { RotationSession } from '@/application/rotation/rotationSession';
import type { SessionRegistry } from '@/application/rotation/sessionRegistry';
import type { ClockPort } from '@/ports/ClockPort';
import type { NotifierPort } from '@/ports/NotifierPort';

export interface RotationEngineDeps {
  keys: KeyDerivation;
  weatherCache: WeatherCache;
  registry: SessionRegistry;
  notifier: NotifierPort;
  clock: ClockPort;
  log?: ComponentLogger;
}

function formatHour(hour: number): string {
  return `${String(hour).padStart(2, '0')}:00`;
}

/**
 * Session transitions: priming, the hour boundary and weather drift on loop.
 * Triggers pass a session id; the session is resolved per call and every
 * transition of one session runs through its own queue.
 */
export class RotationEngine {
  private readonly log: ComponentLogger;

  constructor(private readonly deps: RotationEngineDeps) {
    this.log = deps.log ?? createLogger('Rotation', 'Engine');
  }

  /**
   * Installs the first track and queues the next slot. Rejects with
   * `SessionStartError` when the current slot cannot be played.
   */
  public async prime(session: RotationSession): Promise<void> {
    await session.transitions.run(async () => {
      const key = await this.deps.keys.current();
      let track: DecodedTrack;
      try {
        track = await session.buffer.ensureCurrent(key);
      } catch (error) {
        throw new SessionStartError(
          session.id,
          `cannot start ${describeKey(key)}: ${errorMessage(error)}`,
          { cause: error },
        );
      }
      if (session.isClosed) {
        throw new SessionStartError(session.id, 'session closed while priming');
      }
      session.install(key, track, this.deps.clock.now());
      this.deps.weatherCache.markPlaying(key.weather);
      this.log.info('session primed', { sessionId: session.id, key: toLegacyKey(key), source: track.source });
      if (currentSlotHour(this.deps.clock.now()) !== key.hour) {
        this.log.info('hour rolled over while priming', { sessionId: session.id, key: toLegacyKey(key) });
        await this.rotateHour(session);
        return;
      }
      await this.refillLookahead(session);
    });
  }

  public async handleHourBoundary(sessionId: string): Promise<void> {
    const session = this.deps.registry.get(sessionId);
    if (!session) {
      this.log.debug('hour trigger for unknown session', { sessionId });
      return;
    }
    await session.transitions.run(() => this.rotateHour(session));
  }

  public async handleLoop(sessionId: string, handleId: number): Promise<void> {
    const session = this.deps.registry.get(sessionId);
    if (!session) {
      this.log.debug('loop event for unknown session', { sessionId });
      return;
    }
    await session.transitions.run(() => this.checkWeatherDrift(session, handleId));
  }

  private async rotateHour(session: RotationSession): Promise<void> {
    if (session.isClosed) {
      return;
    }
    const key = await this.deps.keys.current();
    this.deps.notifier.notify(session.id, `It is now ${formatHour(key.hour)}.`);

    const front = await session.buffer.takeFront();
    let track: DecodedTrack;
    if (front && sameSelection(front.key, key)) {
      track = front.track;
    } else {
      if (front) {
        this.log.info('discarding stale look-ahead', {
          sessionId: session.id,
          queued: toLegacyKey(front.key),
          current: toLegacyKey(key),
        });
      }
      try {
        track = await session.buffer.ensureCurrent(key);
      } catch (error) {
        this.reportSwapFailure(session, key, error);
        await this.refillLookahead(session);
        return;
      }
    }

    if (session.isClosed) {
      return;
    }
    if (session.activeTrack?.track === track) {
      this.log.debug('hour boundary kept current track', { sessionId: session.id, key: toLegacyKey(key) });
    } else {
      this.swap(session, key, track, 'hour');
    }
    await this.refillLookahead(session);
  }

  private async checkWeatherDrift(session: RotationSession, handleId: number): Promise<void> {
    const active = session.activeTrack;
    if (!active || session.isClosed || active.handle.id !== handleId) {
      return;
    }
    const observed = await this.deps.keys.current();
    if (weatherDigit(observed.weather) === weatherDigit(active.key.weather)) {
      this.log.spam('weather unchanged on loop', { sessionId: session.id, weather: observed.weather });
      return;
    }

    const key = createSelectionKey(observed.weather, active.key.hour);
    this.log.info('weather drift detected', {
      sessionId: session.id,
      from: active.key.weather,
      to: observed.weather,
    });
    let track: DecodedTrack;
    try {
      track = await session.buffer.ensureCurrent(key);
    } catch (error) {
      this.reportSwapFailure(session, key, error);
      return;
    }
    if (session.isClosed || session.activeTrack !== active) {
      return;
    }
    this.swap(session, key, track, 'weather');
    this.deps.notifier.notify(session.id, `Weather changed to ${observed.weather}.`);
  }

  private swap(session: RotationSession, key: SelectionKey, track: DecodedTrack, reason: 'hour' | 'weather'): void {
    const previous = session.activeTrack;
    session.install(key, track, this.deps.clock.now());
    this.deps.weatherCache.markPlaying(key.weather);
    this.log.info('track swapped', {
      sessionId: session.id,
      reason,
      from: previous ? toLegacyKey(previous.key) : null,
      to: toLegacyKey(key),
      source: track.source,
    });
  }

  private reportSwapFailure(session: RotationSession, key: SelectionKey, error: unknown): void {
    if (error instanceof CatalogMissError || error instanceof DecodeError) {
      this.log.warn('swap skipped; keeping previous track', {
        sessionId: session.id,
        key: toLegacyKey(key),
        code: error.code,
        at: new Date(this.deps.clock.now()).toISOString(),
        message: error.message,
      });
      return;
    }
    throw error;
  }

  private async refillLookahead(session: RotationSession): Promise<void> {
    if (session.isClosed || session.buffer.size > 0) {
      return;
    }
    const next = await this.deps.keys.next();
    try {
      await session.buffer.ensureLookahead(next);
    } catch (error) {
      this.log.warn('look-ahead decode failed', {
        sessionId: session.id,
        key: toLegacyKey(next),
        message: errorMessage(error),
      });
    }
  }
}
