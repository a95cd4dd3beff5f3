import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { isRotationError } from '@/domain/rotation/errors';
import type { WeatherClass } from '@/domain/rotation/weather';
import type { CatalogEntry } from '@/domain/rotation/types';
import type { SongCatalog } from '@/application/catalog/songCatalog';
import type { WeatherCache, WeatherSnapshot } from '@/application/weather/weatherCache';
import { KeyDerivation, type WeatherCredentials } from '@/application/rotation/keyDerivation';
import { PrefetchBuffer } from '@/application/rotation/prefetchBuffer';
import { HourScheduler } from '@/application/rotation/hourScheduler';
import { LoopWeatherMonitor } from '@/application/rotation/loopWeatherMonitor';
import { RotationSession, type SessionStatus } from '@/application/rotation/rotationSession';
import { SessionRegistry } from '@/application/rotation/sessionRegistry';
import { RotationEngine } from '@/application/rotation/rotationEngine';
import type { ClockPort } from '@/ports/ClockPort';
import type { DecoderPort } from '@/ports/DecoderPort';
import type { NotifierPort } from '@/ports/NotifierPort';
import type { PlaybackSinkPort } from '@/ports/PlaybackSinkPort';
import type { TimerPort } from '@/ports/TimerPort';

export type PlayResult =
  | { success: true; status: SessionStatus }
  | { success: false; reason: 'already-playing' | 'session-start-failed'; message: string };

export type MuteResult =
  | { success: true; muted: boolean }
  | { success: false; reason: 'not-found' | 'already-muted' | 'not-muted'; message: string };

export interface CurrentWeather {
  weather: WeatherClass;
  stale: boolean;
  snapshot: WeatherSnapshot;
  error?: string;
}

export interface RotationSettings {
  volume: number;
  hourOffsetMs: number;
  intervalMs?: number;
}

export interface RotationServiceDeps {
  catalog: SongCatalog;
  weatherCache: WeatherCache;
  credentials: WeatherCredentials;
  decoder: DecoderPort;
  sink: PlaybackSinkPort;
  notifier: NotifierPort;
  clock: ClockPort;
  timers: TimerPort;
  settings: RotationSettings;
  log?: ComponentLogger;
}

/**
 * Command facade over the rotation core. Mirrors the listener commands:
 * join/play, leave, mute, unmute, plus read-only status queries.
 */
export class RotationService {
  private readonly log: ComponentLogger;
  private readonly registry = new SessionRegistry();
  private readonly keys: KeyDerivation;
  private readonly engine: RotationEngine;

  constructor(private readonly deps: RotationServiceDeps) {
    this.log = deps.log ?? createLogger('Rotation', 'Service');
    this.keys = new KeyDerivation(deps.weatherCache, deps.clock, deps.credentials);
    this.engine = new RotationEngine({
      keys: this.keys,
      weatherCache: deps.weatherCache,
      registry: this.registry,
      notifier: deps.notifier,
      clock: deps.clock,
    });
  }

  public async play(sessionId: string): Promise<PlayResult> {
    if (this.registry.has(sessionId)) {
      return { success: false, reason: 'already-playing', message: 'Already in same voice channel!' };
    }

    const session = this.createSession(sessionId);
    this.registry.set(session);
    try {
      await this.engine.prime(session);
    } catch (error) {
      this.registry.delete(session);
      session.close();
      this.log.warn('session start failed', {
        sessionId,
        code: isRotationError(error) ? error.code : 'unknown',
        message: errorMessage(error),
      });
      this.deps.notifier.notify(sessionId, 'Error joining the channel');
      return { success: false, reason: 'session-start-failed', message: errorMessage(error) };
    }

    if (session.isClosed) {
      return { success: false, reason: 'session-start-failed', message: 'session left while starting' };
    }
    session.hourScheduler.start();
    const joinedAt = new Date(this.deps.clock.now()).toISOString();
    this.deps.notifier.notify(sessionId, `Joined ${sessionId} at ${joinedAt}.`);
    this.log.info('session joined', { sessionId });
    return { success: true, status: session.status() };
  }

  /** Returns false when the session is not playing. */
  public leave(sessionId: string): boolean {
    const session = this.registry.get(sessionId);
    if (!session) {
      return false;
    }
    this.registry.delete(session);
    session.close();
    void session.buffer.clear();
    this.log.info('session left', { sessionId });
    return true;
  }

  public mute(sessionId: string): MuteResult {
    return this.setMuted(sessionId, true);
  }

  public unmute(sessionId: string): MuteResult {
    return this.setMuted(sessionId, false);
  }

  public status(sessionId: string): SessionStatus | null {
    return this.registry.get(sessionId)?.status() ?? null;
  }

  public listSessions(): SessionStatus[] {
    return this.registry.list().map((session) => session.status());
  }

  public async currentWeather(): Promise<CurrentWeather> {
    const { location, apiKey } = this.deps.credentials;
    try {
      const weather = await this.deps.weatherCache.fetch(location, apiKey);
      return { weather, stale: false, snapshot: this.deps.weatherCache.peek() };
    } catch (error) {
      return {
        weather: this.deps.weatherCache.getCached(),
        stale: true,
        snapshot: this.deps.weatherCache.peek(),
        error: errorMessage(error),
      };
    }
  }

  public listCatalog(): CatalogEntry[] {
    return this.deps.catalog.list();
  }

  public async shutdown(): Promise<void> {
    const sessions = this.registry.list();
    for (const session of sessions) {
      this.leave(session.id);
    }
    await Promise.all(sessions.map((session) => session.transitions.drain()));
  }

  private setMuted(sessionId: string, muted: boolean): MuteResult {
    const session = this.registry.get(sessionId);
    if (!session) {
      return { success: false, reason: 'not-found', message: 'Not in a voice channel' };
    }
    if (session.channel.isMuted() === muted) {
      return muted
        ? { success: false, reason: 'already-muted', message: 'Already muted' }
        : { success: false, reason: 'not-muted', message: 'Not muted' };
    }
    session.channel.setMuted(muted);
    this.deps.notifier.notify(sessionId, muted ? 'Now muted' : 'Unmuted');
    return { success: true, muted };
  }

  private createSession(sessionId: string): RotationSession {
    const { deps } = this;
    const channel = deps.sink.open(sessionId);
    return new RotationSession({
      id: sessionId,
      channel,
      buffer: new PrefetchBuffer(
        deps.catalog,
        deps.decoder,
        createLogger('Rotation', 'Prefetch').withContext({ sessionId }),
      ),
      hourScheduler: new HourScheduler({
        sessionId,
        clock: deps.clock,
        timers: deps.timers,
        offsetMs: deps.settings.hourOffsetMs,
        intervalMs: deps.settings.intervalMs,
        onFire: (id) => this.engine.handleHourBoundary(id),
      }),
      loopMonitor: new LoopWeatherMonitor({
        sessionId,
        channel,
        onLoop: (id, handleId) => this.engine.handleLoop(id, handleId),
      }),
      startedAt: deps.clock.now(),
      volume: deps.settings.volume,
    });
  }
}
