import { SerialQueue } from '@/shared/async/serialQueue';
import { toLegacyKey, type SelectionKey } from '@/domain/rotation/selectionKey';
import type { DecodedTrack } from '@/domain/rotation/types';
import type { WeatherClass } from '@/domain/rotation/weather';
import type { PrefetchBuffer } from '@/application/rotation/prefetchBuffer';
import type { HourScheduler } from '@/application/rotation/hourScheduler';
import type { LoopWeatherMonitor } from '@/application/rotation/loopWeatherMonitor';
import type { PlaybackChannel, PlaybackHandle } from '@/ports/PlaybackSinkPort';

export type SessionState = 'idle' | 'playing';

export interface ActiveTrack {
  readonly key: SelectionKey;
  readonly track: DecodedTrack;
  readonly handle: PlaybackHandle;
  readonly since: number;
}

export interface SessionStatus {
  sessionId: string;
  state: SessionState;
  activeKey: string | null;
  activeSource: string | null;
  playingWeather: WeatherClass | null;
  bufferKeys: string[];
  nextHourAt: string | null;
  listeners: number;
  startedAt: string;
}

export interface RotationSessionParts {
  id: string;
  channel: PlaybackChannel;
  buffer: PrefetchBuffer;
  hourScheduler: HourScheduler;
  loopMonitor: LoopWeatherMonitor;
  startedAt: number;
  volume: number;
}

/**
 * Everything one listening session owns. Created on join, torn down on leave;
 * the active track is replaced on every swap, never mutated.
 */
export class RotationSession {
  public readonly id: string;
  public readonly channel: PlaybackChannel;
  public readonly buffer: PrefetchBuffer;
  public readonly hourScheduler: HourScheduler;
  public readonly loopMonitor: LoopWeatherMonitor;
  public readonly transitions: SerialQueue;
  public readonly startedAt: number;
  private readonly volume: number;
  private active: ActiveTrack | null = null;
  private closed = false;

  constructor(parts: RotationSessionParts) {
    this.id = parts.id;
    this.channel = parts.channel;
    this.buffer = parts.buffer;
    this.hourScheduler = parts.hourScheduler;
    this.loopMonitor = parts.loopMonitor;
    this.startedAt = parts.startedAt;
    this.volume = parts.volume;
    this.transitions = new SerialQueue(`session:${parts.id}`);
  }

  public get state(): SessionState {
    return this.active && !this.closed ? 'playing' : 'idle';
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  public get activeTrack(): ActiveTrack | null {
    return this.active;
  }

  /**
   * Hands `track` to the channel with the session's playback settings and
   * points loop monitoring at the new handle.
   */
  public install(key: SelectionKey, track: DecodedTrack, now: number): ActiveTrack {
    if (this.closed) {
      throw new Error(`session ${this.id} is closed`);
    }
    const handle = this.channel.play(track);
    handle.setVolume(this.volume);
    handle.enableLoop();
    const next: ActiveTrack = { key, track, handle, since: now };
    this.active = next;
    this.loopMonitor.bind(handle.id);
    return next;
  }

  /** Cancels every trigger and releases the channel. Idempotent. */
  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.hourScheduler.stop();
    this.loopMonitor.stop();
    this.channel.close();
    this.active = null;
  }

  public status(): SessionStatus {
    const nextHourAt = this.hourScheduler.getNextFireAt();
    return {
      sessionId: this.id,
      state: this.state,
      activeKey: this.active ? toLegacyKey(this.active.key) : null,
      activeSource: this.active?.track.source ?? null,
      playingWeather: this.active?.key.weather ?? null,
      bufferKeys: this.buffer.keys().map(toLegacyKey),
      nextHourAt: nextHourAt === null ? null : new Date(nextHourAt).toISOString(),
      listeners: this.closed ? 0 : this.channel.listenerCount(),
      startedAt: new Date(this.startedAt).toISOString(),
    };
  }
}
