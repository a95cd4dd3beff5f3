import { PassThrough, type Readable } from 'node:stream';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import type { DecodedTrack, PcmFormat } from '@/domain/rotation/types';
import type { TimerHandle, TimerPort } from '@/ports/TimerPort';
import type {
  LoopListener,
  PlaybackChannel,
  PlaybackHandle,
  PlaybackSinkPort,
} from '@/ports/PlaybackSinkPort';
import { applyGain, bytesForDuration } from '@/adapters/audio/pcm';

export interface LoopingStreamSinkOptions {
  sampleRate: number;
  channels: number;
  tickMs: number;
  timers: TimerPort;
  /** Per-subscriber buffer above which chunks are dropped for that listener. */
  highWaterMark?: number;
}

const DEFAULT_SUBSCRIBER_HIGH_WATER = 1024 * 512;

class StreamHandle implements PlaybackHandle {
  public volume = 1;
  public looping = false;
  public offset = 0;

  constructor(
    public readonly id: number,
    public readonly track: DecodedTrack,
  ) {}

  public setVolume(volume: number): void {
    this.volume = Math.max(0, volume);
  }

  public enableLoop(): void {
    this.looping = true;
  }

  public disableLoop(): void {
    this.looping = false;
  }
}

/**
 * Real-time PCM channel for one session. A timer tick copies `tickMs` worth of
 * the playing track to every subscriber; reaching the end either wraps and
 * reports a loop, or stops.
 */
export class LoopingStreamChannel implements PlaybackChannel {
  private readonly subscribers = new Set<PassThrough>();
  private readonly loopListeners = new Set<LoopListener>();
  private readonly chunkBytes: number;
  private current: StreamHandle | null = null;
  private ticker: TimerHandle | null = null;
  private muted = false;
  private closed = false;
  private bytesWritten = 0;

  constructor(
    public readonly sessionId: string,
    public readonly format: PcmFormat,
    private readonly options: LoopingStreamSinkOptions,
    private readonly nextHandleId: () => number,
    private readonly onClose: (channel: LoopingStreamChannel) => void,
    private readonly log: ComponentLogger,
  ) {
    this.chunkBytes = bytesForDuration(format, options.tickMs);
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  public get totalBytesWritten(): number {
    return this.bytesWritten;
  }

  public get playing(): PlaybackHandle | null {
    return this.current;
  }

  public play(track: DecodedTrack): PlaybackHandle {
    if (this.closed) {
      throw new Error(`playback channel ${this.sessionId} is closed`);
    }
    const handle = new StreamHandle(this.nextHandleId(), track);
    this.current = handle;
    this.ensureTicker();
    this.log.debug('track started', { sessionId: this.sessionId, handleId: handle.id, source: track.source });
    return handle;
  }

  public onLooped(listener: LoopListener): () => void {
    this.loopListeners.add(listener);
    return () => {
      this.loopListeners.delete(listener);
    };
  }

  public listenerCount(): number {
    return this.subscribers.size;
  }

  public setMuted(muted: boolean): void {
    this.muted = muted;
  }

  public isMuted(): boolean {
    return this.muted;
  }

  /** Live PCM feed for one HTTP client; ends when the channel closes. */
  public subscribe(): Readable {
    const stream = new PassThrough({ highWaterMark: this.options.highWaterMark ?? DEFAULT_SUBSCRIBER_HIGH_WATER });
    if (this.closed) {
      stream.end();
      return stream;
    }
    this.subscribers.add(stream);
    const remove = () => {
      this.subscribers.delete(stream);
    };
    stream.on('close', remove);
    stream.on('error', remove);
    return stream;
  }

  /** Advances playback by one tick. Driven by the channel's timer. */
  public tick(): void {
    const handle = this.current;
    if (!handle || this.closed) {
      return;
    }
    const chunk = this.nextChunk(handle);
    if (chunk.length === 0) {
      return;
    }
    const gain = this.muted ? 0 : handle.volume;
    this.broadcast(applyGain(chunk, gain));
  }

  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.ticker?.cancel();
    this.ticker = null;
    this.current = null;
    this.loopListeners.clear();
    for (const stream of this.subscribers) {
      stream.end();
    }
    this.subscribers.clear();
    this.onClose(this);
    this.log.debug('channel closed', { sessionId: this.sessionId });
  }

  private ensureTicker(): void {
    if (this.ticker) {
      return;
    }
    this.ticker = this.options.timers.setInterval(() => this.tick(), this.options.tickMs);
  }

  private nextChunk(handle: StreamHandle): Buffer {
    const data = handle.track.data;
    const parts: Buffer[] = [];
    let needed = this.chunkBytes;
    while (needed > 0 && data.length > 0) {
      const end = Math.min(handle.offset + needed, data.length);
      parts.push(data.subarray(handle.offset, end));
      needed -= end - handle.offset;
      handle.offset = end;
      if (handle.offset < data.length) {
        continue;
      }
      if (!handle.looping) {
        this.log.debug('track finished', { sessionId: this.sessionId, handleId: handle.id });
        if (this.current === handle) {
          this.current = null;
        }
        break;
      }
      handle.offset = 0;
      this.emitLooped(handle);
      if (this.current !== handle) {
        break;
      }
    }
    return Buffer.concat(parts);
  }

  private emitLooped(handle: StreamHandle): void {
    for (const listener of this.loopListeners) {
      try {
        listener(handle);
      } catch (error) {
        this.log.warn('loop listener failed', { sessionId: this.sessionId, message: errorMessage(error) });
      }
    }
  }

  private broadcast(chunk: Buffer): void {
    for (const stream of this.subscribers) {
      if (stream.writableLength > stream.writableHighWaterMark) {
        this.log.spam('dropping chunk for slow listener', { sessionId: this.sessionId });
        continue;
      }
      stream.write(chunk);
    }
    this.bytesWritten += chunk.length;
  }
}

/**
 * Playback sink serving each session as a paced, endlessly looping PCM stream.
 */
export class LoopingStreamSink implements PlaybackSinkPort {
  private readonly log = createLogger('Audio', 'StreamSink');
  private readonly channels = new Map<string, LoopingStreamChannel>();
  private readonly format: PcmFormat;
  private handleSeq = 0;

  constructor(private readonly options: LoopingStreamSinkOptions) {
    this.format = { sampleRate: options.sampleRate, channels: options.channels, bitDepth: 16 };
  }

  public open(sessionId: string): LoopingStreamChannel {
    this.channels.get(sessionId)?.close();
    const channel = new LoopingStreamChannel(
      sessionId,
      this.format,
      this.options,
      () => {
        this.handleSeq += 1;
        return this.handleSeq;
      },
      (closed) => {
        if (this.channels.get(closed.sessionId) === closed) {
          this.channels.delete(closed.sessionId);
        }
      },
      this.log,
    );
    this.channels.set(sessionId, channel);
    return channel;
  }

  public getChannel(sessionId: string): LoopingStreamChannel | null {
    return this.channels.get(sessionId) ?? null;
  }

  public closeAll(): void {
    for (const channel of Array.from(this.channels.values())) {
      channel.close();
    }
  }
}
