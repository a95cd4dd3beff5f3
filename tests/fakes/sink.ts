import type { DecodedTrack } from '../../src/domain/rotation/types';
import type {
  LoopListener,
  PlaybackChannel,
  PlaybackHandle,
  PlaybackSinkPort,
} from '../../src/ports/PlaybackSinkPort';

export class RecordingHandle implements PlaybackHandle {
  public volume = 1;
  public looping = false;

  constructor(
    public readonly id: number,
    public readonly track: DecodedTrack,
  ) {}

  public setVolume(volume: number): void {
    this.volume = volume;
  }

  public enableLoop(): void {
    this.looping = true;
  }

  public disableLoop(): void {
    this.looping = false;
  }
}

export class RecordingChannel implements PlaybackChannel {
  public readonly played: RecordingHandle[] = [];
  public closed = false;
  public listeners = 0;
  private readonly loopListeners = new Set<LoopListener>();
  private muted = false;

  constructor(
    public readonly sessionId: string,
    private readonly nextId: () => number,
  ) {}

  public get current(): RecordingHandle | null {
    return this.played[this.played.length - 1] ?? null;
  }

  public get loopSubscriptions(): number {
    return this.loopListeners.size;
  }

  public play(track: DecodedTrack): PlaybackHandle {
    const handle = new RecordingHandle(this.nextId(), track);
    this.played.push(handle);
    return handle;
  }

  public onLooped(listener: LoopListener): () => void {
    this.loopListeners.add(listener);
    return () => {
      this.loopListeners.delete(listener);
    };
  }

  /** Reports a loop of `handle`, or of the current handle. */
  public emitLoop(handle: PlaybackHandle | null = this.current): void {
    if (!handle) {
      throw new Error('nothing playing');
    }
    for (const listener of Array.from(this.loopListeners)) {
      listener(handle);
    }
  }

  public listenerCount(): number {
    return this.listeners;
  }

  public setMuted(muted: boolean): void {
    this.muted = muted;
  }

  public isMuted(): boolean {
    return this.muted;
  }

  public close(): void {
    this.closed = true;
    this.loopListeners.clear();
  }
}

export class RecordingSink implements PlaybackSinkPort {
  public readonly channels = new Map<string, RecordingChannel>();
  private seq = 0;

  public open(sessionId: string): RecordingChannel {
    const channel = new RecordingChannel(sessionId, () => {
      this.seq += 1;
      return this.seq;
    });
    this.channels.set(sessionId, channel);
    return channel;
  }

  public channel(sessionId: string): RecordingChannel {
    const channel = this.channels.get(sessionId);
    if (!channel) {
      throw new Error(`no channel opened for ${sessionId}`);
    }
    return channel;
  }
}
