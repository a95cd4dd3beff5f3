import type { DecodedTrack } from '@/domain/rotation/types';

export interface PlaybackHandle {
  readonly id: number;
  readonly track: DecodedTrack;
  setVolume(volume: number): void;
  enableLoop(): void;
  disableLoop(): void;
}

export type LoopListener = (handle: PlaybackHandle) => void;

/**
 * One session's output. `play` replaces whatever was playing; the loop
 * subscription survives replacements and reports which handle looped.
 */
export interface PlaybackChannel {
  readonly sessionId: string;
  play(track: DecodedTrack): PlaybackHandle;
  onLooped(listener: LoopListener): () => void;
  listenerCount(): number;
  /** Silences output without stopping the loop; the stream keeps its clock. */
  setMuted(muted: boolean): void;
  isMuted(): boolean;
  close(): void;
}

export interface PlaybackSinkPort {
  open(sessionId: string): PlaybackChannel;
}
