import type { SelectionKey } from '@/domain/rotation/selectionKey';

export interface PcmFormat {
  sampleRate: number;
  channels: number;
  bitDepth: 16;
}

/** Raw playable resource as found in the catalog source. */
export interface CatalogEntry {
  key: SelectionKey;
  legacyKey: string;
  fileName: string;
  path: string;
  durationSec: number | null;
}

/** Fully decoded track, ready to hand to a playback channel. */
export interface DecodedTrack {
  key: SelectionKey;
  source: string;
  data: Buffer;
  format: PcmFormat;
  durationMs: number;
}

export type DuplicateKeyPolicy = 'first-wins' | 'last-wins' | 'reject';

export function bytesPerSecond(format: PcmFormat): number {
  return format.sampleRate * format.channels * (format.bitDepth / 8);
}
