import type { CatalogEntry, DecodedTrack } from '@/domain/rotation/types';

export interface DecoderPort {
  /** Rejects with `DecodeError` when the resource cannot be transcoded. */
  decode(entry: CatalogEntry): Promise<DecodedTrack>;
}
