import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { SerialQueue } from '@/shared/async/serialQueue';
import { sameSelection, toLegacyKey, type SelectionKey } from '@/domain/rotation/selectionKey';
import type { DecodedTrack } from '@/domain/rotation/types';
import type { SongCatalog } from '@/application/catalog/songCatalog';
import type { DecoderPort } from '@/ports/DecoderPort';

export interface PrefetchEntry {
  key: SelectionKey;
  track: DecodedTrack;
}

/**
 * Read-ahead cache of decoded tracks: the not-yet-consumed current entry plus
 * at most one look-ahead. Decodes run outside the buffer lock; only the
 * mutations are serialized.
 */
export class PrefetchBuffer {
  private readonly lock = new SerialQueue('prefetch-buffer');
  private readonly entries: PrefetchEntry[] = [];
  private served: PrefetchEntry | null = null;
  private lookaheadInFlight: Promise<void> | null = null;
  private decodeCount = 0;

  constructor(
    private readonly catalog: SongCatalog,
    private readonly decoder: DecoderPort,
    private readonly log: ComponentLogger = createLogger('Rotation', 'Prefetch'),
  ) {}

  public get size(): number {
    return this.entries.length;
  }

  public get decodes(): number {
    return this.decodeCount;
  }

  public keys(): SelectionKey[] {
    return this.entries.map((entry) => entry.key);
  }

  /**
   * Returns the decoded track for `key`: the front entry when it matches
   * (consumed), the entry already handed out when it matches, otherwise a
   * fresh decode. Rejects with `CatalogMissError` or `DecodeError`.
   */
  public async ensureCurrent(key: SelectionKey): Promise<DecodedTrack> {
    const cached = await this.lock.run(() => {
      const front = this.entries[0];
      if (front && sameSelection(front.key, key)) {
        this.entries.shift();
        this.served = front;
        return front.track;
      }
      if (this.served && sameSelection(this.served.key, key)) {
        return this.served.track;
      }
      return null;
    });
    if (cached) {
      this.log.spam('prefetch hit', { key: toLegacyKey(key) });
      return cached;
    }

    this.log.debug('prefetch miss; decoding synchronously', { key: toLegacyKey(key) });
    const track = await this.decode(key);
    await this.lock.run(() => {
      this.served = { key, track };
    });
    return track;
  }

  /** Decodes and queues `nextKey` when the buffer is empty; otherwise a no-op. */
  public async ensureLookahead(nextKey: SelectionKey): Promise<void> {
    if (this.lookaheadInFlight) {
      return this.lookaheadInFlight;
    }
    const empty = await this.lock.run(() => this.entries.length === 0);
    if (!empty) {
      return;
    }
    const pending = this.fillLookahead(nextKey);
    this.lookaheadInFlight = pending;
    try {
      await pending;
    } finally {
      if (this.lookaheadInFlight === pending) {
        this.lookaheadInFlight = null;
      }
    }
  }

  /** Pops the front entry and records it as served. */
  public takeFront(): Promise<PrefetchEntry | null> {
    return this.lock.run(() => {
      const front = this.entries.shift() ?? null;
      if (front) {
        this.served = front;
      }
      return front;
    });
  }

  public clear(): Promise<void> {
    return this.lock.run(() => {
      this.entries.length = 0;
      this.served = null;
    });
  }

  private async fillLookahead(nextKey: SelectionKey): Promise<void> {
    const track = await this.decode(nextKey);
    await this.lock.run(() => {
      if (this.entries.length > 0) {
        this.log.debug('look-ahead already filled; dropping decode', { key: toLegacyKey(nextKey) });
        return;
      }
      this.push({ key: nextKey, track });
    });
  }

  private push(entry: PrefetchEntry): void {
    this.entries.push(entry);
    this.log.debug('prefetched track', {
      key: toLegacyKey(entry.key),
      size: this.entries.length,
    });
  }

  private async decode(key: SelectionKey): Promise<DecodedTrack> {
    const entry = this.catalog.require(key);
    this.decodeCount += 1;
    return this.decoder.decode(entry);
  }
}
