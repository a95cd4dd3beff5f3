import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { CatalogMissError } from '@/domain/rotation/errors';
import { parseLegacyKey, toLegacyKey, type SelectionKey } from '@/domain/rotation/selectionKey';
import type { CatalogEntry, DuplicateKeyPolicy } from '@/domain/rotation/types';
import type { CatalogSourceEntry, CatalogSourcePort } from '@/ports/CatalogSourcePort';

export const DEFAULT_RESERVED_PREFIX = 'REA';
const KEY_LENGTH = 3;

export interface SongCatalogOptions {
  reservedPrefix?: string;
  duplicatePolicy?: DuplicateKeyPolicy;
  log?: ComponentLogger;
}

export class DuplicateCatalogKeyError extends Error {
  constructor(
    public readonly legacyKey: string,
    public readonly names: [string, string],
  ) {
    super(`duplicate catalog key ${legacyKey}: ${names[0]} and ${names[1]}`);
    this.name = 'DuplicateCatalogKeyError';
  }
}

/**
 * Immutable key -> resource map. Every lookup after `build` sees the same
 * entries; nothing is added or re-scanned while the process runs.
 */
export class SongCatalog {
  private constructor(private readonly entries: ReadonlyMap<string, CatalogEntry>) {}

  public static async load(
    source: CatalogSourcePort,
    options: SongCatalogOptions = {},
  ): Promise<SongCatalog> {
    return SongCatalog.build(await source.list(), options);
  }

  public static build(
    sourceEntries: readonly CatalogSourceEntry[],
    options: SongCatalogOptions = {},
  ): SongCatalog {
    const log = options.log ?? createLogger('Catalog');
    const reservedPrefix = options.reservedPrefix ?? DEFAULT_RESERVED_PREFIX;
    const policy = options.duplicatePolicy ?? 'first-wins';
    const entries = new Map<string, CatalogEntry>();
    let skipped = 0;

    for (const item of sourceEntries) {
      const prefix = item.name.slice(0, KEY_LENGTH);
      if (prefix === reservedPrefix) {
        skipped += 1;
        continue;
      }
      const key = parseLegacyKey(prefix);
      if (!key) {
        skipped += 1;
        log.warn('catalog entry has no valid key prefix', { name: item.name });
        continue;
      }
      const existing = entries.get(prefix);
      if (existing) {
        if (policy === 'reject') {
          throw new DuplicateCatalogKeyError(prefix, [existing.fileName, item.name]);
        }
        const kept = policy === 'first-wins' ? existing.fileName : item.name;
        log.warn('duplicate catalog key', { key: prefix, kept, policy });
        if (policy === 'first-wins') {
          continue;
        }
      }
      entries.set(prefix, {
        key,
        legacyKey: prefix,
        fileName: item.name,
        path: item.path,
        durationSec: item.durationSec,
      });
    }

    log.info('catalog built', { entries: entries.size, skipped });
    return new SongCatalog(entries);
  }

  public get size(): number {
    return this.entries.size;
  }

  public get(key: SelectionKey): CatalogEntry | null {
    return this.entries.get(toLegacyKey(key)) ?? null;
  }

  public require(key: SelectionKey): CatalogEntry {
    const entry = this.get(key);
    if (!entry) {
      throw new CatalogMissError(toLegacyKey(key));
    }
    return entry;
  }

  public list(): CatalogEntry[] {
    return Array.from(this.entries.values()).sort((left, right) =>
      left.legacyKey.localeCompare(right.legacyKey),
    );
  }
}
