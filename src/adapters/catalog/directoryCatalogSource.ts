import { parseFile } from 'music-metadata';
import { createLogger } from '@/shared/logging/logger';
import { bestEffort } from '@/shared/bestEffort';
import type { CatalogSourceEntry, CatalogSourcePort } from '@/ports/CatalogSourcePort';
import type { StoragePort } from '@/ports/StoragePort';

export type DurationProbe = (filePath: string) => Promise<number | null>;

const probeWithMusicMetadata: DurationProbe = async (filePath) => {
  const meta = await parseFile(filePath, { duration: true, skipCovers: true });
  const duration = meta.format.duration;
  return typeof duration === 'number' && duration > 0 ? Math.round(duration) : null;
};

/**
 * Enumerates the songs directory once, in name order. Durations are
 * informational; a file whose tags cannot be read is still listed.
 */
export class DirectoryCatalogSource implements CatalogSourcePort {
  private readonly log = createLogger('Catalog', 'Directory');

  constructor(
    private readonly storage: StoragePort,
    private readonly songDir: string,
    private readonly probeDuration: DurationProbe = probeWithMusicMetadata,
  ) {}

  public async list(): Promise<CatalogSourceEntry[]> {
    const files = await this.storage.listFiles(this.songDir);
    const entries: CatalogSourceEntry[] = [];
    for (const file of files) {
      const durationSec = await bestEffort(() => this.probeDuration(file.path), {
        fallback: null,
        onError: 'debug',
        log: this.log,
        label: 'duration probe failed',
        context: { path: file.path },
      });
      entries.push({ name: file.name, path: file.path, durationSec });
    }
    this.log.info('songs directory scanned', { dir: this.songDir, files: entries.length });
    return entries;
  }
}
