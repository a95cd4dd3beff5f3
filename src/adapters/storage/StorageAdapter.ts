import type { StoragePort, StoreReadOptions, StoredFile } from '@/ports/StoragePort';
import { listRegularFiles, readJson, writeJson } from '@/shared/utils/file';

/** Filesystem-backed storage for the config document and the song directory. */
export class StorageAdapter implements StoragePort {
  public async readJson(filePath: string, fallback: unknown, options?: StoreReadOptions): Promise<unknown> {
    const data = await readJson(filePath);
    if (data !== undefined) {
      return data;
    }
    if (options?.writeIfMissing) {
      await writeJson(filePath, fallback);
    }
    return fallback;
  }

  public writeJson(filePath: string, data: unknown): Promise<void> {
    return writeJson(filePath, data);
  }

  public listFiles(dirPath: string): Promise<StoredFile[]> {
    return listRegularFiles(dirPath);
  }
}
