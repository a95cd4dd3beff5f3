export type StoreReadOptions = {
  /** Persist `fallback` when nothing is stored yet. */
  writeIfMissing?: boolean;
};

export type StoredFile = {
  name: string;
  path: string;
};

export interface StoragePort {
  /** Stored JSON value, unvalidated; `fallback` when absent or unparseable. */
  readJson(path: string, fallback: unknown, options?: StoreReadOptions): Promise<unknown>;
  writeJson(path: string, data: unknown): Promise<void>;
  /** Regular files directly inside `dirPath`, sorted by name. Missing directories list as empty. */
  listFiles(dirPath: string): Promise<StoredFile[]>;
}
