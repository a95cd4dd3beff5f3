import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createLogger } from '@/shared/logging/logger';
import { errorCode, errorMessage, safeJsonParse } from '@/shared/bestEffort';

const log = createLogger('Core', 'File');

export function isErrnoCode(error: unknown, code: string): boolean {
  return errorCode(error) === code;
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Parsed JSON content of `filePath`, or undefined when the file is missing,
 * unreadable or not valid JSON.
 */
export async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (!isErrnoCode(error, 'ENOENT')) {
      log.warn('failed to read json', { filePath, error: errorMessage(error) });
    }
    return undefined;
  }
  const parsed = safeJsonParse(content, {
    onError: 'warn',
    log,
    label: 'failed to parse json',
    context: { filePath },
  });
  return parsed;
}

/**
 * Writes pretty-printed JSON through a sibling temp file and a rename, so a
 * crash mid-write leaves the previous document in place.
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  await fs.rename(tempPath, filePath);
}

/** Regular files directly inside `dirPath`, sorted by name; a missing directory lists as empty. */
export async function listRegularFiles(dirPath: string): Promise<Array<{ name: string; path: string }>> {
  const root = path.resolve(dirPath);
  let dirents;
  try {
    dirents = await fs.readdir(root, { withFileTypes: true });
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) {
      return [];
    }
    throw error;
  }
  return dirents
    .filter((dirent) => dirent.isFile())
    .map((dirent) => ({ name: dirent.name, path: path.join(root, dirent.name) }))
    .sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0));
}
