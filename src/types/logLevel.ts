export type LogLevel = 'spam' | 'debug' | 'info' | 'warn' | 'error' | 'none';

export const LOG_LEVELS: readonly LogLevel[] = ['spam', 'debug', 'info', 'warn', 'error', 'none'];

const LEVEL_SET: ReadonlySet<string> = new Set(LOG_LEVELS);

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LEVEL_SET.has(value);
}
