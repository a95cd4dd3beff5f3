import type { ComponentLogger } from '@/shared/logging/logger';

export type BestEffortOptions<T> = {
  fallback: T;
  onError?: 'ignore' | 'debug' | 'warn';
  label?: string;
  context?: Record<string, unknown>;
  log?: ComponentLogger;
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** String `code` of errno and rotation errors; `unknown` for anything else. */
export function errorCode(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return 'unknown';
}

function reportFallback(error: unknown, options: Omit<BestEffortOptions<unknown>, 'fallback'>): void {
  if (!options.log || !options.onError || options.onError === 'ignore') {
    return;
  }
  const label = options.label ?? 'best-effort fallback used';
  const context = { ...options.context, message: errorMessage(error) };
  if (options.onError === 'warn') {
    options.log.warn(label, context);
  } else {
    options.log.debug(label, context);
  }
}

/** Runs `fn`, resolving to `fallback` (and optionally logging) when it throws or rejects. */
export async function bestEffort<T>(
  fn: () => Promise<T>,
  options: BestEffortOptions<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    reportFallback(error, options);
    return options.fallback;
  }
}

export function safeJsonParse(
  raw: string,
  options: Omit<BestEffortOptions<unknown>, 'fallback'> = {},
): unknown {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    reportFallback(error, options);
    return undefined;
  }
}
