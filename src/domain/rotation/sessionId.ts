const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/** Trimmed id when it is usable in URLs and logs, otherwise null. */
export function normalizeSessionId(raw: string | null | undefined): string | null {
  const trimmed = (raw ?? '').trim();
  return SESSION_ID_PATTERN.test(trimmed) ? trimmed : null;
}
