export type RotationErrorCode =
  | 'catalog-miss'
  | 'weather-fetch-failed'
  | 'decode-failed'
  | 'session-start-failed'
  | 'buffer-full';

export class RotationError extends Error {
  constructor(
    public readonly code: RotationErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CatalogMissError extends RotationError {
  constructor(public readonly legacyKey: string) {
    super('catalog-miss', `no catalog entry for key ${legacyKey}`);
  }
}

export class WeatherFetchError extends RotationError {
  public readonly status: number | null;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('weather-fetch-failed', message, options);
    this.status = options?.status ?? null;
  }
}

export class DecodeError extends RotationError {
  constructor(
    public readonly source: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super('decode-failed', message, options);
  }
}

export class SessionStartError extends RotationError {
  constructor(
    public readonly sessionId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super('session-start-failed', message, options);
  }
}

export function isRotationError(error: unknown): error is RotationError {
  return error instanceof RotationError;
}
