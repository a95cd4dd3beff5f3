import type { StoragePort } from '@/ports/StoragePort';
import { isLogLevel } from '@/types/logLevel';
import type {
  CatalogConfig,
  LocationConfig,
  LoggingConfig,
  PlaybackConfig,
  RotationServerConfig,
  WeatherConfig,
} from '@/domain/config/types';
import type { DuplicateKeyPolicy } from '@/domain/rotation/types';

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration store backed by a JSON file on disk. Every section is
 * normalized on load; missing or invalid fields fall back to defaults and the
 * repaired document is written back.
 */
export class ConfigRepository {
  private config: RotationServerConfig | null = null;

  constructor(
    private readonly storage: StoragePort,
    private readonly configPath: string,
  ) {}

  public async load(): Promise<RotationServerConfig> {
    const fallback = defaultConfig();
    const loaded = await this.storage.readJson(this.configPath, fallback, {
      writeIfMissing: true,
    });
    const normalized = normalizeConfig(loaded);
    this.config = normalized;
    if (serializeConfig(normalized) !== serializeConfig(loaded)) {
      await this.save();
    }
    return normalized;
  }

  public get(): RotationServerConfig {
    if (!this.config) {
      throw new Error('configuration not loaded');
    }
    return this.config;
  }

  public async save(): Promise<void> {
    await this.storage.writeJson(this.configPath, this.get());
  }

  public async update(
    mutator: (config: RotationServerConfig) => void | Promise<void>,
  ): Promise<RotationServerConfig> {
    const current = this.config ?? (await this.load());
    const before = serializeConfig(current);
    await mutator(current);
    const next = normalizeConfig(current);
    if (serializeConfig(next) !== before) {
      next.updatedAt = new Date().toISOString();
    }
    this.config = next;
    await this.save();
    return next;
  }
}

function serializeConfig(config: unknown): string {
  return JSON.stringify(config, (key, value) => (key === 'updatedAt' ? undefined : value));
}

export function defaultConfig(): RotationServerConfig {
  return {
    location: { latitude: 34.221924, longitude: -79.814693 },
    weather: {
      apiKey: '',
      apiUrl: 'https://api.openweathermap.org/data/2.5/',
      cooldownMinutes: 10,
      requestTimeoutMs: 5000,
    },
    catalog: {
      songDir: 'songs',
      reservedPrefix: 'REA',
      duplicatePolicy: 'first-wins',
    },
    playback: {
      volume: 1,
      sampleRate: 48000,
      channels: 2,
      hourOffsetMs: 500,
      tickMs: 100,
    },
    logging: {
      consoleLevel: 'info',
      json: false,
    },
    updatedAt: new Date().toISOString(),
  };
}

export function normalizeConfig(raw: unknown): RotationServerConfig {
  const defaults = defaultConfig();
  const source = isRecord(raw) ? raw : {};
  return {
    location: normalizeLocation(source.location, defaults.location),
    weather: normalizeWeather(source.weather, defaults.weather),
    catalog: normalizeCatalog(source.catalog, defaults.catalog),
    playback: normalizePlayback(source.playback, defaults.playback),
    logging: normalizeLogging(source.logging, defaults.logging),
    updatedAt: typeof source.updatedAt === 'string' ? source.updatedAt : defaults.updatedAt,
  };
}

function numberIn(value: unknown, fallback: number, min: number, max: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value >= min && value <= max
    ? value
    : fallback;
}

function integerIn(value: unknown, fallback: number, min: number, max: number): number {
  const parsed = numberIn(value, fallback, min, max);
  return Number.isInteger(parsed) ? parsed : fallback;
}

function nonEmptyString(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim() ? value.trim() : fallback;
}

function isDuplicatePolicy(value: unknown): value is DuplicateKeyPolicy {
  return value === 'first-wins' || value === 'last-wins' || value === 'reject';
}

function normalizeLocation(raw: unknown, defaults: LocationConfig): LocationConfig {
  const source = isRecord(raw) ? raw : {};
  return {
    latitude: numberIn(source.latitude, defaults.latitude, -90, 90),
    longitude: numberIn(source.longitude, defaults.longitude, -180, 180),
  };
}

function normalizeWeather(raw: unknown, defaults: WeatherConfig): WeatherConfig {
  const source = isRecord(raw) ? raw : {};
  let apiUrl = nonEmptyString(source.apiUrl, defaults.apiUrl);
  if (!apiUrl.endsWith('/')) {
    apiUrl = `${apiUrl}/`;
  }
  return {
    apiKey: typeof source.apiKey === 'string' ? source.apiKey.trim() : defaults.apiKey,
    apiUrl,
    cooldownMinutes: numberIn(source.cooldownMinutes, defaults.cooldownMinutes, 0, 24 * 60),
    requestTimeoutMs: integerIn(source.requestTimeoutMs, defaults.requestTimeoutMs, 100, 120_000),
  };
}

function normalizeCatalog(raw: unknown, defaults: CatalogConfig): CatalogConfig {
  const source = isRecord(raw) ? raw : {};
  return {
    songDir: nonEmptyString(source.songDir, defaults.songDir),
    reservedPrefix: nonEmptyString(source.reservedPrefix, defaults.reservedPrefix),
    duplicatePolicy: isDuplicatePolicy(source.duplicatePolicy)
      ? source.duplicatePolicy
      : defaults.duplicatePolicy,
  };
}

function normalizePlayback(raw: unknown, defaults: PlaybackConfig): PlaybackConfig {
  const source = isRecord(raw) ? raw : {};
  return {
    volume: numberIn(source.volume, defaults.volume, 0, 2),
    sampleRate: integerIn(source.sampleRate, defaults.sampleRate, 8000, 192_000),
    channels: integerIn(source.channels, defaults.channels, 1, 2),
    hourOffsetMs: integerIn(source.hourOffsetMs, defaults.hourOffsetMs, 1, 60_000),
    tickMs: integerIn(source.tickMs, defaults.tickMs, 10, 1000),
  };
}

function normalizeLogging(raw: unknown, defaults: LoggingConfig): LoggingConfig {
  const source = isRecord(raw) ? raw : {};
  return {
    consoleLevel: isLogLevel(source.consoleLevel) ? source.consoleLevel : defaults.consoleLevel,
    json: typeof source.json === 'boolean' ? source.json : defaults.json,
  };
}
