import type { LogLevel } from '@/types/logLevel';
import type { DuplicateKeyPolicy } from '@/domain/rotation/types';

export interface LocationConfig {
  latitude: number;
  longitude: number;
}

export interface WeatherConfig {
  apiKey: string;
  apiUrl: string;
  cooldownMinutes: number;
  requestTimeoutMs: number;
}

export interface CatalogConfig {
  /** Directory scanned once at startup; relative paths resolve from the working directory. */
  songDir: string;
  /** File-name prefix that is never ingested (placeholder/readme files). */
  reservedPrefix: string;
  duplicatePolicy: DuplicateKeyPolicy;
}

export interface PlaybackConfig {
  /** Normalized gain applied on every swap (1 = unchanged). */
  volume: number;
  sampleRate: number;
  channels: number;
  /** Added after the top of the hour so the hour trigger never fires early. */
  hourOffsetMs: number;
  /** Pacing interval of the stream sink. */
  tickMs: number;
}

export interface LoggingConfig {
  consoleLevel: LogLevel;
  json: boolean;
}

export interface RotationServerConfig {
  location: LocationConfig;
  weather: WeatherConfig;
  catalog: CatalogConfig;
  playback: PlaybackConfig;
  logging: LoggingConfig;
  updatedAt: string;
}
