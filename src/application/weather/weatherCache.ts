import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { SerialQueue } from '@/shared/async/serialQueue';
import { errorMessage } from '@/shared/bestEffort';
import { WeatherFetchError } from '@/domain/rotation/errors';
import { classifyConditionCode, type Location, type WeatherClass } from '@/domain/rotation/weather';
import type { ClockPort } from '@/ports/ClockPort';
import type { WeatherPort } from '@/ports/WeatherPort';

export const DEFAULT_WEATHER_COOLDOWN_MS = 10 * 60 * 1000;

export interface WeatherSnapshot {
  lastFetchAt: number;
  cachedWeather: WeatherClass;
  playingWeather: WeatherClass;
  fetchCount: number;
  lastError: string | null;
}

export interface WeatherCacheOptions {
  cooldownMs?: number;
  initialWeather?: WeatherClass;
  log?: ComponentLogger;
}

/**
 * Cooldown-gated holder of the last fetched classification.
 *
 * One instance is created by the runtime for the configured location and
 * handed to every session; `playingWeather` records the last swap made by any
 * of them and is informational only (sessions compare against their own track).
 */
export class WeatherCache {
  private readonly log: ComponentLogger;
  private readonly lock = new SerialQueue('weather-cache');
  private readonly cooldownMs: number;
  private lastFetchAt = 0;
  private cachedWeather: WeatherClass;
  private playingWeather: WeatherClass;
  private fetchCount = 0;
  private lastError: string | null = null;

  constructor(
    private readonly weather: WeatherPort,
    private readonly clock: ClockPort,
    options: WeatherCacheOptions = {},
  ) {
    this.log = options.log ?? createLogger('Weather', 'Cache');
    this.cooldownMs = options.cooldownMs ?? DEFAULT_WEATHER_COOLDOWN_MS;
    this.cachedWeather = options.initialWeather ?? 'clear';
    this.playingWeather = this.cachedWeather;
  }

  /**
   * Returns the classification for `location`, calling the provider only when
   * the cooldown has elapsed. Provider failures reject with `WeatherFetchError`
   * and leave the cached classification untouched.
   */
  public fetch(location: Location, apiKey: string): Promise<WeatherClass> {
    return this.lock.run(() => this.fetchLocked(location, apiKey));
  }

  public peek(): WeatherSnapshot {
    return {
      lastFetchAt: this.lastFetchAt,
      cachedWeather: this.cachedWeather,
      playingWeather: this.playingWeather,
      fetchCount: this.fetchCount,
      lastError: this.lastError,
    };
  }

  public getCached(): WeatherClass {
    return this.cachedWeather;
  }

  public markPlaying(weather: WeatherClass): void {
    if (weather === this.playingWeather) {
      return;
    }
    this.log.info('playing weather changed', { from: this.playingWeather, to: weather });
    this.playingWeather = weather;
  }

  private async fetchLocked(location: Location, apiKey: string): Promise<WeatherClass> {
    const now = this.clock.now();
    const sinceLastMs = now - this.lastFetchAt;
    if (sinceLastMs <= this.cooldownMs) {
      this.log.spam('weather served from cache', {
        weather: this.cachedWeather,
        sinceLastMin: Math.floor(sinceLastMs / 60_000),
      });
      return this.cachedWeather;
    }

    // Stamp before calling so a failing provider is throttled too.
    this.lastFetchAt = Math.max(this.lastFetchAt, now);
    this.fetchCount += 1;
    this.log.debug('calling weather provider', {
      latitude: location.latitude,
      longitude: location.longitude,
    });

    let code: number;
    try {
      code = await this.weather.fetchConditionCode(location, apiKey);
    } catch (error) {
      this.lastError = errorMessage(error);
      if (error instanceof WeatherFetchError) {
        throw error;
      }
      throw new WeatherFetchError(this.lastError, { cause: error });
    }

    const classified = classifyConditionCode(code);
    this.lastError = null;
    if (classified !== this.cachedWeather) {
      this.log.info('weather classification changed', {
        from: this.cachedWeather,
        to: classified,
        code,
      });
    }
    this.cachedWeather = classified;
    return classified;
  }
}
