import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import {
  createSelectionKey,
  currentSlotHour,
  nextSlotHour,
  type SelectionKey,
} from '@/domain/rotation/selectionKey';
import type { Location, WeatherClass } from '@/domain/rotation/weather';
import type { WeatherCache } from '@/application/weather/weatherCache';
import type { ClockPort } from '@/ports/ClockPort';

export type WeatherCredentials = {
  location: Location;
  apiKey: string;
};

/**
 * Turns clock + weather into catalog keys. Never rejects: a failed weather
 * lookup degrades to the last cached classification.
 */
export class KeyDerivation {
  private readonly log: ComponentLogger;

  constructor(
    private readonly weatherCache: WeatherCache,
    private readonly clock: ClockPort,
    private readonly credentials: WeatherCredentials,
    log?: ComponentLogger,
  ) {
    this.log = log ?? createLogger('Rotation', 'Keys');
  }

  public async current(): Promise<SelectionKey> {
    const weather = await this.resolveWeather();
    return createSelectionKey(weather, currentSlotHour(this.clock.now()));
  }

  public async next(): Promise<SelectionKey> {
    const weather = await this.resolveWeather();
    return createSelectionKey(weather, nextSlotHour(this.clock.now()));
  }

  private async resolveWeather(): Promise<WeatherClass> {
    try {
      return await this.weatherCache.fetch(this.credentials.location, this.credentials.apiKey);
    } catch (error) {
      const fallback = this.weatherCache.getCached();
      this.log.warn('weather lookup failed; using cached classification', {
        message: errorMessage(error),
        fallback,
      });
      return fallback;
    }
  }
}
