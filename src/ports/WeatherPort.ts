import type { Location } from '@/domain/rotation/weather';

export interface WeatherPort {
  /**
   * Returns the provider's numeric condition code for the location.
   * Network failures and malformed payloads reject with `WeatherFetchError`.
   */
  fetchConditionCode(location: Location, apiKey: string): Promise<number>;
}
