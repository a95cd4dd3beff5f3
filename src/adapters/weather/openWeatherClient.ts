import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { WeatherFetchError } from '@/domain/rotation/errors';
import type { Location } from '@/domain/rotation/weather';
import type { WeatherPort } from '@/ports/WeatherPort';

export type FetchFn = (input: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export interface OpenWeatherClientOptions {
  apiUrl: string;
  timeoutMs: number;
  fetchFn?: FetchFn;
}

/**
 * OpenWeatherMap current-weather client. Only the first condition id of the
 * payload is read.
 */
export class OpenWeatherClient implements WeatherPort {
  private readonly log = createLogger('Weather', 'OpenWeather');
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: OpenWeatherClientOptions) {
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  public buildUrl(location: Location, apiKey: string): string {
    const params = new URLSearchParams({
      lat: String(location.latitude),
      lon: String(location.longitude),
      appid: apiKey,
    });
    return `${this.options.apiUrl}weather?${params.toString()}`;
  }

  public async fetchConditionCode(location: Location, apiKey: string): Promise<number> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    timeout.unref();
    let payload: unknown;
    try {
      const response = await this.fetchFn(this.buildUrl(location, apiKey), { signal: controller.signal });
      if (!response.ok) {
        throw new WeatherFetchError(`weather provider responded ${response.status}`, {
          status: response.status,
        });
      }
      payload = await response.json();
    } catch (error) {
      if (error instanceof WeatherFetchError) {
        throw error;
      }
      const message = controller.signal.aborted
        ? `weather request timed out after ${this.options.timeoutMs}ms`
        : `weather request failed: ${errorMessage(error)}`;
      throw new WeatherFetchError(message, { cause: error });
    } finally {
      clearTimeout(timeout);
    }

    const code = extractConditionCode(payload);
    if (code === null) {
      throw new WeatherFetchError('weather payload has no condition id');
    }
    this.log.debug('weather condition received', { code });
    return code;
  }
}

export function extractConditionCode(payload: unknown): number | null {
  if (typeof payload !== 'object' || payload === null || !('weather' in payload)) {
    return null;
  }
  const conditions = payload.weather;
  if (!Array.isArray(conditions) || conditions.length === 0) {
    return null;
  }
  const first: unknown = conditions[0];
  if (typeof first !== 'object' || first === null || !('id' in first)) {
    return null;
  }
  const id = first.id;
  return typeof id === 'number' && Number.isInteger(id) ? id : null;
}
