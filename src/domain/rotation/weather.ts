export type WeatherClass = 'clear' | 'rainy' | 'snowy' | 'unknown';

export const WEATHER_CLASSES: readonly WeatherClass[] = ['clear', 'rainy', 'snowy', 'unknown'];

export type WeatherDigit = 0 | 1 | 2;

export interface Location {
  readonly latitude: number;
  readonly longitude: number;
}

/**
 * Classifies a provider condition code by its leading digit.
 * 7xx (atmosphere: mist, haze, dust) is deliberately left unmapped.
 */
export function classifyConditionCode(code: number | string): WeatherClass {
  const leading = String(code).trim().charAt(0);
  switch (leading) {
    case '2':
    case '3':
    case '5':
      return 'rainy';
    case '6':
      return 'snowy';
    case '7':
      return 'unknown';
    case '8':
      return 'clear';
    default:
      return 'unknown';
  }
}

export function weatherDigit(weather: WeatherClass): WeatherDigit {
  switch (weather) {
    case 'rainy':
      return 1;
    case 'snowy':
      return 2;
    case 'clear':
    case 'unknown':
      return 0;
  }
}

export function weatherFromDigit(digit: WeatherDigit): WeatherClass {
  switch (digit) {
    case 1:
      return 'rainy';
    case 2:
      return 'snowy';
    case 0:
      return 'clear';
  }
}

export function isWeatherClass(value: unknown): value is WeatherClass {
  return typeof value === 'string' && (WEATHER_CLASSES as readonly string[]).includes(value);
}
