import { weatherDigit, weatherFromDigit, type WeatherClass, type WeatherDigit } from '@/domain/rotation/weather';

export const HOUR_MS = 60 * 60 * 1000;

/**
 * Structured catalog selector. The three-character form ("105") only exists at
 * the catalog boundary and in messages.
 */
export interface SelectionKey {
  readonly weather: WeatherClass;
  readonly hour: number;
}

const LEGACY_KEY_PATTERN = /^([012])([01]\d|2[0-3])$/;

export function createSelectionKey(weather: WeatherClass, hour: number): SelectionKey {
  if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
    throw new RangeError(`hour out of range: ${hour}`);
  }
  return { weather, hour };
}

export function toLegacyKey(key: SelectionKey): string {
  return `${weatherDigit(key.weather)}${String(key.hour).padStart(2, '0')}`;
}

export function parseLegacyKey(raw: string): SelectionKey | null {
  const match = LEGACY_KEY_PATTERN.exec(raw);
  if (!match) {
    return null;
  }
  const digit: WeatherDigit = match[1] === '1' ? 1 : match[1] === '2' ? 2 : 0;
  return { weather: weatherFromDigit(digit), hour: Number(match[2]) };
}

/** Clear and unknown share a digit, so they select the same entry. */
export function sameSelection(left: SelectionKey, right: SelectionKey): boolean {
  return left.hour === right.hour && weatherDigit(left.weather) === weatherDigit(right.weather);
}

export function currentSlotHour(nowMs: number): number {
  return new Date(nowMs).getHours();
}

export function nextSlotHour(nowMs: number): number {
  const next = new Date(nowMs + HOUR_MS);
  next.setMinutes(0, 0, 0);
  return next.getHours();
}

/** Local wall-clock instant of the next top of the hour, shifted by `offsetMs`. */
export function nextHourBoundary(nowMs: number, offsetMs = 0): number {
  const next = new Date(nowMs + HOUR_MS);
  next.setMinutes(0, 0, 0);
  return next.getTime() + offsetMs;
}

export function describeKey(key: SelectionKey): string {
  return `${toLegacyKey(key)} (${key.weather}, ${String(key.hour).padStart(2, '0')}:00)`;
}
