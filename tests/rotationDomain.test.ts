import assert from 'node:assert/strict';
import { test } from './testHarness';
import {
  classifyConditionCode,
  weatherDigit,
  weatherFromDigit,
} from '../src/domain/rotation/weather';
import {
  createSelectionKey,
  currentSlotHour,
  describeKey,
  nextHourBoundary,
  nextSlotHour,
  parseLegacyKey,
  sameSelection,
  toLegacyKey,
} from '../src/domain/rotation/selectionKey';
import { normalizeSessionId } from '../src/domain/rotation/sessionId';

test('condition codes classify by leading digit', () => {
  const cases: Array<[number | string, string]> = [
    [200, 'rainy'],
    [311, 'rainy'],
    [502, 'rainy'],
    [601, 'snowy'],
    [741, 'unknown'],
    [800, 'clear'],
    [804, 'clear'],
    [900, 'unknown'],
    ['803', 'clear'],
    ['', 'unknown'],
  ];
  for (const [code, expected] of cases) {
    assert.equal(classifyConditionCode(code), expected, `code ${code}`);
  }
});

test('clear and unknown share weather digit 0', () => {
  assert.equal(weatherDigit('clear'), 0);
  assert.equal(weatherDigit('unknown'), 0);
  assert.equal(weatherDigit('rainy'), 1);
  assert.equal(weatherDigit('snowy'), 2);
  assert.equal(weatherFromDigit(0), 'clear');
});

test('every weather and hour formats as a three-digit key', () => {
  for (const weather of ['clear', 'rainy', 'snowy', 'unknown'] as const) {
    for (let hour = 0; hour < 24; hour += 1) {
      const legacy = toLegacyKey(createSelectionKey(weather, hour));
      assert.match(legacy, /^[012]([01]\d|2[0-3])$/);
    }
  }
  assert.equal(toLegacyKey({ weather: 'rainy', hour: 5 }), '105');
  assert.equal(toLegacyKey({ weather: 'unknown', hour: 7 }), '007');
  assert.equal(toLegacyKey({ weather: 'snowy', hour: 23 }), '223');
});

test('hour outside 0..23 is rejected', () => {
  assert.throws(() => createSelectionKey('clear', 24), RangeError);
  assert.throws(() => createSelectionKey('clear', -1), RangeError);
  assert.throws(() => createSelectionKey('clear', 1.5), RangeError);
});

test('legacy key parsing accepts only catalog prefixes', () => {
  assert.deepEqual(parseLegacyKey('105'), { weather: 'rainy', hour: 5 });
  assert.deepEqual(parseLegacyKey('223'), { weather: 'snowy', hour: 23 });
  assert.equal(parseLegacyKey('024'), null);
  assert.equal(parseLegacyKey('300'), null);
  assert.equal(parseLegacyKey('1a5'), null);
  assert.equal(parseLegacyKey('REA'), null);
});

test('selection equality follows the catalog key', () => {
  assert.equal(sameSelection({ weather: 'clear', hour: 5 }, { weather: 'unknown', hour: 5 }), true);
  assert.equal(sameSelection({ weather: 'clear', hour: 5 }, { weather: 'rainy', hour: 5 }), false);
  assert.equal(sameSelection({ weather: 'clear', hour: 5 }, { weather: 'clear', hour: 6 }), false);
  assert.equal(describeKey({ weather: 'rainy', hour: 5 }), '105 (rainy, 05:00)');
});

test('slot hours follow local wall-clock time', () => {
  const halfPastFive = new Date(2026, 0, 1, 5, 30).getTime();
  assert.equal(currentSlotHour(halfPastFive), 5);
  assert.equal(nextSlotHour(halfPastFive), 6);
  assert.equal(nextSlotHour(new Date(2026, 0, 1, 23, 30).getTime()), 0);
});

test('next hour boundary lands just after the top of the hour', () => {
  const now = new Date(2026, 0, 1, 5, 30).getTime();
  const boundary = nextHourBoundary(now, 500);
  assert.equal(boundary, new Date(2026, 0, 1, 6, 0, 0, 500).getTime());
  assert.equal(boundary - now, 1_800_500);
  const exactly = new Date(2026, 0, 1, 6, 0).getTime();
  assert.equal(nextHourBoundary(exactly), new Date(2026, 0, 1, 7, 0).getTime());
});

test('session ids are trimmed and restricted to url-safe characters', () => {
  assert.equal(normalizeSessionId('  guild-1 '), 'guild-1');
  assert.equal(normalizeSessionId('a_b-C9'), 'a_b-C9');
  assert.equal(normalizeSessionId(''), null);
  assert.equal(normalizeSessionId('has space'), null);
  assert.equal(normalizeSessionId('x'.repeat(65)), null);
  assert.equal(normalizeSessionId(undefined), null);
});
