import assert from 'node:assert/strict';
import { test } from './testHarness';
import { catalogOf } from './fakes/catalog';
import { DuplicateCatalogKeyError, SongCatalog } from '../src/application/catalog/songCatalog';
import { CatalogMissError } from '../src/domain/rotation/errors';
import type { CatalogSourcePort } from '../src/ports/CatalogSourcePort';

test('catalog keys entries by their three-character prefix', () => {
  const catalog = catalogOf([
    'REA_readme.txt',
    '105_light_rain.mp3',
    'abc.mp3',
    '024_bad_hour.mp3',
    '000_clear_midnight.mp3',
    '12',
  ]);
  assert.equal(catalog.size, 2);
  assert.deepEqual(
    catalog.list().map((entry) => entry.legacyKey),
    ['000', '105'],
  );
  assert.equal(catalog.get({ weather: 'rainy', hour: 5 })?.fileName, '105_light_rain.mp3');
  assert.equal(catalog.get({ weather: 'rainy', hour: 5 })?.path, '/songs/105_light_rain.mp3');
});

test('unknown weather resolves to the clear entry', () => {
  const catalog = catalogOf(['000_clear_midnight.mp3']);
  assert.equal(catalog.get({ weather: 'unknown', hour: 0 })?.fileName, '000_clear_midnight.mp3');
});

test('reserved prefix is configurable', () => {
  const catalog = catalogOf(['README.md', 'REA.txt', '100_rain.mp3'], { reservedPrefix: 'REA' });
  assert.equal(catalog.size, 1);
});

test('require reports the missing key', () => {
  const catalog = catalogOf(['000_clear_midnight.mp3']);
  assert.throws(
    () => catalog.require({ weather: 'snowy', hour: 3 }),
    (error: unknown) => {
      assert.ok(error instanceof CatalogMissError);
      assert.equal(error.legacyKey, '203');
      assert.equal(error.code, 'catalog-miss');
      assert.equal(error.message, 'no catalog entry for key 203');
      return true;
    },
  );
});

test('duplicate keys follow the configured policy', () => {
  const names = ['105_a.mp3', '105_b.mp3'];
  assert.equal(catalogOf(names).get({ weather: 'rainy', hour: 5 })?.fileName, '105_a.mp3');
  assert.equal(
    catalogOf(names, { duplicatePolicy: 'last-wins' }).get({ weather: 'rainy', hour: 5 })?.fileName,
    '105_b.mp3',
  );
  assert.throws(
    () => catalogOf(names, { duplicatePolicy: 'reject' }),
    (error: unknown) => {
      assert.ok(error instanceof DuplicateCatalogKeyError);
      assert.equal(error.message, 'duplicate catalog key 105: 105_a.mp3 and 105_b.mp3');
      return true;
    },
  );
});

test('catalog loads once from its source', async () => {
  let listed = 0;
  const source: CatalogSourcePort = {
    list: async () => {
      listed += 1;
      return [{ name: '206_snow_morning.ogg', path: '/songs/206_snow_morning.ogg', durationSec: 183 }];
    },
  };
  const catalog = await SongCatalog.load(source);
  assert.equal(listed, 1);
  assert.deepEqual(catalog.list(), [
    {
      key: { weather: 'snowy', hour: 6 },
      legacyKey: '206',
      fileName: '206_snow_morning.ogg',
      path: '/songs/206_snow_morning.ogg',
      durationSec: 183,
    },
  ]);
});
