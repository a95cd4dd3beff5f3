import assert from 'node:assert/strict';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { test } from './testHarness';
import { MemoryStorage } from './fakes/storage';
import { createRotationHarness } from './fakes/rotationHarness';
import { RotationApiHandler } from '../src/adapters/http/api/rotationApiHandler';
import { readJsonBody, type JsonResponse } from '../src/adapters/http/utils/json';
import { ConfigRepository } from '../src/application/config/configRepository';
import { ConfigAdapter } from '../src/adapters/config/ConfigAdapter';
import { logManager } from '../src/shared/logging/logger';

class FakeRequest extends PassThrough {
  constructor(
    public readonly method: string,
    public readonly url: string,
  ) {
    super();
  }
}

class FakeResponse extends EventEmitter implements JsonResponse {
  public statusCode = 0;
  public headers: Record<string, string> = {};
  public body = '';
  public writableEnded = false;

  public writeHead(status: number, headers: Record<string, string>): this {
    this.statusCode = status;
    this.headers = headers;
    return this;
  }

  public end(data?: string): this {
    this.body = data ?? '';
    this.writableEnded = true;
    this.emit('finish');
    return this;
  }

  public json(): unknown {
    return JSON.parse(this.body);
  }
}

const CONFIG_PATH = '/data/config.json';

async function createApi(files = ['005_clear.mp3'], maxBodyBytes?: number) {
  const harness = createRotationHarness({ files });
  const storage = new MemoryStorage();
  const configPort = new ConfigAdapter(new ConfigRepository(storage, CONFIG_PATH));
  await configPort.load();
  const api = new RotationApiHandler({ service: harness.service, configPort, maxBodyBytes });
  const call = async (method: string, url: string, body?: string): Promise<FakeResponse> => {
    const req = new FakeRequest(method, url);
    const res = new FakeResponse();
    const pending = api.handle(req, res);
    req.end(body);
    await pending;
    return res;
  };
  return { harness, storage, api, call };
}

test('api answers ping and matches only its prefix', async () => {
  const { api, call } = await createApi();
  assert.equal(api.matches('/api'), true);
  assert.equal(api.matches('/api/sessions'), true);
  assert.equal(api.matches('/apis'), false);
  assert.equal(api.matches('/streams/guild-1.wav'), false);

  const res = await call('GET', '/api/ping');
  assert.equal(res.statusCode, 200);
  assert.equal(res.headers['Content-Type'], 'application/json');
  assert.deepEqual(res.json(), { message: 'Pong!' });
});

test('api reports unknown routes and wrong methods', async () => {
  const { call } = await createApi();
  const missing = await call('GET', '/api/nope');
  assert.equal(missing.statusCode, 404);
  assert.deepEqual(missing.json(), { error: 'route-not-found' });

  const wrongMethod = await call('PATCH', '/api/ping');
  assert.equal(wrongMethod.statusCode, 405);
  assert.deepEqual(wrongMethod.json(), { error: 'method-not-allowed' });
});

test('api session lifecycle maps results to status codes', async () => {
  const { call } = await createApi();

  const before = await call('GET', '/api/sessions/guild-1');
  assert.equal(before.statusCode, 404);
  assert.deepEqual(before.json(), { error: 'session-not-found' });

  const joined = await call('POST', '/api/sessions/guild-1/play');
  assert.equal(joined.statusCode, 201);
  assert.deepEqual(
    joined.json(),
    {
      sessionId: 'guild-1',
      state: 'playing',
      activeKey: '005',
      activeSource: '005_clear.mp3',
      playingWeather: 'clear',
      bufferKeys: [],
      nextHourAt: new Date(2026, 0, 1, 6, 0, 0, 500).toISOString(),
      listeners: 0,
      startedAt: new Date(2026, 0, 1, 5, 30).toISOString(),
    },
  );

  const again = await call('POST', '/api/sessions/guild-1/play');
  assert.equal(again.statusCode, 409);
  assert.deepEqual(again.json(), { error: 'already-playing', message: 'Already in same voice channel!' });

  const listed = await call('GET', '/api/sessions/');
  assert.equal(listed.statusCode, 200);
  const sessions = listed.json();
  assert.ok(typeof sessions === 'object' && sessions !== null && 'sessions' in sessions);
  assert.ok(Array.isArray(sessions.sessions));
  assert.equal(sessions.sessions.length, 1);

  const left = await call('DELETE', '/api/sessions/guild-1');
  assert.equal(left.statusCode, 200);
  assert.deepEqual(left.json(), { message: 'Left voice channel' });

  const leftAgain = await call('DELETE', '/api/sessions/guild-1');
  assert.equal(leftAgain.statusCode, 404);
  assert.deepEqual(leftAgain.json(), { error: 'session-not-found', message: 'Not in a voice channel' });
});

test('api reports a failed join as a bad gateway', async () => {
  const { call } = await createApi(['006_clear.mp3']);
  const res = await call('POST', '/api/sessions/guild-1/play');
  assert.equal(res.statusCode, 502);
  assert.deepEqual(res.json(), {
    error: 'session-start-failed',
    message: 'cannot start 005 (clear, 05:00): no catalog entry for key 005',
  });
});

test('api mute and unmute', async () => {
  const { call, harness } = await createApi();
  const notPlaying = await call('POST', '/api/sessions/guild-1/mute');
  assert.equal(notPlaying.statusCode, 404);
  assert.deepEqual(notPlaying.json(), { error: 'not-found', message: 'Not in a voice channel' });

  await call('POST', '/api/sessions/guild-1/play');
  const muted = await call('POST', '/api/sessions/guild-1/mute');
  assert.equal(muted.statusCode, 200);
  assert.deepEqual(muted.json(), { muted: true });
  assert.equal(harness.sink.channel('guild-1').isMuted(), true);

  const twice = await call('POST', '/api/sessions/guild-1/mute');
  assert.equal(twice.statusCode, 409);
  assert.deepEqual(twice.json(), { error: 'already-muted', message: 'Already muted' });

  const unmuted = await call('POST', '/api/sessions/guild-1/unmute');
  assert.deepEqual(unmuted.json(), { muted: false });
});

test('api rejects session ids that are not url-safe', async () => {
  const { call } = await createApi();
  const res = await call('POST', '/api/sessions/bad%20id/play');
  assert.equal(res.statusCode, 400);
  assert.deepEqual(res.json(), { error: 'invalid-session-id' });
});

test('api lists the catalog and the current weather', async () => {
  const { call } = await createApi(['105_rain.mp3', '005_clear.mp3']);
  const catalog = await call('GET', '/api/catalog');
  assert.deepEqual(catalog.json(), {
    entries: [
      { key: '005', weather: 'clear', hour: 5, fileName: '005_clear.mp3', durationSec: null },
      { key: '105', weather: 'rainy', hour: 5, fileName: '105_rain.mp3', durationSec: null },
    ],
  });

  const weather = await call('GET', '/api/weather?fresh=1');
  assert.equal(weather.statusCode, 200);
  const body = weather.json();
  assert.ok(typeof body === 'object' && body !== null && 'weather' in body && 'stale' in body);
  assert.equal(body.weather, 'clear');
  assert.equal(body.stale, false);
});

test('api updates and persists the log level', async () => {
  const { call, storage } = await createApi();
  const previous = logManager.getLevel();
  try {
    const res = await call('PUT', '/api/logging', JSON.stringify({ level: 'warn' }));
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), { level: 'warn' });
    assert.equal(logManager.getLevel(), 'warn');
    const stored = storage.readDocument(CONFIG_PATH);
    assert.ok(typeof stored === 'object' && stored !== null && 'logging' in stored);
    assert.deepEqual(stored.logging, { consoleLevel: 'warn', json: false });
  } finally {
    logManager.configure({ level: previous });
  }
});

test('api rejects bad log level bodies', async () => {
  const { call } = await createApi(['005_clear.mp3'], 32);
  const unknown = await call('PUT', '/api/logging', '{"level":"loud"}');
  assert.equal(unknown.statusCode, 400);
  assert.deepEqual(unknown.json(), { error: 'invalid-log-level' });

  const malformed = await call('PUT', '/api/logging', '{level');
  assert.equal(malformed.statusCode, 400);
  assert.deepEqual(malformed.json(), { error: 'invalid-json' });

  const oversized = await call('PUT', '/api/logging', JSON.stringify({ level: 'debug', padding: 'x'.repeat(64) }));
  assert.equal(oversized.statusCode, 413);
  assert.deepEqual(oversized.json(), { error: 'payload-too-large' });
});

test('empty json body resolves null without a response', async () => {
  const req = new FakeRequest('PUT', '/api/logging');
  const res = new FakeResponse();
  const pending = readJsonBody(req, res);
  req.end();
  assert.equal(await pending, null);
  assert.equal(res.writableEnded, false);
});
