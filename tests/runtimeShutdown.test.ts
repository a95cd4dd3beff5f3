import assert from 'node:assert/strict';
import { test } from './testHarness';
import { stopAll, stopWithTimeout, type StopLogger } from '../src/runtime/stopWithTimeout';
import { ManualClock, ManualTimers, settle } from './fakes/clock';

type LogEntry = {
  level: 'info' | 'warn' | 'error';
  message: string;
  data?: Record<string, unknown>;
};

function createTestLogger(): { log: StopLogger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const log: StopLogger = {
    info: (message, data) => {
      entries.push({ level: 'info', message, data });
    },
    warn: (message, data) => {
      entries.push({ level: 'warn', message, data });
    },
    error: (message, data) => {
      entries.push({ level: 'error', message, data });
    },
  };
  return { log, entries };
}

function deferred(): { promise: Promise<void>; resolve: () => void; reject: (error: Error) => void } {
  let resolve = () => {};
  let reject: (error: Error) => void = () => {};
  const promise = new Promise<void>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

function virtualTimers(): ManualTimers {
  return new ManualTimers(new ManualClock(0));
}

test('stopWithTimeout logs stopped on clean shutdown and cancels its timer', async () => {
  const { log, entries } = createTestLogger();
  const timers = virtualTimers();
  const result = await stopWithTimeout({ name: 'rotation', stop: async () => {} }, { timeoutMs: 50, timers, log });

  assert.deepEqual(result, { kind: 'stopped' });
  assert.deepEqual(entries, [{ level: 'info', message: 'service rotation stopped', data: undefined }]);
  assert.equal(timers.active().length, 0);
});

test('stopWithTimeout gives up once the timeout elapses', async () => {
  const { log, entries } = createTestLogger();
  const timers = virtualTimers();
  const pending = deferred();
  const stopping = stopWithTimeout({ name: 'rotation', stop: () => pending.promise }, { timeoutMs: 5, timers, log });

  timers.advance(4);
  await settle();
  assert.deepEqual(entries, []);
  timers.advance(1);
  assert.deepEqual(await stopping, { kind: 'timeout' });
  assert.deepEqual(entries, [{ level: 'warn', message: 'service rotation stop timed out', data: { timeoutMs: 5 } }]);

  pending.resolve();
  await settle();
  assert.equal(entries.length, 1);
});

test('stopWithTimeout logs errors on failure', async () => {
  const { log, entries } = createTestLogger();
  const result = await stopWithTimeout(
    { name: 'rotation', stop: async () => { throw new Error('boom'); } },
    { timeoutMs: 50, timers: virtualTimers(), log },
  );

  assert.equal(result.kind, 'error');
  assert.deepEqual(entries, [{ level: 'error', message: 'failed to stop rotation', data: { message: 'boom' } }]);
});

test('stopWithTimeout reports a failure that lands after the timeout', async () => {
  const { log, entries } = createTestLogger();
  const timers = virtualTimers();
  const pending = deferred();
  const stopping = stopWithTimeout({ name: 'sink', stop: () => pending.promise }, { timeoutMs: 5, timers, log });

  timers.advance(5);
  assert.equal((await stopping).kind, 'timeout');
  pending.reject(new Error('late failure'));
  await settle();
  assert.deepEqual(
    entries.map((entry) => [entry.level, entry.message]),
    [
      ['warn', 'service sink stop timed out'],
      ['error', 'failed to stop sink'],
    ],
  );
});

test('stopAll reports each service outcome by name', async () => {
  const { log } = createTestLogger();
  const timers = virtualTimers();
  const hung = deferred();
  const outcome = stopAll(
    [
      { name: 'rotation', stop: async () => {} },
      { name: 'http', stop: () => hung.promise },
      { name: 'stream-sink', stop: async () => { throw new Error('closed twice'); } },
    ],
    { timeoutMs: 100, timers, log },
  );
  await settle();
  timers.advance(100);

  assert.deepEqual(await outcome, { rotation: 'stopped', http: 'timeout', 'stream-sink': 'error' });
});
