import assert from 'node:assert/strict';
import type { Readable } from 'node:stream';
import { test } from './testHarness';
import { ManualClock, ManualTimers, settle } from './fakes/clock';
import { LoopingStreamSink } from '../src/adapters/audio/loopingStreamSink';
import { applyGain, buildWavHeader, bytesForDuration } from '../src/adapters/audio/pcm';
import type { DecodedTrack } from '../src/domain/rotation/types';

const format = { sampleRate: 8000, channels: 1, bitDepth: 16 } as const;

function pcmTrack(samples: number, value: number): DecodedTrack {
  const data = Buffer.alloc(samples * 2);
  for (let offset = 0; offset < data.length; offset += 2) {
    data.writeInt16LE(value, offset);
  }
  return {
    key: { weather: 'clear', hour: 5 },
    source: '005_clear.mp3',
    data,
    format: { ...format },
    durationMs: (samples / format.sampleRate) * 1000,
  };
}

function createSink() {
  const clock = new ManualClock(0);
  const timers = new ManualTimers(clock);
  const sink = new LoopingStreamSink({ sampleRate: 8000, channels: 1, tickMs: 100, timers });
  return { timers, sink };
}

function collect(stream: Readable): Buffer[] {
  const chunks: Buffer[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk));
  return chunks;
}

test('sink paces one tick of audio per interval', async () => {
  const { timers, sink } = createSink();
  const channel = sink.open('guild-1');
  const chunks = collect(channel.subscribe());
  channel.play(pcmTrack(4000, 100));
  assert.equal(timers.active().length, 1);
  assert.equal(channel.listenerCount(), 1);

  timers.advance(100);
  await settle();
  assert.deepEqual(chunks.map((chunk) => chunk.length), [1600]);

  timers.advance(200);
  await settle();
  assert.equal(channel.totalBytesWritten, 4800);
});

test('looping track wraps and reports each loop', async () => {
  const { timers, sink } = createSink();
  const channel = sink.open('guild-1');
  const handle = channel.play(pcmTrack(2000, 100));
  handle.enableLoop();
  const looped: number[] = [];
  channel.onLooped((loopedHandle) => looped.push(loopedHandle.id));

  timers.advance(200);
  assert.deepEqual(looped, []);
  timers.advance(100);
  assert.deepEqual(looped, [handle.id]);
  assert.equal(channel.playing, handle);
});

test('track without loop stops at its end', () => {
  const { timers, sink } = createSink();
  const channel = sink.open('guild-1');
  channel.play(pcmTrack(2000, 100));
  timers.advance(300);
  assert.equal(channel.playing, null);
  assert.equal(channel.totalBytesWritten, 4000);
  timers.advance(300);
  assert.equal(channel.totalBytesWritten, 4000);
});

test('volume and mute scale the broadcast samples', async () => {
  const { timers, sink } = createSink();
  const channel = sink.open('guild-1');
  const chunks = collect(channel.subscribe());
  const handle = channel.play(pcmTrack(4000, 1000));
  handle.setVolume(0.5);

  timers.advance(100);
  channel.setMuted(true);
  timers.advance(100);
  await settle();

  assert.equal(chunks[0]?.readInt16LE(0), 500);
  assert.equal(chunks[1]?.readInt16LE(0), 0);
  assert.equal(channel.isMuted(), true);
});

test('play replaces the track and hands out fresh handle ids', () => {
  const { sink } = createSink();
  const channel = sink.open('guild-1');
  const first = channel.play(pcmTrack(100, 1));
  const second = channel.play(pcmTrack(100, 2));
  assert.equal(second.id, first.id + 1);
  assert.equal(channel.playing, second);
});

test('closing a channel ends subscribers and stops the ticker', async () => {
  const { timers, sink } = createSink();
  const channel = sink.open('guild-1');
  const stream = channel.subscribe();
  let ended = false;
  stream.on('end', () => {
    ended = true;
  });
  stream.resume();
  channel.play(pcmTrack(4000, 1));

  sink.closeAll();
  await settle();
  assert.equal(ended, true);
  assert.equal(channel.isClosed, true);
  assert.equal(timers.active().length, 0);
  assert.equal(sink.getChannel('guild-1'), null);
  assert.throws(() => channel.play(pcmTrack(1, 1)), { message: 'playback channel guild-1 is closed' });
});

test('reopening a session closes its previous channel', () => {
  const { sink } = createSink();
  const first = sink.open('guild-1');
  const second = sink.open('guild-1');
  assert.equal(first.isClosed, true);
  assert.equal(sink.getChannel('guild-1'), second);
});

test('wav header describes an open-ended s16le stream', () => {
  const header = buildWavHeader({ sampleRate: 48000, channels: 2, bitDepth: 16 });
  assert.equal(header.length, 44);
  assert.equal(header.toString('ascii', 0, 4), 'RIFF');
  assert.equal(header.toString('ascii', 8, 12), 'WAVE');
  assert.equal(header.readUInt16LE(22), 2);
  assert.equal(header.readUInt32LE(24), 48000);
  assert.equal(header.readUInt32LE(28), 192000);
  assert.equal(header.readUInt16LE(32), 4);
  assert.equal(header.toString('ascii', 36, 40), 'data');
  assert.equal(header.readUInt32LE(40), 0);
});

test('pcm helpers size and scale samples', () => {
  assert.equal(bytesForDuration({ sampleRate: 48000, channels: 2, bitDepth: 16 }, 100), 19200);
  assert.equal(bytesForDuration(format, 0.01), 2);

  const loud = Buffer.alloc(4);
  loud.writeInt16LE(30000, 0);
  loud.writeInt16LE(-30000, 2);
  assert.equal(applyGain(loud, 1), loud);
  const doubled = applyGain(loud, 2);
  assert.equal(doubled.readInt16LE(0), 32767);
  assert.equal(doubled.readInt16LE(2), -32768);
  assert.deepEqual(applyGain(loud, 0), Buffer.alloc(4));
});
