import type { PcmFormat } from '@/domain/rotation/types';

/**
 * Canonical 44-byte WAV header with zero sizes, for open-ended streams.
 */
export function buildWavHeader(format: PcmFormat): Buffer {
  const { sampleRate, channels, bitDepth } = format;
  const blockAlign = (channels * bitDepth) / 8;
  const byteRate = sampleRate * blockAlign;
  // Use 0 for sizes to indicate streaming/unknown length.
  const dataSize = 0;
  const chunkSize = 36;
  const buffer = Buffer.alloc(44);
  buffer.write('RIFF', 0);
  buffer.writeUInt32LE(chunkSize, 4);
  buffer.write('WAVE', 8);
  buffer.write('fmt ', 12);
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(1, 20);
  buffer.writeUInt16LE(channels, 22);
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(byteRate, 28);
  buffer.writeUInt16LE(blockAlign, 32);
  buffer.writeUInt16LE(bitDepth, 34);
  buffer.write('data', 36);
  buffer.writeUInt32LE(dataSize, 40);
  return buffer;
}

export function frameSize(format: PcmFormat): number {
  return format.channels * (format.bitDepth / 8);
}

/** Bytes covering `ms` of audio, rounded down to whole frames (at least one). */
export function bytesForDuration(format: PcmFormat, ms: number): number {
  const frame = frameSize(format);
  const frames = Math.max(1, Math.floor((format.sampleRate * ms) / 1000));
  return frames * frame;
}

/**
 * Scales signed 16-bit little-endian samples. Returns the input untouched at
 * unity gain and a zeroed buffer at gain 0.
 */
export function applyGain(chunk: Buffer, gain: number): Buffer {
  if (gain === 1) {
    return chunk;
  }
  const out = Buffer.alloc(chunk.length - (chunk.length % 2));
  if (gain <= 0) {
    return out;
  }
  for (let offset = 0; offset < out.length; offset += 2) {
    const scaled = Math.round(chunk.readInt16LE(offset) * gain);
    out.writeInt16LE(Math.max(-32768, Math.min(32767, scaled)), offset);
  }
  return out;
}
