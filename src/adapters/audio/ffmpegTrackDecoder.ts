import { spawn } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import type { Readable } from 'node:stream';
import { createLogger } from '@/shared/logging/logger';
import { isErrnoCode } from '@/shared/utils/file';
import { DecodeError } from '@/domain/rotation/errors';
import { bytesPerSecond, type CatalogEntry, type DecodedTrack, type PcmFormat } from '@/domain/rotation/types';
import type { DecoderPort } from '@/ports/DecoderPort';

/** The part of a child process the decoder reads from. */
export interface DecoderProcess extends EventEmitter {
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnDecoder = (command: string, args: string[]) => DecoderProcess;

export interface FfmpegTrackDecoderOptions {
  sampleRate: number;
  channels: number;
  ffmpegPath?: string;
  timeoutMs?: number;
  spawnProcess?: SpawnDecoder;
}

const DEFAULT_DECODE_TIMEOUT_MS = 120_000;

const spawnFfmpeg: SpawnDecoder = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

/**
 * Transcodes a catalog resource to raw s16le PCM in memory by running ffmpeg
 * to completion.
 */
export class FfmpegTrackDecoder implements DecoderPort {
  private readonly log = createLogger('Audio', 'Decoder');
  private readonly format: PcmFormat;
  private readonly ffmpegPath: string;
  private readonly timeoutMs: number;
  private readonly spawnProcess: SpawnDecoder;

  constructor(options: FfmpegTrackDecoderOptions) {
    this.format = { sampleRate: options.sampleRate, channels: options.channels, bitDepth: 16 };
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_DECODE_TIMEOUT_MS;
    this.spawnProcess = options.spawnProcess ?? spawnFfmpeg;
  }

  public buildArgs(filePath: string): string[] {
    return [
      '-hide_banner',
      '-loglevel',
      'error',
      '-i',
      filePath,
      '-f',
      's16le',
      '-acodec',
      'pcm_s16le',
      '-ar',
      String(this.format.sampleRate),
      '-ac',
      String(this.format.channels),
      'pipe:1',
    ];
  }

  public async decode(entry: CatalogEntry): Promise<DecodedTrack> {
    const startedAt = Date.now();
    const data = await this.run(entry.path);
    const durationMs = Math.round((data.length / bytesPerSecond(this.format)) * 1000);
    this.log.debug('track decoded', {
      key: entry.legacyKey,
      file: entry.fileName,
      bytes: data.length,
      durationMs,
      tookMs: Date.now() - startedAt,
    });
    return { key: entry.key, source: entry.fileName, data, format: this.format, durationMs };
  }

  private run(filePath: string): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let lastStderrLine: string | null = null;
      let settled = false;

      const proc = this.spawnProcess(this.ffmpegPath, this.buildArgs(filePath));

      const finish = (error: DecodeError | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) {
          reject(error);
          return;
        }
        resolve(Buffer.concat(chunks));
      };

      const timer = setTimeout(() => {
        proc.kill('SIGKILL');
        finish(new DecodeError(filePath, `ffmpeg timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);

      proc.stdout.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });

      proc.stderr.on('data', (chunk: Buffer) => {
        const message = chunk.toString().trim();
        if (message) {
          lastStderrLine = message;
          this.log.debug('ffmpeg stderr', { filePath, message });
        }
      });

      proc.on('error', (error: Error) => {
        if (isErrnoCode(error, 'ENOENT')) {
          this.log.error('ffmpeg binary not found', { path: this.ffmpegPath, hint: 'Install ffmpeg and make it available on PATH' });
        }
        finish(new DecodeError(filePath, `ffmpeg failed to start: ${error.message}`, { cause: error }));
      });

      proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (code !== 0) {
          const reason = lastStderrLine ?? (signal ? `signal ${signal}` : `exit code ${code}`);
          finish(new DecodeError(filePath, `ffmpeg could not decode ${filePath}: ${reason}`));
          return;
        }
        if (chunks.length === 0) {
          finish(new DecodeError(filePath, `ffmpeg produced no audio for ${filePath}`));
          return;
        }
        finish(null);
      });
    });
  }
}
