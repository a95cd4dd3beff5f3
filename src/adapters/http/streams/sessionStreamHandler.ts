import type { IncomingMessage, ServerResponse } from 'node:http';
import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { normalizeSessionId } from '@/domain/rotation/sessionId';
import { buildWavHeader } from '@/adapters/audio/pcm';
import type { LoopingStreamSink } from '@/adapters/audio/loopingStreamSink';

const PATH_PREFIX = '/streams/';

/**
 * Serves `/streams/<sessionId>.wav`: a WAV header followed by the session's
 * live PCM for as long as the client stays connected.
 */
export class SessionStreamHandler {
  private readonly log = createLogger('Http', 'Streams');

  constructor(private readonly sink: LoopingStreamSink) {}

  public matches(pathname: string): boolean {
    return pathname.startsWith(PATH_PREFIX);
  }

  public handle(req: IncomingMessage, res: ServerResponse, pathname: string): void {
    const token = pathname.slice(PATH_PREFIX.length);
    if (!token.endsWith('.wav')) {
      this.notFound(res);
      return;
    }
    const sessionId = normalizeSessionId(token.slice(0, -'.wav'.length));
    const channel = sessionId ? this.sink.getChannel(sessionId) : null;
    if (!sessionId || !channel) {
      this.log.debug('no active session for stream request', { token });
      this.notFound(res);
      return;
    }

    res.writeHead(200, {
      'Content-Type': 'audio/wav',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.write(buildWavHeader(channel.format));

    const audioStream = channel.subscribe();
    audioStream.pipe(res);
    this.log.info('stream client connected', {
      sessionId,
      remoteAddress: req.socket?.remoteAddress ?? null,
      listeners: channel.listenerCount(),
    });

    const dispose = () => {
      audioStream.destroy();
    };
    req.on('close', dispose);
    res.on('close', dispose);
    audioStream.on('error', (error) => {
      this.log.warn('stream pipe error', { sessionId, message: errorMessage(error) });
      dispose();
    });
  }

  private notFound(res: ServerResponse): void {
    res.writeHead(404, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ error: 'stream-not-found' }));
  }
}
