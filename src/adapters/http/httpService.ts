import http from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Duplex } from 'node:stream';
import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import type { HttpServerConfig } from '@/config/http';
import { RotationApiHandler } from '@/adapters/http/api/rotationApiHandler';
import { SessionStreamHandler } from '@/adapters/http/streams/sessionStreamHandler';
import { EventsGateway } from '@/adapters/http/events/eventsGateway';
import type { SessionConnectionRegistry } from '@/adapters/http/events/sessionConnectionRegistry';
import type { LoopingStreamSink } from '@/adapters/audio/loopingStreamSink';
import type { RotationService } from '@/application/rotation/rotationService';
import type { ConfigPort } from '@/ports/ConfigPort';

/**
 * Hosts the public HTTP gateway (command API, audio streams, event sockets).
 */
export class HttpService {
  private readonly log = createLogger('Http');
  private readonly api: RotationApiHandler;
  private readonly streams: SessionStreamHandler;
  private readonly events: EventsGateway;
  private server?: http.Server;

  constructor(
    private readonly config: HttpServerConfig,
    options: {
      service: RotationService;
      configPort: ConfigPort;
      sink: LoopingStreamSink;
      connections: SessionConnectionRegistry;
    },
  ) {
    this.api = new RotationApiHandler({
      service: options.service,
      configPort: options.configPort,
      maxBodyBytes: config.maxBodyBytes,
    });
    this.streams = new SessionStreamHandler(options.sink);
    this.events = new EventsGateway(options.connections);
  }

  public async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((error) => {
        this.log.error('http request failed', { message: errorMessage(error) });
        if (!res.headersSent) {
          res.writeHead(500, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({ error: 'http-internal-error' }));
        } else {
          res.end();
        }
      });
    });

    server.on('upgrade', (req, socket, head) => {
      this.handleUpgrade(req, socket, head);
    });

    await new Promise<void>((resolve, reject) => {
      server
        .listen(this.config.port, this.config.host, () => {
          this.log.info('http gateway listening', {
            port: this.config.port,
            host: this.config.host,
          });
          resolve();
        })
        .on('error', reject);
    });
    this.server = server;
  }

  public async stop(): Promise<void> {
    this.events.close();
    const server = this.server;
    this.server = undefined;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    this.applyCors(res);

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const pathname = this.normalizePath(req.url ?? '/');

    if (pathname === '/') {
      res.writeHead(302, { Location: '/api/sessions' });
      res.end();
      return;
    }

    if (this.api.matches(pathname)) {
      await this.api.handle(req, res);
      return;
    }

    if (this.streams.matches(pathname)) {
      this.streams.handle(req, res, pathname);
      return;
    }

    res.writeHead(404, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ error: 'not-found' }));
  }

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    if (this.events.handleUpgrade(req, socket, head)) {
      return;
    }
    socket.destroy();
  }

  private applyCors(res: ServerResponse): void {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET,POST,PUT,DELETE,OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    res.setHeader('Cache-Control', 'no-cache');
  }

  private normalizePath(url: string): string {
    const [path] = url.split('?');
    try {
      return decodeURIComponent(path || '/');
    } catch {
      return path || '/';
    }
  }
}
