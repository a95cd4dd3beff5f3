import type { IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer, type WebSocket } from 'ws';
import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { normalizeSessionId } from '@/domain/rotation/sessionId';
import type { SessionConnectionRegistry } from '@/adapters/http/events/sessionConnectionRegistry';

const PATH_PREFIX = '/events/';

/**
 * WebSocket endpoint `/events/<sessionId>`: read-only stream of session notifications.
 */
export class EventsGateway {
  private readonly log = createLogger('Http', 'EventsWs');
  private readonly wsServer = new WebSocketServer({ noServer: true });

  constructor(private readonly registry: SessionConnectionRegistry) {
    this.wsServer.on('connection', (socket, request) => {
      this.handleConnection(socket, request);
    });
  }

  public handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): boolean {
    if (!resolveSessionId(request.url)) {
      return false;
    }
    this.wsServer.handleUpgrade(request, socket, head, (ws) => {
      this.wsServer.emit('connection', ws, request);
    });
    return true;
  }

  public close(): void {
    for (const client of this.wsServer.clients) {
      client.close(1001, 'server-shutdown');
    }
    this.registry.closeAll();
    this.wsServer.close();
  }

  private handleConnection(socket: WebSocket, request: IncomingMessage): void {
    const sessionId = resolveSessionId(request.url);
    if (!sessionId) {
      socket.close(1008, 'missing-session-id');
      return;
    }
    this.registry.register(sessionId, socket);

    socket.on('close', () => {
      this.registry.unregister(sessionId, socket);
    });

    socket.on('error', (error) => {
      this.log.warn('events ws error', { sessionId, message: errorMessage(error) });
      this.registry.unregister(sessionId, socket);
    });
  }
}

export function resolveSessionId(url?: string): string | null {
  const rawPath = (url ?? '').split('?')[0] || '/';
  if (!rawPath.startsWith(PATH_PREFIX)) {
    return null;
  }
  const rawId = rawPath.slice(PATH_PREFIX.length);
  try {
    return normalizeSessionId(decodeURIComponent(rawId));
  } catch {
    return null;
  }
}
