import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';

const OPEN = 1;

/** The part of a `ws` socket the registry relies on. */
export interface EventSocket {
  readonly readyState: number;
  send(data: string): void;
}

/**
 * Event subscribers grouped by session id.
 */
export class SessionConnectionRegistry {
  private readonly log = createLogger('Http', 'Events');
  private readonly connections = new Map<string, Set<EventSocket>>();

  public register(sessionId: string, socket: EventSocket): void {
    let sockets = this.connections.get(sessionId);
    if (!sockets) {
      sockets = new Set();
      this.connections.set(sessionId, sockets);
    }
    sockets.add(socket);
    this.log.debug('events client connected', { sessionId, total: sockets.size });
  }

  public unregister(sessionId: string, socket: EventSocket): void {
    const sockets = this.connections.get(sessionId);
    if (!sockets?.delete(socket)) {
      return;
    }
    if (sockets.size === 0) {
      this.connections.delete(sessionId);
    }
    this.log.debug('events client disconnected', { sessionId, total: sockets.size });
  }

  public count(sessionId: string): number {
    return this.connections.get(sessionId)?.size ?? 0;
  }

  /** Returns the number of sockets the payload was handed to. */
  public broadcast(sessionId: string, payload: string): number {
    let delivered = 0;
    for (const socket of this.connections.get(sessionId) ?? []) {
      if (socket.readyState !== OPEN) {
        continue;
      }
      try {
        socket.send(payload);
        delivered += 1;
      } catch (error) {
        this.log.warn('failed to broadcast message', { sessionId, message: errorMessage(error) });
      }
    }
    return delivered;
  }

  public closeAll(): void {
    this.connections.clear();
  }
}
