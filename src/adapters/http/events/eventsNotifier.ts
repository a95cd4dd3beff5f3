import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import type { NotifierPort } from '@/ports/NotifierPort';
import type { ClockPort } from '@/ports/ClockPort';
import type { SessionConnectionRegistry } from '@/adapters/http/events/sessionConnectionRegistry';

export interface SessionEvent {
  sessionId: string;
  message: string;
  at: string;
}

export class EventsNotifier implements NotifierPort {
  private readonly log = createLogger('Http', 'Notifier');

  constructor(
    private readonly registry: SessionConnectionRegistry,
    private readonly clock: ClockPort,
  ) {}

  public notify(sessionId: string, message: string): void {
    const event: SessionEvent = {
      sessionId,
      message,
      at: new Date(this.clock.now()).toISOString(),
    };
    try {
      const delivered = this.registry.broadcast(sessionId, JSON.stringify(event));
      this.log.spam('session event broadcast', { sessionId, delivered });
    } catch (error) {
      this.log.warn('session event broadcast failed', { sessionId, message: errorMessage(error) });
    }
    this.log.info(message, { sessionId });
  }
}
