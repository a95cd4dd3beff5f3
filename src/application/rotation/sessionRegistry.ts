import type { RotationSession } from '@/application/rotation/rotationSession';

/**
 * Session lookup by id. Triggers keep only the id and resolve the session
 * here at fire time, so a torn-down session simply stops being found.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, RotationSession>();

  public get(sessionId: string): RotationSession | undefined {
    return this.sessions.get(sessionId);
  }

  public has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  public set(session: RotationSession): void {
    this.sessions.set(session.id, session);
  }

  public list(): RotationSession[] {
    return Array.from(this.sessions.values());
  }

  /** Removes the entry only if it still refers to `session`. */
  public delete(session: RotationSession): boolean {
    if (this.sessions.get(session.id) !== session) {
      return false;
    }
    return this.sessions.delete(session.id);
  }
}
