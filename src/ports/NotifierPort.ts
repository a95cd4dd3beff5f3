/**
 * Human-readable session notifications (swaps, hour changes, availability).
 * Implementations must not throw; delivery problems are theirs to log.
 */
export interface NotifierPort {
  notify: (sessionId: string, message: string) => void;
}
