export interface TimerHandle {
  cancel(): void;
}

/**
 * Timer seam so schedulers can be driven by a manual clock in tests.
 */
export interface TimerPort {
  setTimeout(callback: () => void, delayMs: number): TimerHandle;
  setInterval(callback: () => void, intervalMs: number): TimerHandle;
}
