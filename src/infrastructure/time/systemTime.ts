import type { ClockPort } from '@/ports/ClockPort';
import type { TimerHandle, TimerPort } from '@/ports/TimerPort';

/** Wall clock and Node timers behind the rotation's time ports. */
export const systemClock: ClockPort = { now: Date.now };

function handleFor(timer: NodeJS.Timeout, clear: (timer: NodeJS.Timeout) => void): TimerHandle {
  let cancelled = false;
  return {
    cancel: () => {
      if (!cancelled) {
        cancelled = true;
        clear(timer);
      }
    },
  };
}

export const systemTimers: TimerPort = {
  setTimeout: (callback, delayMs) => handleFor(setTimeout(callback, Math.max(0, delayMs)), clearTimeout),
  setInterval: (callback, intervalMs) => handleFor(setInterval(callback, Math.max(1, intervalMs)), clearInterval),
};
