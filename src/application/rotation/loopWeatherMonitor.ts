import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import type { PlaybackChannel, PlaybackHandle } from '@/ports/PlaybackSinkPort';

export interface LoopWeatherMonitorOptions {
  sessionId: string;
  channel: PlaybackChannel;
  onLoop: (sessionId: string, handleId: number) => Promise<void>;
  log?: ComponentLogger;
}

/**
 * One persistent loop subscription per session. Track swaps rebind it to the
 * new handle instead of stacking a fresh listener per track.
 */
export class LoopWeatherMonitor {
  private readonly log: ComponentLogger;
  private unsubscribe: (() => void) | null = null;
  private boundHandleId: number | null = null;
  private loopCount = 0;

  constructor(private readonly options: LoopWeatherMonitorOptions) {
    this.log = options.log ?? createLogger('Rotation', 'LoopMonitor');
  }

  public get loops(): number {
    return this.loopCount;
  }

  public get boundHandle(): number | null {
    return this.boundHandleId;
  }

  public get active(): boolean {
    return this.unsubscribe !== null;
  }

  public bind(handleId: number): void {
    this.boundHandleId = handleId;
    if (!this.unsubscribe) {
      this.unsubscribe = this.options.channel.onLooped((handle) => this.handleLooped(handle));
    }
  }

  public stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.boundHandleId = null;
  }

  private handleLooped(handle: PlaybackHandle): void {
    if (handle.id !== this.boundHandleId) {
      this.log.spam('ignoring loop of replaced track', {
        sessionId: this.options.sessionId,
        handleId: handle.id,
      });
      return;
    }
    this.loopCount += 1;
    const { sessionId } = this.options;
    void this.options.onLoop(sessionId, handle.id).catch((error) => {
      this.log.error('weather drift check failed', { sessionId, message: errorMessage(error) });
    });
  }
}
