import { createLogger } from '../logging/logger';
import type { SyncState } from './SyncLoop';

const log = createLogger('Status');

/**
 * Periodic one-line summary of what the engine is doing
 */
export class StatusReporter {
  private readonly intervalMs: number;
  private lastReportAt: number;
  private lastFrameCount = 0;

  constructor(intervalS: number, now: number) {
    this.intervalMs = intervalS * 1000;
    this.lastReportAt = now;
  }

  /**
   * Log when the interval has elapsed. Returns the line that was logged, if any.
   */
  report(state: SyncState, frameCount: number, now: number): string | null {
    if (this.intervalMs <= 0 || now - this.lastReportAt < this.intervalMs) {
      return null;
    }

    const elapsedS = (now - this.lastReportAt) / 1000;
    const frames = frameCount - this.lastFrameCount;
    this.lastReportAt = now;
    this.lastFrameCount = frameCount;

    const line = describe(state, frames / elapsedS, now);
    log.info(line);
    return line;
  }
}

function describe(state: SyncState, fps: number, now: number): string {
  switch (state.phase) {
    case 'Streaming':
      return `Streaming at ${fps.toFixed(1)} fps`;
    case 'Idle':
      return 'Idle, screen is black';
    case 'WaitingForDevice':
      return `Waiting for TV (${Math.round((now - state.startedAt) / 1000)}s)`;
    case 'Disconnected':
      return `TV unreachable for ${Math.round((now - (state.lostSince ?? now)) / 1000)}s`;
    case 'Terminated':
      return 'Stopped';
  }
}
