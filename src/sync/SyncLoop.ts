/**
 * Sync Loop
 *
 * One cycle: sample the TV, decide the next phase, and (when there is a picture)
 * push mixed and smoothed colors to the bridge. Each cycle returns the next state
 * and how long to wait before the following one.
 *
 *   WaitingForDevice -> Streaming | Idle | Terminated
 *   Streaming        -> Idle | Disconnected | Terminated
 *   Idle             -> Streaming | Disconnected | Terminated
 *   Disconnected     -> Streaming | Idle | Terminated
 */

import { setTimeout as sleep } from 'timers/promises';
import { StreamConnectError, StreamSendError, errorMessage } from '../errors';
import { createLogger, isLevelEnabled } from '../logging/logger';
import { SmoothingFilter } from '../mapping/SmoothingFilter';
import { mix } from '../mapping/ZoneMixer';
import type { StreamSessionManager } from '../streaming/StreamSessionManager';
import type { ColorSampleSource, SampleOutcome } from '../tv/ColorSampleSource';
import { ExitCode, type Fixture, type FixtureColor, type SyncPhase, type SyncTiming, type ZoneFrame } from '../types';
import { StatusReporter } from './StatusReporter';

const log = createLogger('SyncLoop');

export interface SyncState {
  readonly phase: SyncPhase;
  readonly consecutiveErrors: number;
  readonly everConnected: boolean;
  readonly startedAt: number;
  readonly blackSince: number | null;
  readonly lostSince: number | null;
  readonly connectFailures: number;
  readonly exitCode: ExitCode | null;
}

export interface CycleResult {
  state: SyncState;
  delayMs: number;
}

export interface Clock {
  now(): number;
  /** Resolves early, without throwing, when the signal aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    sleep(ms, undefined, { signal }).catch((error: unknown) => {
      if (signal?.aborted) return;
      throw error;
    }),
};

export type SampleSource = Pick<ColorSampleSource, 'sample' | 'isBlackScreen' | 'getPowerState'>;

export interface SyncLoopOptions {
  source: SampleSource;
  session: StreamSessionManager;
  fixtures: readonly Fixture[];
  timing: SyncTiming;
  transitionSmoothing: number;
  clock?: Clock;
}

export function initialSyncState(now: number): SyncState {
  return {
    phase: 'WaitingForDevice',
    consecutiveErrors: 0,
    everConnected: false,
    startedAt: now,
    blackSince: null,
    lostSince: null,
    connectFailures: 0,
    exitCode: null,
  };
}

export class SyncLoop {
  private readonly source: SampleSource;
  private readonly session: StreamSessionManager;
  private readonly fixtures: readonly Fixture[];
  private readonly timing: SyncTiming;
  private readonly clock: Clock;
  private readonly smoothing: SmoothingFilter;

  constructor(options: SyncLoopOptions) {
    this.source = options.source;
    this.session = options.session;
    this.fixtures = options.fixtures;
    this.timing = options.timing;
    this.clock = options.clock ?? systemClock;
    this.smoothing = new SmoothingFilter(options.fixtures, options.transitionSmoothing);
  }

  /**
   * Run until terminated or aborted. The session is always closed on the way out.
   */
  async run(signal: AbortSignal): Promise<ExitCode> {
    let state = initialSyncState(this.clock.now());
    const status = new StatusReporter(this.timing.statusIntervalS, state.startedAt);
    log.info('Waiting for TV...');

    try {
      while (!signal.aborted) {
        const result = await this.cycle(state, signal);
        state = result.state;
        if (state.phase === 'Terminated' || signal.aborted) break;

        status.report(state, this.session.getStats().frameCount, this.clock.now());
        await this.clock.sleep(result.delayMs, signal);
      }
    } finally {
      await this.session.close();
    }

    if (signal.aborted && state.phase !== 'Terminated') {
      log.info('Shutting down');
    }
    return state.exitCode ?? ExitCode.Ok;
  }

  async cycle(state: SyncState, signal?: AbortSignal): Promise<CycleResult> {
    const now = this.clock.now();
    const outcome = await this.source.sample(signal);

    // A cancelled request is not a device failure
    if (signal?.aborted) {
      return { state, delayMs: 0 };
    }

    if (outcome.kind !== 'frame') {
      return this.onSampleFailure(state, outcome, now);
    }

    const connected = this.onSampleSuccess(state);
    if (this.source.isBlackScreen(outcome.frame)) {
      return this.onBlackFrame(connected, state.phase, now);
    }
    return this.onPictureFrame(connected, outcome.frame);
  }

  private onSampleSuccess(state: SyncState): SyncState {
    if (state.phase === 'WaitingForDevice') {
      log.info('TV found');
    } else if (state.phase === 'Disconnected') {
      log.info(`TV is back after ${state.consecutiveErrors} failed sample(s)`);
    }
    return { ...state, consecutiveErrors: 0, everConnected: true, lostSince: null };
  }

  private async onSampleFailure(
    state: SyncState,
    outcome: Exclude<SampleOutcome, { kind: 'frame' }>,
    now: number
  ): Promise<CycleResult> {
    const { timing } = this;
    const consecutiveErrors = state.consecutiveErrors + 1;
    const delayMs = timing.runtimeErrorThreshold === 0 ? timing.idleRefreshRateMs : timing.errorBackoffMs;
    log.debug(`Sample failed (${outcome.kind}, #${consecutiveErrors}): ${outcome.error.message}`);

    if (state.phase === 'WaitingForDevice') {
      const waitedMs = now - state.startedAt;
      if (timing.waitForStartupS > 0 && waitedMs >= timing.waitForStartupS * 1000) {
        log.error(`No TV found after ${timing.waitForStartupS}s: ${outcome.error.message}`);
        return this.terminate(state, ExitCode.DeviceNeverFound);
      }
      return { state: { ...state, consecutiveErrors }, delayMs };
    }

    if (state.everConnected && timing.runtimeErrorThreshold > 0 && consecutiveErrors >= timing.runtimeErrorThreshold) {
      log.error(`TV lost, giving up after ${consecutiveErrors} consecutive failures: ${outcome.error.message}`);
      return this.terminate(state, ExitCode.DeviceLost);
    }

    let lostSince = state.lostSince;
    if (state.phase !== 'Disconnected') {
      lostSince = now;
      if (outcome.kind === 'unreachable') {
        log.warn(`TV is unreachable, device lost: ${outcome.error.message}`);
      } else {
        log.warn(`TV stopped answering, device lost: ${outcome.error.message}`);
      }
    }

    if (
      lostSince !== null &&
      now - lostSince >= timing.blackScreenTimeoutS * 1000 &&
      this.session.state !== 'Closed'
    ) {
      log.info(`TV gone for ${timing.blackScreenTimeoutS}s, releasing entertainment area`);
      await this.session.close();
    }

    return {
      state: { ...state, phase: 'Disconnected', consecutiveErrors, lostSince, blackSince: null },
      delayMs,
    };
  }

  private async onBlackFrame(state: SyncState, previousPhase: SyncPhase, now: number): Promise<CycleResult> {
    const { timing } = this;
    const blackSince = state.blackSince ?? now;
    const idle: CycleResult = {
      state: { ...state, phase: 'Idle', blackSince },
      delayMs: timing.idleRefreshRateMs,
    };

    if (previousPhase === 'Idle') {
      return idle;
    }

    const sessionClosed = this.session.state === 'Closed';
    if (sessionClosed && (previousPhase === 'WaitingForDevice' || previousPhase === 'Disconnected')) {
      log.info('Screen is black, idling');
      return idle;
    }

    const blackForMs = now - blackSince;
    if (blackForMs >= timing.blackScreenTimeoutS * 1000) {
      log.info(`Screen black for ${timing.blackScreenTimeoutS}s, idling`);
      await this.session.close();
      return idle;
    }

    if (blackForMs >= timing.powerCheckAfterS * 1000) {
      const powerState = await this.source.getPowerState();
      if (powerState !== null && powerState !== 'On') {
        log.info(`TV power state is ${powerState}, idling`);
        await this.session.close();
        return idle;
      }
    }

    return {
      state: { ...state, phase: 'Streaming', blackSince },
      delayMs: timing.idleRefreshRateMs,
    };
  }

  private async onPictureFrame(state: SyncState, frame: ZoneFrame): Promise<CycleResult> {
    const { timing } = this;
    if (state.phase === 'Idle') {
      log.info('Picture is back, resuming');
    }

    const streaming: SyncState = { ...state, phase: 'Streaming', blackSince: null };

    let handle = this.session.currentHandle();
    if (!handle) {
      try {
        handle = await this.session.open();
      } catch (error) {
        if (!(error instanceof StreamConnectError)) throw error;

        const connectFailures = state.connectFailures + 1;
        if (connectFailures === 1) {
          log.warn(`${error.message}; retrying every ${timing.errorBackoffMs}ms`);
        } else {
          log.debug(`Connect attempt #${connectFailures} failed: ${error.message}`);
        }
        return { state: { ...streaming, connectFailures }, delayMs: timing.errorBackoffMs };
      }
    }

    const colors = mix(frame, this.fixtures).map((color) => this.smoothing.apply(color));
    if (isLevelEnabled('debug')) {
      log.debug(formatColors(colors));
    }

    try {
      await this.session.send(handle, colors);
    } catch (error) {
      if (!(error instanceof StreamSendError)) throw error;
      log.debug(`Send failed (${error.kind}): ${errorMessage(error)}`);
    }

    return { state: { ...streaming, connectFailures: 0 }, delayMs: timing.refreshRateMs };
  }

  private terminate(state: SyncState, exitCode: ExitCode): CycleResult {
    return { state: { ...state, phase: 'Terminated', exitCode }, delayMs: 0 };
  }
}

function formatColors(colors: readonly FixtureColor[]): string {
  return colors
    .map(({ fixture, color }) => `${fixture}=(${color.map((c) => Math.round(c)).join(',')})`)
    .join(' ');
}
