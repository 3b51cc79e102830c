import {
  ConfigurationError,
  TransientSampleError,
  TvTransportError,
  UnreachableDeviceError,
} from '../errors';
import type { ZoneFrame } from '../types';
import { TimeoutError, withTimeout } from '../util/withTimeout';
import type { TvDevice } from './AmbilightTvClient';

export const DEFAULT_BLACK_THRESHOLD = 15;

export type SampleOutcome =
  | { kind: 'frame'; frame: ZoneFrame }
  | { kind: 'transient'; error: TransientSampleError }
  | { kind: 'unreachable'; error: UnreachableDeviceError };

export interface ColorSampleSourceOptions {
  timeoutMs: number;
  zoneCount: number;
  blackThreshold?: number;
}

/**
 * Pulls zone frames from the TV and reports connectivity as a value.
 * No retries happen here; the sync loop owns that policy.
 */
export class ColorSampleSource {
  private readonly device: TvDevice;
  private readonly timeoutMs: number;
  private readonly zoneCount: number;
  private readonly blackThreshold: number;

  constructor(device: TvDevice, options: ColorSampleSourceOptions) {
    this.device = device;
    this.timeoutMs = options.timeoutMs;
    this.zoneCount = options.zoneCount;
    this.blackThreshold = options.blackThreshold ?? DEFAULT_BLACK_THRESHOLD;
  }

  async sample(signal?: AbortSignal): Promise<SampleOutcome> {
    // Aborted on timeout too, so a stalled request does not outlive the sample
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    let frame: ZoneFrame;
    try {
      // Guard on top of the adapter's own timeout so a stalled socket can't hold the loop
      frame = await withTimeout(
        this.device.fetchZoneFrame(this.timeoutMs, controller.signal),
        this.timeoutMs + 100,
        'TV sample'
      );
    } catch (error) {
      if (error instanceof TvTransportError && error.reachability === 'unreachable') {
        return { kind: 'unreachable', error: new UnreachableDeviceError(error.message, { cause: error }) };
      }
      if (error instanceof TvTransportError || error instanceof TimeoutError) {
        return { kind: 'transient', error: new TransientSampleError(error.message, { cause: error }) };
      }
      throw error;
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
      controller.abort();
    }

    if (frame.zones.length !== this.zoneCount) {
      throw new ConfigurationError(
        `TV reports ${frame.zones.length} ambilight zones but zone_count is ${this.zoneCount}; update the light setup for this TV`
      );
    }

    return { kind: 'frame', frame };
  }

  /**
   * True when no zone has any channel above the black threshold
   */
  isBlackScreen(frame: ZoneFrame): boolean {
    const threshold = this.blackThreshold;
    return frame.zones.every(([r, g, b]) => r <= threshold && g <= threshold && b <= threshold);
  }

  getPowerState(): Promise<string | null> {
    return this.device.getPowerState ? this.device.getPowerState(this.timeoutMs) : Promise.resolve(null);
  }
}
