/** RGB color, channels 0-255. Values may be fractional between pipeline stages. */
export type RGB = [number, number, number];

/**
 * One capture of the TV's edge zones.
 *
 * Zone order runs around the screen: left side bottom to top, top left to right,
 * right side top to bottom.
 */
export interface ZoneFrame {
  readonly zones: readonly RGB[];
  readonly capturedAt: number;
}

/** A light inside the entertainment area and the TV zones it takes its color from */
export interface Fixture {
  readonly name: string;
  readonly channelId: number; // channel index inside the entertainment configuration
  readonly zones: readonly number[];
}

export interface FixtureColor {
  fixture: string; // Fixture.name
  color: RGB;
}

export type SyncPhase = 'WaitingForDevice' | 'Streaming' | 'Idle' | 'Disconnected' | 'Terminated';

export type StreamSessionState = 'Closed' | 'Opening' | 'Open' | 'Closing';

export type JointSpaceVersion = 1 | 5 | 6;

export enum ExitCode {
  Ok = 0,
  Fatal = 1,
  ConfigurationError = 2,
  DeviceNeverFound = 10,
  DeviceLost = 11,
}

export interface TvConfig {
  ip: string;
  apiVersion: JointSpaceVersion;
  protocol?: 'http' | 'https';
  port?: number;
  user?: string;
  password?: string;
  requestTimeoutMs: number;
  zoneCount: number;
}

export interface BridgeConfig {
  ip: string;
  username: string;
  clientKey: string;
  applicationId?: string;
  entertainmentConfigId?: string;
  entertainmentIndex: number;
  sendTimeoutMs: number;
  maxConsecutiveSendErrors: number;
}

export interface SyncTiming {
  refreshRateMs: number;
  idleRefreshRateMs: number;
  errorBackoffMs: number;
  blackScreenTimeoutS: number;
  powerCheckAfterS: number;
  waitForStartupS: number; // 0 = wait forever
  runtimeErrorThreshold: number; // 0 = never exit
  statusIntervalS: number;
}

/** Validated, frozen configuration handed to the engine */
export interface EngineConfig {
  tv: TvConfig;
  bridge: BridgeConfig;
  fixtures: readonly Fixture[];
  timing: SyncTiming;
  transitionSmoothing: number;
  blackThreshold: number;
}
