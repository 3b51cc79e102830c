/**
 * Hue Entertainment API Streaming Types
 */

import type { RGB } from '../types';

/**
 * Low-latency streaming primitive of the lighting bridge.
 * One open channel at a time; frames map entertainment channel ids to colors.
 */
export interface StreamTransport {
  open(): Promise<void>;
  sendFrame(channels: ReadonlyMap<number, RGB>): Promise<void>;
  close(): Promise<void>;
}

/** Entertainment configuration as returned by CLIP v2 */
export interface EntertainmentConfiguration {
  id: string; // UUID
  metadata?: { name?: string };
  configuration_type?: 'screen' | 'monitor' | 'music' | 'threed' | 'other';
  status: 'inactive' | 'active';
  channels?: EntertainmentChannel[];
}

/** A channel in an entertainment configuration */
export interface EntertainmentChannel {
  channel_id: number;
  position?: { x: number; y: number; z: number }; // -1 to 1
  members?: Array<{ index: number; service: { rid: string; rtype: string } }>;
}

export interface HueEntertainmentOptions {
  bridgeIp: string;
  username: string;
  clientKey: string;
  applicationId?: string; // from GET /auth/v1 when not given
  entertainmentConfigId?: string;
  entertainmentIndex?: number; // used when no id is configured
  sendTimeoutMs: number;
  connectTimeoutMs?: number;
}
