import axios, { AxiosError, type AxiosInstance } from 'axios';
import http from 'http';
import https from 'https';
import { ZodError } from 'zod';
import { TvTransportError, type TvReachability } from '../errors';
import { createLogger } from '../logging/logger';
import type { TvConfig, ZoneFrame } from '../types';
import { parseAmbilightPayload } from './ambilightPayload';
import { createJointSpaceApi, type JointSpaceApi } from './jointSpace';

/** TV side of the engine: one ambilight frame per call, already authenticated */
export interface TvDevice {
  fetchZoneFrame(timeoutMs: number, signal?: AbortSignal): Promise<ZoneFrame>;
  /** Reported power state ("On", "Standby", ...), or null when the TV can't tell */
  getPowerState?(timeoutMs: number): Promise<string | null>;
}

const log = createLogger('AmbilightTv');

const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'EHOSTUNREACH', 'ENETUNREACH', 'EHOSTDOWN']);

/**
 * Map a transport failure onto the engine's reachability classes.
 * Refused or unroutable connections mean the TV is off; everything else is worth another try.
 */
export function classifyTransportError(error: unknown): TvTransportError {
  if (error instanceof TvTransportError) {
    return error;
  }

  let reachability: TvReachability = 'transient';
  let message: string;

  if (error instanceof AxiosError) {
    const code = error.code ?? '';
    if (UNREACHABLE_CODES.has(code)) {
      reachability = 'unreachable';
    }
    message = error.response ? `HTTP ${error.response.status}` : `${code || 'request failed'}: ${error.message}`;
  } else if (error instanceof ZodError) {
    message = `Unexpected ambilight payload: ${error.issues[0]?.message ?? 'invalid'}`;
  } else if (error instanceof Error) {
    message = error.message;
  } else {
    message = String(error);
  }

  return new TvTransportError(message, reachability, { cause: error });
}

/**
 * JointSpace client for Philips Ambilight TVs
 */
export class AmbilightTvClient implements TvDevice {
  private readonly api: JointSpaceApi;
  private readonly client: AxiosInstance;
  private readonly now: () => number;

  constructor(config: TvConfig, now: () => number = Date.now) {
    this.api = createJointSpaceApi(config);
    this.now = now;

    // TV uses a self-signed certificate on the HTTPS variants
    this.client = axios.create({
      baseURL: this.api.baseUrl,
      timeout: config.requestTimeoutMs,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true, rejectUnauthorized: false }),
    });
    this.api.authenticate(this.client);
  }

  get apiVersion(): number {
    return this.api.version;
  }

  async fetchZoneFrame(timeoutMs: number, signal?: AbortSignal): Promise<ZoneFrame> {
    try {
      const response = await this.client.get<unknown>('/ambilight/processed', { timeout: timeoutMs, signal });
      return parseAmbilightPayload(response.data, this.now());
    } catch (error) {
      throw classifyTransportError(error);
    }
  }

  async getPowerState(timeoutMs: number): Promise<string | null> {
    if (!this.api.supportsPowerState) {
      return null;
    }

    try {
      const response = await this.client.get<unknown>('/powerstate', { timeout: timeoutMs });
      const data = response.data;
      if (typeof data === 'object' && data !== null && 'powerstate' in data && typeof data.powerstate === 'string') {
        return data.powerstate;
      }
      return null;
    } catch (error) {
      // Advisory only; the black-screen timeout still applies
      log.debug('Power state unavailable:', classifyTransportError(error).message);
      return null;
    }
  }
}
