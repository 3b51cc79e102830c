import axios, { AxiosError, type AxiosInstance } from 'axios';
import https from 'https';
import { createLogger } from '../logging/logger';
import type { EntertainmentConfiguration } from '../streaming/types';

export interface HueApiErrorDetail {
  description: string;
}

export class HueApiError extends Error {
  constructor(message: string, public readonly errors: HueApiErrorDetail[]) {
    super(`${message}: ${errors.map((e) => e.description).join('; ')}`);
    this.name = 'HueApiError';
  }
}

interface HueApiEnvelope<T> {
  errors?: HueApiErrorDetail[];
  data?: T[];
}

export interface HueEntertainmentClientOptions {
  bridgeIp: string;
  applicationKey: string;
  timeoutMs?: number;
}

const log = createLogger('HueEntertainment');

function isEnvelope(value: unknown): value is HueApiEnvelope<unknown> {
  return typeof value === 'object' && value !== null && ('errors' in value || 'data' in value);
}

/**
 * CLIP v2 calls needed around an entertainment stream: list areas, start/stop
 * streaming mode, and look up the application id used as DTLS PSK identity.
 */
export class HueEntertainmentClient {
  private readonly client: AxiosInstance;
  private readonly bridgeIp: string;

  constructor(options: HueEntertainmentClientOptions) {
    this.bridgeIp = options.bridgeIp;
    this.client = axios.create({
      baseURL: `https://${options.bridgeIp}/clip/v2`,
      headers: {
        'hue-application-key': options.applicationKey,
      },
      timeout: options.timeoutMs ?? 5000,
      // Hue bridge uses self-signed cert
      httpsAgent: new https.Agent({
        rejectUnauthorized: false,
      }),
    });
  }

  async listEntertainmentConfigurations(): Promise<EntertainmentConfiguration[]> {
    return this.request<EntertainmentConfiguration>({
      method: 'get',
      url: '/resource/entertainment_configuration',
    });
  }

  /**
   * Put the entertainment area into streaming mode; DTLS is refused until this succeeds
   */
  async startStreaming(configId: string): Promise<void> {
    await this.request({
      method: 'put',
      url: `/resource/entertainment_configuration/${configId}`,
      data: { action: 'start' },
    });
    log.debug(`Started streaming for entertainment config: ${configId}`);
  }

  async stopStreaming(configId: string): Promise<void> {
    await this.request({
      method: 'put',
      url: `/resource/entertainment_configuration/${configId}`,
      data: { action: 'stop' },
    });
    log.debug(`Stopped streaming for entertainment config: ${configId}`);
  }

  /**
   * The application ID for the DTLS PSK identity is returned in the
   * `hue-application-id` response header of /auth/v1
   */
  async getApplicationId(): Promise<string> {
    const response = await this.client.get('/auth/v1', { baseURL: `https://${this.bridgeIp}` });
    const applicationId: unknown = response.headers['hue-application-id'];
    if (typeof applicationId !== 'string' || applicationId.length === 0) {
      throw new Error('Bridge did not return a hue-application-id header');
    }
    return applicationId;
  }

  private async request<T>(config: { method: 'get' | 'put'; url: string; data?: unknown }): Promise<T[]> {
    try {
      const response = await this.client.request<HueApiEnvelope<T>>(config);
      return this.unwrap(response.data);
    } catch (error) {
      const data: unknown = error instanceof AxiosError ? error.response?.data : undefined;
      if (isEnvelope(data) && data.errors && data.errors.length > 0) {
        throw new HueApiError('Hue API request failed', data.errors);
      }
      throw error;
    }
  }

  private unwrap<T>(envelope: HueApiEnvelope<T>): T[] {
    if (envelope.errors && envelope.errors.length > 0) {
      throw new HueApiError('Hue API reported one or more errors', envelope.errors);
    }
    return envelope.data ?? [];
  }
}
