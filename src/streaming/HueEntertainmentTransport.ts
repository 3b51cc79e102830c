/**
 * Hue Entertainment Streaming Transport
 *
 * Opens an entertainment area for streaming (REST), holds the DTLS channel and
 * turns channel color maps into HueStream frames.
 */

import { HueEntertainmentClient } from '../hue/HueEntertainmentClient';
import { createLogger } from '../logging/logger';
import type { RGB } from '../types';
import { DtlsConnection, type DtlsConnectionOptions } from './DtlsConnection';
import { HueStreamMessage } from './HueStreamMessage';
import type { EntertainmentConfiguration, HueEntertainmentOptions, StreamTransport } from './types';

const DEFAULT_CONNECT_TIMEOUT_MS = 10000;

const log = createLogger('HueEntertainment');

/** REST calls the transport depends on */
export interface EntertainmentApi {
  listEntertainmentConfigurations(): Promise<EntertainmentConfiguration[]>;
  startStreaming(configId: string): Promise<void>;
  stopStreaming(configId: string): Promise<void>;
  getApplicationId(): Promise<string>;
}

/** The parts of DtlsConnection the transport uses */
export interface DatagramChannel {
  connect(): Promise<void>;
  send(data: Buffer, timeoutMs: number): Promise<void>;
  close(): Promise<void>;
}

export interface HueEntertainmentTransportDeps {
  api: EntertainmentApi;
  createChannel: (options: DtlsConnectionOptions) => DatagramChannel;
}

export class HueEntertainmentTransport implements StreamTransport {
  private readonly options: HueEntertainmentOptions;
  private readonly api: EntertainmentApi;
  private readonly createChannel: (options: DtlsConnectionOptions) => DatagramChannel;

  private channel: DatagramChannel | null = null;
  private messageBuilder: HueStreamMessage | null = null;
  private activeConfigId: string | null = null;
  private applicationId: string | null;
  private entertainmentConfigId: string | null;

  constructor(options: HueEntertainmentOptions, deps: Partial<HueEntertainmentTransportDeps> = {}) {
    this.options = options;
    this.applicationId = options.applicationId ?? null;
    this.entertainmentConfigId = options.entertainmentConfigId ?? null;
    this.api =
      deps.api ??
      new HueEntertainmentClient({ bridgeIp: options.bridgeIp, applicationKey: options.username });
    this.createChannel = deps.createChannel ?? ((channelOptions) => new DtlsConnection(channelOptions));
  }

  /**
   * Activate streaming on the bridge and complete the DTLS handshake
   */
  async open(): Promise<void> {
    if (this.channel) {
      return;
    }

    const applicationId = await this.resolveApplicationId();
    const configId = await this.resolveEntertainmentConfigId();

    await this.api.startStreaming(configId);
    this.activeConfigId = configId;

    const channel = this.createChannel({
      host: this.options.bridgeIp,
      pskIdentity: applicationId,
      pskSecret: this.options.clientKey,
      timeout: this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
    });

    try {
      await channel.connect();
    } catch (error) {
      await channel.close();
      await this.deactivate();
      throw error;
    }

    this.channel = channel;
    this.messageBuilder = new HueStreamMessage(configId);
    log.info(`Streaming to entertainment area ${configId}`);
  }

  async sendFrame(channels: ReadonlyMap<number, RGB>): Promise<void> {
    if (!this.channel || !this.messageBuilder) {
      throw new Error('Entertainment stream is not open');
    }

    const message = this.messageBuilder.buildRgbMessage(channels);
    await this.channel.send(message, this.options.sendTimeoutMs);
  }

  /**
   * Tear down DTLS and release the entertainment area
   */
  async close(): Promise<void> {
    const channel = this.channel;
    this.channel = null;
    this.messageBuilder = null;

    if (channel) {
      await channel.close();
    }
    await this.deactivate();
  }

  private async deactivate(): Promise<void> {
    const configId = this.activeConfigId;
    this.activeConfigId = null;
    if (!configId) return;

    try {
      await this.api.stopStreaming(configId);
    } catch (error) {
      // The bridge drops the area out of streaming on its own after a few idle seconds
      log.warn('Failed to stop streaming on bridge:', error instanceof Error ? error.message : error);
    }
  }

  private async resolveApplicationId(): Promise<string> {
    if (!this.applicationId) {
      this.applicationId = await this.api.getApplicationId();
      log.debug(`Got application ID: ${this.applicationId}`);
    }
    return this.applicationId;
  }

  private async resolveEntertainmentConfigId(): Promise<string> {
    if (this.entertainmentConfigId) {
      return this.entertainmentConfigId;
    }

    const index = this.options.entertainmentIndex ?? 0;
    const configs = await this.api.listEntertainmentConfigurations();
    const selected = configs[index];
    if (!selected) {
      throw new Error(
        `Entertainment area #${index} not found; the bridge has ${configs.length}. Create one in the Hue app first.`
      );
    }

    // Remember the choice so reopening after idle lands on the same area
    this.entertainmentConfigId = selected.id;
    log.info(`Using entertainment area "${selected.metadata?.name ?? 'Unnamed'}" (${selected.id})`);
    return selected.id;
  }
}
