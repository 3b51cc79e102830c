/**
 * DTLS Connection Wrapper for Hue Entertainment API
 *
 * Handles secure UDP connection to Hue Bridge using DTLS with PSK authentication.
 * Uses node-dtls-client for the underlying DTLS implementation. Reconnecting is left
 * to the owner of the connection.
 */

import { dtls } from 'node-dtls-client';
import { createLogger } from '../logging/logger';
import { hexToBuffer } from './HueStreamMessage';

export const HUE_STREAMING_PORT = 2100;
const DEFAULT_TIMEOUT = 10000;

const log = createLogger('DtlsConnection');

/** Connection options for DTLS */
export interface DtlsConnectionOptions {
  host: string;
  port?: number;
  pskIdentity: string; // hue-application-id
  pskSecret: string; // clientKey as hex string (will be converted internally)
  timeout?: number;
}

export class DtlsConnection {
  private socket: dtls.Socket | null = null;
  private options: Required<DtlsConnectionOptions>;
  private isConnected = false;

  constructor(options: DtlsConnectionOptions) {
    this.options = {
      host: options.host,
      port: options.port ?? HUE_STREAMING_PORT,
      pskIdentity: options.pskIdentity,
      pskSecret: options.pskSecret,
      timeout: options.timeout ?? DEFAULT_TIMEOUT,
    };
  }

  /**
   * Establish DTLS connection to Hue Bridge
   */
  async connect(): Promise<void> {
    if (this.isConnected) {
      return;
    }

    return new Promise((resolve, reject) => {
      let settled = false;
      const fail = (err: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutHandle);
        this.destroySocket();
        reject(err);
      };

      const timeoutHandle = setTimeout(() => {
        fail(new Error(`DTLS connection timeout after ${this.options.timeout}ms`));
      }, this.options.timeout);

      try {
        // node-dtls-client uses Buffer.from(psk, "ascii") internally
        // We need to convert our hex clientKey to raw bytes, then to a latin1 string
        // so that when the library converts it back, we get the correct 16-byte PSK
        const pskString = hexToBuffer(this.options.pskSecret).toString('latin1');

        log.debug(`Connecting to ${this.options.host}:${this.options.port} as ${this.options.pskIdentity}`);

        const config: dtls.Options = {
          type: 'udp4',
          address: this.options.host,
          port: this.options.port,
          psk: {
            [this.options.pskIdentity]: pskString,
          },
          timeout: this.options.timeout,
        };

        const socket = dtls.createSocket(config);
        this.socket = socket;

        socket.on('connected', () => {
          if (settled) return;
          settled = true;
          clearTimeout(timeoutHandle);
          this.isConnected = true;
          resolve();
        });

        socket.on('error', (err: Error) => {
          if (!this.isConnected) {
            fail(err);
            return;
          }
          log.error('Socket error:', err.message);
          this.handleDisconnect(`Error: ${err.message}`);
        });

        socket.on('close', () => {
          if (!this.isConnected) {
            // Socket closed during connection attempt (likely handshake failure)
            fail(new Error('DTLS socket closed during handshake'));
          } else {
            this.handleDisconnect('Socket closed');
          }
        });
      } catch (err) {
        fail(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }

  /**
   * Send one datagram. Rejects when not connected, on a transport error, or when
   * the socket does not confirm the write within `timeoutMs`.
   */
  send(data: Buffer, timeoutMs: number): Promise<void> {
    const socket = this.socket;
    if (!this.isConnected || !socket) {
      return Promise.reject(new Error('DTLS connection is not open'));
    }

    return new Promise((resolve, reject) => {
      const timeoutHandle = setTimeout(() => {
        reject(new Error(`DTLS send timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      try {
        socket.send(data, (err) => {
          clearTimeout(timeoutHandle);
          if (err) {
            reject(err);
          } else {
            resolve();
          }
        });
      } catch (err) {
        clearTimeout(timeoutHandle);
        reject(err);
      }
    });
  }

  /**
   * Close the DTLS connection. Safe to call more than once.
   */
  async close(): Promise<void> {
    this.isConnected = false;
    this.destroySocket();
  }

  private handleDisconnect(reason: string): void {
    if (!this.isConnected) return;

    this.isConnected = false;
    this.destroySocket();
    // Later sends reject; the session manager closes and reopens after repeated failures
    log.warn(`Disconnected: ${reason}`);
  }

  private destroySocket(): void {
    const socket = this.socket;
    this.socket = null;
    if (!socket) return;

    socket.removeAllListeners();
    // Late errors from a socket being torn down have nowhere useful to go
    socket.on('error', (err: Error) => log.debug('Error after close:', err.message));
    try {
      socket.close();
    } catch (err) {
      log.debug('Close failed:', err instanceof Error ? err.message : String(err));
    }
  }
}
