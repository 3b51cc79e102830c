/**
 * Streaming Session Manager
 *
 * Owns the lifecycle of the entertainment stream:
 *   Closed -> Opening -> Open -> Closing -> Closed
 *
 * Repeated transient send failures close the session instead of leaving a half-dead
 * channel behind; the caller sees the session back in `Closed` and decides whether to reopen.
 */

import { EventEmitter } from 'events';
import { StreamConnectError, StreamSendError, errorMessage } from '../errors';
import { createLogger } from '../logging/logger';
import type { Fixture, FixtureColor, RGB, StreamSessionState } from '../types';
import type { StreamTransport } from './types';

export const DEFAULT_MAX_CONSECUTIVE_SEND_ERRORS = 3;

const log = createLogger('StreamSession');

/** Opaque token for one open session; stale after that session closes */
export interface StreamHandle {
  readonly id: number;
}

export interface StreamSessionManagerOptions {
  fixtures: readonly Fixture[];
  maxConsecutiveSendErrors?: number;
}

export class StreamSessionManager extends EventEmitter {
  private readonly transport: StreamTransport;
  private readonly channelByFixture: ReadonlyMap<string, number>;
  private readonly maxConsecutiveSendErrors: number;

  private sessionState: StreamSessionState = 'Closed';
  private handle: StreamHandle | null = null;
  private opening: Promise<StreamHandle> | null = null;
  private closing: Promise<void> | null = null;
  private sending = false;
  private consecutiveSendErrors = 0;
  private nextHandleId = 1;
  private frameCount = 0;

  constructor(transport: StreamTransport, options: StreamSessionManagerOptions) {
    super();
    this.transport = transport;
    this.channelByFixture = new Map(options.fixtures.map((fixture) => [fixture.name, fixture.channelId]));
    this.maxConsecutiveSendErrors = options.maxConsecutiveSendErrors ?? DEFAULT_MAX_CONSECUTIVE_SEND_ERRORS;
  }

  get state(): StreamSessionState {
    return this.sessionState;
  }

  /**
   * The handle of the open session, if any
   */
  currentHandle(): StreamHandle | null {
    return this.sessionState === 'Open' ? this.handle : null;
  }

  /**
   * Frame count is kept across sessions so rates can be computed from deltas
   */
  getStats(): { state: StreamSessionState; frameCount: number; consecutiveSendErrors: number } {
    return {
      state: this.sessionState,
      frameCount: this.frameCount,
      consecutiveSendErrors: this.consecutiveSendErrors,
    };
  }

  /**
   * Open the stream. Concurrent callers share a single attempt.
   * @throws StreamConnectError when the bridge rejects or cannot be reached
   */
  open(): Promise<StreamHandle> {
    if (this.sessionState === 'Open' && this.handle) {
      return Promise.resolve(this.handle);
    }
    if (!this.opening) {
      this.opening = this.doOpen().finally(() => {
        this.opening = null;
      });
    }
    return this.opening;
  }

  /**
   * Send one frame on an open handle.
   * @throws StreamSendError `closed` right away when the handle is not open,
   *   `transient` when the transport fails or times out
   */
  async send(handle: StreamHandle, colors: readonly FixtureColor[]): Promise<void> {
    if (this.sessionState !== 'Open' || this.handle !== handle) {
      throw new StreamSendError('Stream session is not open', 'closed');
    }
    if (this.sending) {
      throw new Error('A frame is already in flight on this session');
    }

    const channels = this.toChannels(colors);

    this.sending = true;
    try {
      await this.transport.sendFrame(channels);
      this.consecutiveSendErrors = 0;
      this.frameCount++;
    } catch (error) {
      this.consecutiveSendErrors++;
      const failure = new StreamSendError(`Frame send failed: ${errorMessage(error)}`, 'transient', { cause: error });

      if (this.consecutiveSendErrors >= this.maxConsecutiveSendErrors) {
        log.warn(`${this.consecutiveSendErrors} consecutive send failures, closing session`);
        await this.close(handle);
      }
      throw failure;
    } finally {
      this.sending = false;
    }
  }

  /**
   * Close the session. Idempotent; a stale handle is a no-op.
   */
  close(handle?: StreamHandle): Promise<void> {
    if (handle && handle !== this.handle) {
      return Promise.resolve();
    }
    if (this.closing) {
      return this.closing;
    }
    if (this.sessionState === 'Closed' && !this.opening) {
      return Promise.resolve();
    }

    this.closing = this.doClose().finally(() => {
      this.closing = null;
    });
    return this.closing;
  }

  private async doOpen(): Promise<StreamHandle> {
    if (this.closing) {
      await this.closing;
    }

    this.setState('Opening');
    try {
      await this.transport.open();
    } catch (error) {
      this.setState('Closed');
      throw new StreamConnectError(`Could not open entertainment stream: ${errorMessage(error)}`, { cause: error });
    }

    const handle: StreamHandle = { id: this.nextHandleId++ };
    this.handle = handle;
    this.consecutiveSendErrors = 0;
    this.setState('Open');
    return handle;
  }

  private async doClose(): Promise<void> {
    if (this.opening) {
      const opened = await this.opening.then(
        () => true,
        () => false
      );
      if (!opened) return;
    }

    this.setState('Closing');
    this.handle = null;
    try {
      await this.transport.close();
    } catch (error) {
      log.warn('Transport close failed:', errorMessage(error));
    } finally {
      this.setState('Closed');
    }
  }

  private toChannels(colors: readonly FixtureColor[]): Map<number, RGB> {
    const channels = new Map<number, RGB>();
    for (const { fixture, color } of colors) {
      const channelId = this.channelByFixture.get(fixture);
      if (channelId === undefined) {
        throw new Error(`Unknown fixture "${fixture}"`);
      }
      channels.set(channelId, color);
    }
    return channels;
  }

  private setState(state: StreamSessionState): void {
    const previous = this.sessionState;
    if (previous === state) return;
    this.sessionState = state;
    log.debug(`${previous} -> ${state}`);
    this.emit('stateChange', state, previous);
  }
}
