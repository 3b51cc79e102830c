/**
 * Hue Entertainment API Binary Protocol Message Builder
 *
 * Message format (V2 API):
 * - Header: 16 bytes
 *   - "HueStream" (9 bytes ASCII)
 *   - Version: 0x02, 0x00 (2 bytes)
 *   - Sequence ID: 1 byte (ignored by bridge)
 *   - Reserved: 2 bytes (0x00, 0x00)
 *   - Color Space: 1 byte (0x00=RGB)
 *   - Reserved: 1 byte (0x00)
 * - Entertainment Config ID: 36 bytes (UUID string)
 * - Per-channel data: 7 bytes each (max 20 channels)
 *   - Channel ID: 1 byte
 *   - Color: 6 bytes (3x uint16 big-endian R,G,B)
 */

import type { RGB } from '../types';

const PROTOCOL_NAME = Buffer.from('HueStream', 'ascii');
const VERSION_MAJOR = 0x02;
const VERSION_MINOR = 0x00;
const COLOR_SPACE_RGB = 0x00;

export const HEADER_LENGTH = 16;
export const UUID_LENGTH = 36;
export const CHANNEL_DATA_LENGTH = 7;
export const MAX_CHANNELS = 20;

export class HueStreamMessage {
  private sequenceId = 0;
  private readonly entertainmentConfigId: string;

  constructor(entertainmentConfigId: string) {
    if (entertainmentConfigId.length !== UUID_LENGTH) {
      throw new Error(`Entertainment config ID must be ${UUID_LENGTH} characters (UUID format)`);
    }
    this.entertainmentConfigId = entertainmentConfigId;
  }

  /**
   * Build an RGB message for multiple channels
   * @param channels channel id to color, 0-255 per component
   */
  buildRgbMessage(channels: ReadonlyMap<number, RGB>): Buffer {
    if (channels.size > MAX_CHANNELS) {
      throw new Error(`A HueStream message carries at most ${MAX_CHANNELS} channels, got ${channels.size}`);
    }

    const buffer = Buffer.alloc(HEADER_LENGTH + UUID_LENGTH + CHANNEL_DATA_LENGTH * channels.size);

    let offset = this.writeHeader(buffer, 0);
    offset += buffer.write(this.entertainmentConfigId, offset, 'ascii');

    for (const [channelId, rgb] of channels) {
      offset = this.writeRgbChannel(buffer, offset, channelId, rgb);
    }

    this.sequenceId = (this.sequenceId + 1) % 256;
    return buffer;
  }

  private writeHeader(buffer: Buffer, offset: number): number {
    PROTOCOL_NAME.copy(buffer, offset);
    offset += PROTOCOL_NAME.length;

    buffer.writeUInt8(VERSION_MAJOR, offset++);
    buffer.writeUInt8(VERSION_MINOR, offset++);
    buffer.writeUInt8(this.sequenceId, offset++);

    // Reserved
    buffer.writeUInt8(0x00, offset++);
    buffer.writeUInt8(0x00, offset++);

    buffer.writeUInt8(COLOR_SPACE_RGB, offset++);

    // Reserved
    buffer.writeUInt8(0x00, offset++);

    return offset;
  }

  private writeRgbChannel(buffer: Buffer, offset: number, channelId: number, rgb: RGB): number {
    buffer.writeUInt8(channelId, offset++);

    buffer.writeUInt16BE(scaleRgb(rgb[0]), offset);
    offset += 2;
    buffer.writeUInt16BE(scaleRgb(rgb[1]), offset);
    offset += 2;
    buffer.writeUInt16BE(scaleRgb(rgb[2]), offset);
    offset += 2;

    return offset;
  }
}

/**
 * Scale an 8-bit component to the 16-bit wire range
 */
export function scaleRgb(value: number): number {
  const clamped = Math.max(0, Math.min(255, Math.round(value)));
  return Math.round((clamped / 255) * 65535);
}

/**
 * Helper to convert hex string clientKey to Buffer
 * @param hex 32-character hex string
 */
export function hexToBuffer(hex: string): Buffer {
  if (!/^[0-9a-fA-F]{32}$/.test(hex)) {
    throw new Error('Client key must be 32 hex characters (16 bytes)');
  }
  return Buffer.from(hex, 'hex');
}
