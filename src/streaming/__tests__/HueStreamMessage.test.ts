import { describe, expect, it } from 'vitest';
import type { RGB } from '../../types';
import { HEADER_LENGTH, HueStreamMessage, UUID_LENGTH, hexToBuffer, scaleRgb } from '../HueStreamMessage';

const CONFIG_ID = '1a8d99cc-967b-44f2-9202-43f976c0fa6b';

describe('HueStreamMessage', () => {
  it('writes the header, config id and channel data', () => {
    const builder = new HueStreamMessage(CONFIG_ID);
    const channels = new Map<number, RGB>([
      [0, [255, 0, 0]],
      [3, [0, 255, 51]],
    ]);

    const message = builder.buildRgbMessage(channels);

    expect(message.length).toBe(HEADER_LENGTH + UUID_LENGTH + 2 * 7);
    expect(message.subarray(0, 9).toString('ascii')).toBe('HueStream');
    expect([...message.subarray(9, 16)]).toEqual([0x02, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00]);
    expect(message.subarray(16, 52).toString('ascii')).toBe(CONFIG_ID);

    expect(message.readUInt8(52)).toBe(0);
    expect(message.readUInt16BE(53)).toBe(0xffff);
    expect(message.readUInt16BE(55)).toBe(0);
    expect(message.readUInt16BE(57)).toBe(0);

    expect(message.readUInt8(59)).toBe(3);
    expect(message.readUInt16BE(60)).toBe(0);
    expect(message.readUInt16BE(62)).toBe(0xffff);
    expect(message.readUInt16BE(64)).toBe(13107);
  });

  it('advances the sequence byte and wraps at 256', () => {
    const builder = new HueStreamMessage(CONFIG_ID);
    const channels = new Map<number, RGB>([[0, [0, 0, 0]]]);

    for (let i = 0; i < 255; i++) {
      builder.buildRgbMessage(channels);
    }
    expect(builder.buildRgbMessage(channels).readUInt8(11)).toBe(255);
    expect(builder.buildRgbMessage(channels).readUInt8(11)).toBe(0);
  });

  it('refuses more than 20 channels', () => {
    const builder = new HueStreamMessage(CONFIG_ID);
    const channels = new Map<number, RGB>();
    for (let id = 0; id < 21; id++) {
      channels.set(id, [1, 1, 1]);
    }

    expect(() => builder.buildRgbMessage(channels)).toThrow('at most 20 channels');
  });

  it('requires a UUID-length config id', () => {
    expect(() => new HueStreamMessage('area-1')).toThrow(/36 characters/);
  });
});

describe('scaleRgb', () => {
  it('maps 0-255 onto 0-65535', () => {
    expect(scaleRgb(0)).toBe(0);
    expect(scaleRgb(255)).toBe(65535);
    expect(scaleRgb(128)).toBe(32896);
  });

  it('rounds fractional input and clamps the range', () => {
    expect(scaleRgb(127.6)).toBe(32896);
    expect(scaleRgb(-4)).toBe(0);
    expect(scaleRgb(300)).toBe(65535);
  });
});

describe('hexToBuffer', () => {
  it('decodes a 16-byte key', () => {
    expect(hexToBuffer('00112233445566778899aabbccddeeff')).toEqual(
      Buffer.from([0x00, 0x11, 0x22, 0x33, 0x44, 0x55, 0x66, 0x77, 0x88, 0x99, 0xaa, 0xbb, 0xcc, 0xdd, 0xee, 0xff])
    );
  });

  it('rejects keys of the wrong length', () => {
    expect(() => hexToBuffer('abcd')).toThrow('Client key must be 32 hex characters');
  });
});
