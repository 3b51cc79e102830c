import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../errors';
import { CONFIG_ENV_VAR, ConfigManager, normalizeLights, parseConfig } from '../ConfigManager';

function rawConfig(overrides: { tv?: Record<string, unknown>; lights?: unknown } = {}) {
  return {
    ambilight_tv: {
      ip: '10.0.0.20',
      api_version: 5,
      ...overrides.tv,
    },
    hue_entertainment_group: {
      ip: '10.0.0.2',
      username: 'test-user',
      client_key: '0123456789abcdef0123456789abcdef',
    },
    lights_setup: overrides.lights ?? [{ name: 'wall_left', id: 0, positions: [0, 1, 3] }],
  };
}

describe('normalizeLights', () => {
  const expected = [
    { name: 'wall_left', channelId: 0, zones: [0, 1, 3] },
    { name: 'ceiling', channelId: 4, zones: [6, 7] },
  ];

  it('accepts a list of lights', () => {
    expect(
      normalizeLights([
        { name: 'wall_left', id: 0, positions: [0, 1, 3] },
        { name: 'ceiling', id: 4, positions: [6, 7] },
      ])
    ).toEqual(expected);
  });

  it('accepts a map keyed by light name', () => {
    expect(
      normalizeLights({
        wall_left: { id: 0, positions: [0, 1, 3] },
        ceiling: { id: 4, positions: '6, 7' },
      })
    ).toEqual(expected);
  });

  it('accepts the lettered flat layout', () => {
    expect(
      normalizeLights({
        A_name: 'wall_left',
        A_id: 0,
        A_positions: '0,1,3',
        B_name: 'ceiling',
        B_id: 4,
        B_positions: [6, 7],
      })
    ).toEqual(expected);
  });

  it('reports a broken lettered entry', () => {
    expect(() => normalizeLights({ A_name: 'wall_left', A_id: 'zero', A_positions: '0' })).toThrow(
      'lights_setup.A_id must be a channel number'
    );
  });

  it('rejects positions that are not integers', () => {
    expect(() => normalizeLights([{ name: 'wall_left', id: 0, positions: '0, x' }])).toThrow(ConfigurationError);
  });

  it('rejects a value of the wrong shape', () => {
    expect(() => normalizeLights('wall_left')).toThrow(ConfigurationError);
  });
});

describe('parseConfig', () => {
  it('applies defaults', () => {
    const config = parseConfig(rawConfig());

    expect(config.tv).toEqual({
      ip: '10.0.0.20',
      apiVersion: 5,
      protocol: undefined,
      port: undefined,
      user: undefined,
      password: undefined,
      requestTimeoutMs: 500,
      zoneCount: 17,
    });
    expect(config.timing).toEqual({
      refreshRateMs: 50,
      idleRefreshRateMs: 5000,
      errorBackoffMs: 3000,
      blackScreenTimeoutS: 30,
      powerCheckAfterS: 5,
      waitForStartupS: 0,
      runtimeErrorThreshold: 0,
      statusIntervalS: 60,
    });
    expect(config.bridge.entertainmentIndex).toBe(0);
    expect(config.bridge.maxConsecutiveSendErrors).toBe(3);
    expect(config.transitionSmoothing).toBe(0);
    expect(config.blackThreshold).toBe(15);
  });

  it('freezes the result', () => {
    const config = parseConfig(rawConfig());

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.fixtures)).toBe(true);
    expect(Object.isFrozen(config.fixtures[0])).toBe(true);
  });

  it('strips the scheme separator from protocol', () => {
    const config = parseConfig(rawConfig({ tv: { protocol: 'https://' } }));

    expect(config.tv.protocol).toBe('https');
  });

  it('rejects placeholder addresses', () => {
    expect(() => parseConfig(rawConfig({ tv: { ip: '192.168.1.X' } }))).toThrow(
      'ambilight_tv.ip: must be set to the device IP address'
    );
  });

  it('rejects smoothing above the limit', () => {
    expect(() => parseConfig(rawConfig({ tv: { transition_smoothing: 0.99 } }))).toThrow(ConfigurationError);
  });

  it('checks fixture zones against zone_count', () => {
    expect(() =>
      parseConfig(rawConfig({ tv: { zone_count: 4 }, lights: [{ name: 'wall_left', id: 0, positions: [0, 4] }] }))
    ).toThrow('fixture "wall_left" zone 4 is outside 0..3');
  });

  it('rejects more lights than one stream frame can carry', () => {
    const lights = Array.from({ length: 21 }, (_, index) => ({ name: `light_${index}`, id: index, positions: [0] }));

    expect(() => parseConfig(rawConfig({ lights }))).toThrow(
      '21 fixtures configured but a stream frame carries at most 20'
    );
  });
});

describe('ConfigManager', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'ambilight-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads a config file', async () => {
    const file = path.join(dir, 'config.json');
    await writeFile(file, JSON.stringify(rawConfig()));

    const config = await new ConfigManager(file, {}).load();

    expect(config.fixtures).toEqual([{ name: 'wall_left', channelId: 0, zones: [0, 1, 3] }]);
  });

  it('prefers inline JSON from the environment when no path is given', async () => {
    const env = { [CONFIG_ENV_VAR]: JSON.stringify(rawConfig({ tv: { ip: '10.0.0.99' } })) };

    const config = await new ConfigManager(undefined, env).load();

    expect(config.tv.ip).toBe('10.0.0.99');
  });

  it('uses an explicit path over the environment', async () => {
    const file = path.join(dir, 'config.json');
    await writeFile(file, JSON.stringify(rawConfig({ tv: { ip: '10.0.0.50' } })));
    const env = { [CONFIG_ENV_VAR]: JSON.stringify(rawConfig({ tv: { ip: '10.0.0.99' } })) };

    const config = await new ConfigManager(file, env).load();

    expect(config.tv.ip).toBe('10.0.0.50');
  });

  it('reports a missing file as a configuration error', async () => {
    await expect(new ConfigManager(path.join(dir, 'missing.json'), {}).load()).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });

  it('reports malformed JSON as a configuration error', async () => {
    const file = path.join(dir, 'config.json');
    await writeFile(file, '{ "ambilight_tv": ');

    await expect(new ConfigManager(file, {}).load()).rejects.toThrow(/is not valid JSON/);
  });
});
