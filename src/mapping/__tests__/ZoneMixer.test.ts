import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../errors';
import type { Fixture, RGB, ZoneFrame } from '../../types';
import { mix, validateFixtures } from '../ZoneMixer';

function frame(zones: RGB[]): ZoneFrame {
  return { zones, capturedAt: 0 };
}

function blank(count: number): RGB[] {
  return Array.from({ length: count }, (): RGB => [0, 0, 0]);
}

describe('mix', () => {
  it('averages each channel over the fixture zones', () => {
    const zones = blank(17);
    zones[0] = [255, 0, 0];
    zones[1] = [255, 0, 0];
    zones[3] = [0, 0, 0];

    const fixtures: Fixture[] = [{ name: 'wall_left', channelId: 0, zones: [0, 1, 3] }];

    expect(mix(frame(zones), fixtures)).toEqual([{ fixture: 'wall_left', color: [170, 0, 0] }]);
  });

  it('keeps fractional means', () => {
    const fixtures: Fixture[] = [{ name: 'lamp', channelId: 3, zones: [0, 1] }];

    const [result] = mix(frame([[10, 11, 0], [11, 12, 1]]), fixtures);

    expect(result.color).toEqual([10.5, 11.5, 0.5]);
  });

  it('returns one entry per fixture in configured order', () => {
    const zones: RGB[] = [
      [100, 0, 0],
      [0, 100, 0],
      [0, 0, 100],
    ];
    const fixtures: Fixture[] = [
      { name: 'right', channelId: 1, zones: [2] },
      { name: 'left', channelId: 0, zones: [0] },
      { name: 'all', channelId: 2, zones: [0, 1, 2] },
    ];

    const result = mix(frame(zones), fixtures);

    expect(result.map((entry) => entry.fixture)).toEqual(['right', 'left', 'all']);
    expect(result[0].color).toEqual([0, 0, 100]);
    expect(result[2].color[0]).toBeCloseTo(33.333, 2);
  });

  it('lets fixtures share zones', () => {
    const fixtures: Fixture[] = [
      { name: 'a', channelId: 0, zones: [0] },
      { name: 'b', channelId: 1, zones: [0] },
    ];

    const result = mix(frame([[40, 50, 60]]), fixtures);

    expect(result).toEqual([
      { fixture: 'a', color: [40, 50, 60] },
      { fixture: 'b', color: [40, 50, 60] },
    ]);
  });
});

describe('validateFixtures', () => {
  it('accepts a valid setup', () => {
    expect(() =>
      validateFixtures(
        [
          { name: 'a', channelId: 0, zones: [0, 16] },
          { name: 'b', channelId: 1, zones: [5] },
        ],
        17
      )
    ).not.toThrow();
  });

  it('collects every problem into one error', () => {
    const fixtures: Fixture[] = [
      { name: 'a', channelId: 0, zones: [17] },
      { name: 'a', channelId: 0, zones: [] },
    ];

    let caught: unknown;
    try {
      validateFixtures(fixtures, 17);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof ConfigurationError && caught.issues).toEqual([
      'fixture "a" zone 17 is outside 0..16',
      'fixture "a" is configured more than once',
      'fixture "a" reuses channel 0',
      'fixture "a" has no zones',
    ]);
  });

  it('rejects an empty fixture list', () => {
    expect(() => validateFixtures([], 17)).toThrow(ConfigurationError);
  });

  it('rejects negative zone indices', () => {
    expect(() => validateFixtures([{ name: 'a', channelId: 0, zones: [-1] }], 17)).toThrow(
      'fixture "a" zone -1 is outside 0..16'
    );
  });

  it('rejects more fixtures than one stream frame can carry', () => {
    const fixtures: Fixture[] = Array.from({ length: 21 }, (_, index) => ({
      name: `light_${index}`,
      channelId: index,
      zones: [0],
    }));

    expect(() => validateFixtures(fixtures.slice(0, 20), 17)).not.toThrow();
    expect(() => validateFixtures(fixtures, 17)).toThrow('21 fixtures configured but a stream frame carries at most 20');
  });
});
