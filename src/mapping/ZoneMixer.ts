import { ConfigurationError } from '../errors';
import { MAX_CHANNELS } from '../streaming/HueStreamMessage';
import type { Fixture, FixtureColor, RGB, ZoneFrame } from '../types';

/**
 * Check a fixture list against the TV's zone count.
 * Collects every problem before throwing so the operator sees them all at once.
 */
export function validateFixtures(fixtures: readonly Fixture[], zoneCount: number): void {
  const issues: string[] = [];
  const names = new Set<string>();
  const channels = new Set<number>();

  if (fixtures.length === 0) {
    issues.push('no fixtures configured');
  }
  if (fixtures.length > MAX_CHANNELS) {
    issues.push(`${fixtures.length} fixtures configured but a stream frame carries at most ${MAX_CHANNELS}`);
  }

  for (const fixture of fixtures) {
    if (names.has(fixture.name)) {
      issues.push(`fixture "${fixture.name}" is configured more than once`);
    }
    names.add(fixture.name);

    if (channels.has(fixture.channelId)) {
      issues.push(`fixture "${fixture.name}" reuses channel ${fixture.channelId}`);
    }
    channels.add(fixture.channelId);

    if (fixture.zones.length === 0) {
      issues.push(`fixture "${fixture.name}" has no zones`);
    }
    for (const zone of fixture.zones) {
      if (!Number.isInteger(zone) || zone < 0 || zone >= zoneCount) {
        issues.push(`fixture "${fixture.name}" zone ${zone} is outside 0..${zoneCount - 1}`);
      }
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid light setup', issues);
  }
}

/**
 * Average the frame's zone colors for each fixture.
 * Channels are averaged independently and left unrounded.
 */
export function mix(frame: ZoneFrame, fixtures: readonly Fixture[]): FixtureColor[] {
  return fixtures.map((fixture) => ({
    fixture: fixture.name,
    color: averageZones(frame.zones, fixture.zones),
  }));
}

function averageZones(zones: readonly RGB[], indices: readonly number[]): RGB {
  let r = 0;
  let g = 0;
  let b = 0;

  for (const index of indices) {
    const zone = zones[index];
    r += zone[0];
    g += zone[1];
    b += zone[2];
  }

  const count = indices.length;
  return [r / count, g / count, b / count];
}
