import { ConfigurationError } from '../errors';
import type { Fixture, FixtureColor, RGB } from '../types';

export const MAX_SMOOTHING_FACTOR = 0.95;

/**
 * Per-fixture exponential moving average:
 *   output = factor * previous + (1 - factor) * input
 *
 * A factor of 0 passes colors through untouched; higher values converge more slowly.
 * The first color seen for a fixture seeds its history, so there is no ramp up from black.
 */
export class SmoothingFilter {
  private readonly factor: number;
  private readonly previous = new Map<string, RGB | null>();

  constructor(fixtures: readonly Fixture[], factor: number) {
    if (!Number.isFinite(factor) || factor < 0 || factor > MAX_SMOOTHING_FACTOR) {
      throw new ConfigurationError(
        `Transition smoothing must be between 0 and ${MAX_SMOOTHING_FACTOR}, got ${factor}`
      );
    }
    this.factor = factor;

    // The key set is fixed here and never grows
    for (const fixture of fixtures) {
      this.previous.set(fixture.name, null);
    }
  }

  apply(input: FixtureColor): FixtureColor {
    if (!this.previous.has(input.fixture)) {
      throw new Error(`Unknown fixture "${input.fixture}"`);
    }

    const prev = this.previous.get(input.fixture) ?? input.color;
    const a = this.factor;
    const color: RGB = [
      a * prev[0] + (1 - a) * input.color[0],
      a * prev[1] + (1 - a) * input.color[1],
      a * prev[2] + (1 - a) * input.color[2],
    ];

    this.previous.set(input.fixture, color);
    return { fixture: input.fixture, color };
  }
}
