import type { Engine } from './engine';
import { createLogger } from './logging/logger';
import type { EngineConfig, FixtureColor } from './types';
import { ExitCode } from './types';

export type VerifyTarget = 'tv' | 'hue';

export const VERIFY_TARGETS: readonly VerifyTarget[] = ['tv', 'hue'];

const log = createLogger('Verify');

export function isVerifyTarget(value: string): value is VerifyTarget {
  return VERIFY_TARGETS.some((target) => target === value);
}

/**
 * Fetch a single frame and print every zone
 */
export async function verifyTv(engine: Engine): Promise<ExitCode> {
  log.info(`Reading ambilight from TV (JointSpace v${engine.tv.apiVersion})`);
  const outcome = await engine.source.sample();
  if (outcome.kind !== 'frame') {
    log.error(`TV check failed (${outcome.kind}): ${outcome.error.message}`);
    return ExitCode.DeviceNeverFound;
  }

  outcome.frame.zones.forEach(([r, g, b], index) => {
    log.info(`zone ${index}: (${r}, ${g}, ${b})`);
  });
  log.info(engine.source.isBlackScreen(outcome.frame) ? 'Screen is black' : 'Picture detected');
  return ExitCode.Ok;
}

/**
 * Open a session, paint every fixture red, then release the area
 */
export async function verifyHue(engine: Engine, config: EngineConfig): Promise<ExitCode> {
  log.info(`Opening entertainment stream on bridge ${config.bridge.ip}`);
  const handle = await engine.session.open();
  try {
    const red: FixtureColor[] = config.fixtures.map((fixture) => ({ fixture: fixture.name, color: [255, 0, 0] }));
    await engine.session.send(handle, red);
    log.info(`Sent red to ${red.length} fixture(s): ${red.map((c) => c.fixture).join(', ')}`);
  } finally {
    await engine.session.close(handle);
  }
  return ExitCode.Ok;
}
