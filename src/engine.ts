import { createLogger } from './logging/logger';
import { HueEntertainmentTransport } from './streaming/HueEntertainmentTransport';
import { StreamSessionManager } from './streaming/StreamSessionManager';
import { SyncLoop } from './sync/SyncLoop';
import { AmbilightTvClient } from './tv/AmbilightTvClient';
import { ColorSampleSource } from './tv/ColorSampleSource';
import type { EngineConfig, StreamSessionState } from './types';

export interface Engine {
  tv: AmbilightTvClient;
  source: ColorSampleSource;
  session: StreamSessionManager;
  loop: SyncLoop;
}

const log = createLogger('Engine');

/**
 * Wire the TV adapter, bridge transport and sync loop from a validated config
 */
export function createEngine(config: EngineConfig): Engine {
  const tv = new AmbilightTvClient(config.tv);
  const source = new ColorSampleSource(tv, {
    timeoutMs: config.tv.requestTimeoutMs,
    zoneCount: config.tv.zoneCount,
    blackThreshold: config.blackThreshold,
  });

  const transport = new HueEntertainmentTransport({
    bridgeIp: config.bridge.ip,
    username: config.bridge.username,
    clientKey: config.bridge.clientKey,
    applicationId: config.bridge.applicationId,
    entertainmentConfigId: config.bridge.entertainmentConfigId,
    entertainmentIndex: config.bridge.entertainmentIndex,
    sendTimeoutMs: config.bridge.sendTimeoutMs,
  });
  const session = new StreamSessionManager(transport, {
    fixtures: config.fixtures,
    maxConsecutiveSendErrors: config.bridge.maxConsecutiveSendErrors,
  });
  session.on('stateChange', (state: StreamSessionState, previous: StreamSessionState) => {
    if (state === 'Open') {
      log.info('Entertainment stream open');
    } else if (state === 'Closed' && previous === 'Closing') {
      log.info('Entertainment stream closed');
    }
  });

  const loop = new SyncLoop({
    source,
    session,
    fixtures: config.fixtures,
    timing: config.timing,
    transitionSmoothing: config.transitionSmoothing,
  });

  return { tv, source, session, loop };
}
