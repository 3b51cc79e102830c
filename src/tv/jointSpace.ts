/**
 * JointSpace API variants.
 *
 * Older TVs speak plain HTTP on 1925; API 6 moved to HTTPS on 1926 behind digest auth.
 * Everything above the TV client is version-agnostic.
 */

import type { AxiosInstance } from 'axios';
import { ConfigurationError } from '../errors';
import type { JointSpaceVersion, TvConfig } from '../types';
import { DigestAuth } from './digestAuth';

export interface JointSpaceApi {
  readonly version: JointSpaceVersion;
  readonly baseUrl: string;
  readonly supportsPowerState: boolean;
  authenticate(client: AxiosInstance): void;
}

interface VariantDefaults {
  protocol: 'http' | 'https';
  port: number;
  supportsPowerState: boolean;
  requiresAuth: boolean;
}

const VARIANTS: Record<JointSpaceVersion, VariantDefaults> = {
  1: { protocol: 'http', port: 1925, supportsPowerState: false, requiresAuth: false },
  5: { protocol: 'http', port: 1925, supportsPowerState: true, requiresAuth: false },
  6: { protocol: 'https', port: 1926, supportsPowerState: true, requiresAuth: true },
};

export function createJointSpaceApi(config: TvConfig): JointSpaceApi {
  const variant = VARIANTS[config.apiVersion];
  const protocol = config.protocol ?? variant.protocol;
  const port = config.port ?? variant.port;
  const baseUrl = `${protocol}://${config.ip}:${port}/${config.apiVersion}`;

  if (!variant.requiresAuth) {
    return {
      version: config.apiVersion,
      baseUrl,
      supportsPowerState: variant.supportsPowerState,
      authenticate: () => undefined,
    };
  }

  const { user, password } = config;
  if (!user || !password) {
    throw new ConfigurationError(
      `JointSpace API ${config.apiVersion} needs the paired user and password (ambilight_tv.user / ambilight_tv.password)`
    );
  }

  return {
    version: config.apiVersion,
    baseUrl,
    supportsPowerState: variant.supportsPowerState,
    authenticate: (client) => new DigestAuth(user, password).attach(client),
  };
}
