import * as fs from 'fs/promises';
import * as path from 'path';
import type { ZodError } from 'zod';
import { ConfigurationError, errorMessage } from '../errors';
import { createLogger } from '../logging/logger';
import type { EngineConfig, Fixture } from '../types';
import {
  configFileSchema,
  legacyLightsSchema,
  lightListSchema,
  lightMapSchema,
  positionsSchema,
  type ConfigFile,
} from './configSchema';
import { validateFixtures } from './ZoneMixer';

export const CONFIG_ENV_VAR = 'AMBILIGHT_SYNC_CONFIG';

const LEGACY_LIGHT_KEYS = ['A', 'B', 'C', 'D', 'E', 'F', 'G', 'H'];

const log = createLogger('ConfigManager');

export class ConfigManager {
  private configPath: string;
  private explicitPath: boolean;
  private env: NodeJS.ProcessEnv;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath || path.join(process.cwd(), 'config.json');
    this.explicitPath = Boolean(configPath);
    this.env = env;
  }

  /**
   * Load configuration: an explicit path wins, then the inline environment variable,
   * then config.json in the working directory
   */
  async load(): Promise<EngineConfig> {
    const inline = this.env[CONFIG_ENV_VAR];
    if (inline && !this.explicitPath) {
      log.info(`Configuration loaded from ${CONFIG_ENV_VAR}`);
      return parseConfig(parseJson(inline, CONFIG_ENV_VAR));
    }

    let data: string;
    try {
      data = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new ConfigurationError(
          `No config file found at ${this.configPath}. Copy config.example.json and fill in your devices.`
        );
      }
      throw error;
    }

    const config = parseConfig(parseJson(data, this.configPath));
    log.info(`Configuration loaded from ${this.configPath}`);
    return config;
  }
}

/**
 * Validate raw configuration and build the engine's immutable view of it
 */
export function parseConfig(raw: unknown): EngineConfig {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError('Invalid configuration', formatIssues(result.error));
  }

  const file: ConfigFile = result.data;
  const tv = file.ambilight_tv;
  const hue = file.hue_entertainment_group;

  const fixtures = normalizeLights(file.lights_setup);
  validateFixtures(fixtures, tv.zone_count);

  const config: EngineConfig = {
    tv: Object.freeze({
      ip: tv.ip,
      apiVersion: tv.api_version,
      protocol: tv.protocol,
      port: tv.port,
      user: tv.user || undefined,
      password: tv.password || undefined,
      requestTimeoutMs: tv.request_timeout_ms,
      zoneCount: tv.zone_count,
    }),
    bridge: Object.freeze({
      ip: hue.ip,
      username: hue.username,
      clientKey: hue.client_key,
      applicationId: hue.app_id,
      entertainmentConfigId: hue.entertainment_config_id,
      entertainmentIndex: hue.index,
      sendTimeoutMs: hue.send_timeout_ms,
      maxConsecutiveSendErrors: hue.max_consecutive_send_errors,
    }),
    fixtures: Object.freeze(fixtures),
    timing: Object.freeze({
      refreshRateMs: tv.refresh_rate_ms,
      idleRefreshRateMs: tv.idle_refresh_rate_ms,
      errorBackoffMs: tv.error_backoff_ms,
      blackScreenTimeoutS: tv.black_screen_timeout_s,
      powerCheckAfterS: tv.power_check_after_s,
      waitForStartupS: tv.wait_for_startup_s,
      runtimeErrorThreshold: tv.runtime_error_threshold,
      statusIntervalS: tv.status_interval_s,
    }),
    transitionSmoothing: tv.transition_smoothing,
    blackThreshold: tv.black_threshold,
  };

  return Object.freeze(config);
}

/**
 * Collapse the accepted `lights_setup` layouts into one fixture list:
 * a list of lights, a map keyed by light name, or the old A_name/A_id/A_positions form.
 */
export function normalizeLights(raw: unknown): Fixture[] {
  const list = lightListSchema.safeParse(raw);
  if (list.success) {
    return list.data.map((light) => fixture(light.name, light.id, light.positions));
  }

  const map = lightMapSchema.safeParse(raw);
  if (map.success) {
    return Object.entries(map.data).map(([name, light]) => fixture(name, light.id, light.positions));
  }

  const legacy = legacyLightsSchema.safeParse(raw);
  if (legacy.success) {
    return normalizeLegacyLights(legacy.data);
  }

  throw new ConfigurationError(
    "'lights_setup' must be a list of lights, a map of lights by name, or the A_name/A_id/A_positions layout",
    [...formatIssues(list.error, 'lights_setup'), ...formatIssues(map.error, 'lights_setup')]
  );
}

function normalizeLegacyLights(raw: Record<string, string | number | number[]>): Fixture[] {
  const fixtures: Fixture[] = [];
  const issues: string[] = [];

  for (const key of LEGACY_LIGHT_KEYS) {
    const name = raw[`${key}_name`];
    if (name === undefined) continue;

    const id = raw[`${key}_id`];
    const positions = positionsSchema.safeParse(raw[`${key}_positions`]);

    if (typeof name !== 'string' || name.length === 0) {
      issues.push(`lights_setup.${key}_name must be a non-empty string`);
    } else if (typeof id !== 'number' || !Number.isInteger(id) || id < 0) {
      issues.push(`lights_setup.${key}_id must be a channel number`);
    } else if (!positions.success) {
      issues.push(`lights_setup.${key}_positions must be a list of zone indices`);
    } else {
      fixtures.push(fixture(name, id, positions.data));
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid light setup', issues);
  }
  return fixtures;
}

function fixture(name: string, channelId: number, zones: number[]): Fixture {
  return Object.freeze({ name, channelId, zones: Object.freeze([...zones]) });
}

function formatIssues(error: ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const where = [prefix, ...issue.path].filter((part) => part !== undefined && part !== '').join('.');
    return where ? `${where}: ${issue.message}` : issue.message;
  });
}

function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Config in ${source} is not valid JSON: ${errorMessage(error)}`);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
