#!/usr/bin/env node
import { parseArgs } from 'util';
import { createEngine } from './engine';
import { ConfigurationError, errorMessage } from './errors';
import { createLogger, isLogLevel, setLogLevel } from './logging/logger';
import { ConfigManager } from './mapping/ConfigManager';
import { ExitCode } from './types';
import { isVerifyTarget, verifyHue, verifyTv, type VerifyTarget } from './verify';

const log = createLogger('App');

const USAGE = 'Usage: ambilight-hue-sync [--config <path>] [--loglevel debug|info|warn|error] [--verify tv|hue]';

interface CliOptions {
  configPath?: string;
  verify?: VerifyTarget;
}

function parseCli(argv: string[], env: NodeJS.ProcessEnv): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c' },
      loglevel: { type: 'string', short: 'l' },
      verify: { type: 'string' },
    },
    strict: true,
  });

  const level = values.loglevel ?? env.LOG_LEVEL;
  if (level !== undefined) {
    if (!isLogLevel(level)) {
      throw new ConfigurationError(`Unknown log level "${level}". ${USAGE}`);
    }
    setLogLevel(level);
  }

  if (values.verify !== undefined && !isVerifyTarget(values.verify)) {
    throw new ConfigurationError(`Unknown verify target "${values.verify}". ${USAGE}`);
  }

  return {
    configPath: values.config,
    verify: values.verify,
  };
}

class AmbilightSyncApp {
  private readonly controller = new AbortController();

  async start(options: CliOptions): Promise<ExitCode> {
    const config = await new ConfigManager(options.configPath).load();
    const engine = createEngine(config);

    if (options.verify === 'tv') {
      return verifyTv(engine);
    }
    if (options.verify === 'hue') {
      return verifyHue(engine, config);
    }

    log.info(
      `Syncing TV ${config.tv.ip} to bridge ${config.bridge.ip} (${config.fixtures.length} fixture(s))`
    );
    return engine.loop.run(this.controller.signal);
  }

  stop(): void {
    if (this.controller.signal.aborted) return;
    log.info('Stopping...');
    this.controller.abort();
  }
}

async function main(): Promise<ExitCode> {
  let options: CliOptions;
  try {
    options = parseCli(process.argv.slice(2), process.env);
  } catch (error) {
    log.error(errorMessage(error));
    return ExitCode.ConfigurationError;
  }

  const app = new AmbilightSyncApp();
  process.on('SIGINT', () => app.stop());
  process.on('SIGTERM', () => app.stop());

  try {
    return await app.start(options);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log.error(error.message);
      return ExitCode.ConfigurationError;
    }
    log.error('Fatal error:', error);
    return ExitCode.Fatal;
  }
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(ExitCode.Fatal);
  }
);
