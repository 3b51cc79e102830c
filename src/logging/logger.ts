/**
 * Tagged console logging.
 *
 * Every line is prefixed with the component tag (`[SyncLoop] ...`). A single
 * process-wide level filters what reaches the console.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel];
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (message, ...args) => {
      if (isLevelEnabled('debug')) console.debug(prefix, message, ...args);
    },
    info: (message, ...args) => {
      if (isLevelEnabled('info')) console.log(prefix, message, ...args);
    },
    warn: (message, ...args) => {
      if (isLevelEnabled('warn')) console.warn(prefix, message, ...args);
    },
    error: (message, ...args) => {
      if (isLevelEnabled('error')) console.error(prefix, message, ...args);
    },
  };
}
