/**
 * Namespaced console logger.
 *
 * The level comes from `LOG_LEVEL` (silent, error, warn, info, debug). Without
 * it, tests run silent and everything else logs warnings and errors.
 */

export type LogLevelName = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  readonly namespace: string;
  readonly level: LogLevelName;
  error: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  debug: (message: string, ...details: unknown[]) => void;
  child: (name: string) => Logger;
}

const levelRank: Record<LogLevelName, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4
};

const isLogLevelName = (value: string): value is LogLevelName => Object.hasOwn(levelRank, value);

export const parseLogLevel = (value: string | undefined): LogLevelName | null => {
  const normalized = value?.trim().toLowerCase();

  if (!normalized || !isLogLevelName(normalized)) {
    return null;
  }

  return normalized;
};

export const resolveLogLevel = (env: NodeJS.ProcessEnv = process.env): LogLevelName => {
  const configured = parseLogLevel(env.LOG_LEVEL);

  if (configured) {
    return configured;
  }

  return env.NODE_ENV === 'test' ? 'silent' : 'warn';
};

export const createLogger = (namespace: string, level: LogLevelName = resolveLogLevel()): Logger => {
  const prefix = `[${namespace}]`;
  const enabled = (target: LogLevelName): boolean => levelRank[target] <= levelRank[level];

  /* eslint-disable no-console */
  return {
    namespace,
    level,
    error: (message, ...details) => {
      if (enabled('error')) {
        console.error(prefix, message, ...details);
      }
    },
    warn: (message, ...details) => {
      if (enabled('warn')) {
        console.warn(prefix, message, ...details);
      }
    },
    info: (message, ...details) => {
      if (enabled('info')) {
        console.info(prefix, message, ...details);
      }
    },
    debug: (message, ...details) => {
      if (enabled('debug')) {
        console.debug(prefix, message, ...details);
      }
    },
    child: (name) => createLogger(`${namespace}:${name}`, level)
  };
  /* eslint-enable no-console */
};
