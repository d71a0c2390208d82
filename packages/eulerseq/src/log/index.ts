export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type Logger = {
  debug: (msg: string, ...args: unknown[]) => void;
  info: (msg: string, ...args: unknown[]) => void;
  warn: (msg: string, ...args: unknown[]) => void;
  error: (msg: string, ...args: unknown[]) => void;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LEVEL_RANK, value);

export function defaultLogLevel(): LogLevel {
  const raw = process.env.EULERSEQ_LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : 'warn';
}

/**
 * Scoped console logger. Output is tagged `[eulerseq:<scope>]`; calls below
 * `level` are dropped.
 */
export function createLogger(scope: string, level: LogLevel = defaultLogLevel()): Logger {
  const tag = `[eulerseq:${scope}]`;
  const threshold = LEVEL_RANK[level];
  const enabled = (at: LogLevel) => LEVEL_RANK[at] >= threshold;

  return {
    debug(msg, ...args) {
      if (enabled('debug')) console.debug(`${tag} ${msg}`, ...args);
    },
    info(msg, ...args) {
      if (enabled('info')) console.info(`${tag} ${msg}`, ...args);
    },
    warn(msg, ...args) {
      if (enabled('warn')) console.warn(`${tag} ${msg}`, ...args);
    },
    error(msg, ...args) {
      if (enabled('error')) console.error(`${tag} ${msg}`, ...args);
    },
  };
}
