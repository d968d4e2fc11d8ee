export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LoggerOptions {
  /** Send debug and info lines to stderr, leaving stdout for command output */
  stderrOnly?: boolean;
}

/**
 * Console logger with a `[tag]` prefix and a minimum level.
 *
 * debug/info go to stdout, warn/error to stderr.
 */
export function createLogger(
  tag: string,
  level: LogLevel = 'info',
  options: LoggerOptions = {}
): Logger {
  const enabled = (l: LogLevel) => PRIORITY[l] >= PRIORITY[level];
  const prefix = `[${tag}]`;
  const debugSink = options.stderrOnly ? console.error : console.debug;
  const infoSink = options.stderrOnly ? console.error : console.log;

  return {
    debug(message, ...args) {
      if (enabled('debug')) debugSink(prefix, message, ...args);
    },
    info(message, ...args) {
      if (enabled('info')) infoSink(prefix, message, ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(prefix, message, ...args);
    },
    error(message, ...args) {
      if (enabled('error')) console.error(prefix, message, ...args);
    },
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
