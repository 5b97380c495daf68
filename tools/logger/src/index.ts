import { z } from 'zod';

type LogFn = (...args: unknown[]) => void;

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

const logLevelSchema = z.enum(LOG_LEVELS);

type LogLevel = z.infer<typeof logLevelSchema>;

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }
}

const noop: LogFn = () => {};

/**
 * Returns true when messages of `level` pass the `threshold`.
 */
function isLevelEnabled(
  level: Exclude<LogLevel, 'silent'>,
  threshold: LogLevel,
): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

/**
 * Parse a log level name (case-insensitive).
 * Unknown or empty values fall back to `fallback`.
 */
function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel = 'warn',
): LogLevel {
  const result = logLevelSchema.safeParse(value?.trim().toLowerCase());
  return result.success ? result.data : fallback;
}

/**
 * Create a Logger that writes to the console.
 *
 * Every level goes to stderr so that stdout only carries program output.
 */
function createConsoleLogger(options: { level?: LogLevel } = {}): Logger {
  const { level = 'info' } = options;

  return new Logger({
    debug: isLevelEnabled('debug', level)
      ? (...args) => console.error(...args)
      : noop,
    info: isLevelEnabled('info', level)
      ? (...args) => console.error(...args)
      : noop,
    warn: isLevelEnabled('warn', level)
      ? (...args) => console.warn(...args)
      : noop,
    error: isLevelEnabled('error', level)
      ? (...args) => console.error(...args)
      : noop,
  });
}

export {
  LOG_LEVELS,
  Logger,
  createConsoleLogger,
  isLevelEnabled,
  logLevelSchema,
  parseLogLevel,
};
export type { LoggerMethods, LogFn, LogLevel };
