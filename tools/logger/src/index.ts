type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

interface GetLoggerOptions {
  /**
   * Lowest level that is written (default: 'info')
   */
  level?: LogLevel;

  /**
   * Sink for the enabled levels (default: console)
   */
  sink?: LoggerMethods;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50,
};

const noop: LogFn = () => {};

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

/**
 * Create a Logger that drops every call below `level`.
 *
 * @example
 * ```typescript
 * const logger = getLogger({ level: 'warn' });
 * logger.info('dropped');
 * logger.warn('written');
 * ```
 */
function getLogger(options: GetLoggerOptions = {}): Logger {
  const threshold = LOG_LEVEL_ORDER[options.level ?? 'info'];
  const sink: LoggerMethods = options.sink ?? {
    debug: (...args) => console.debug(...args),
    info: (...args) => console.info(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
  };

  const pick = (level: Exclude<LogLevel, 'silent'>): LogFn =>
    LOG_LEVEL_ORDER[level] >= threshold ? sink[level] : noop;

  return new Logger({
    debug: pick('debug'),
    info: pick('info'),
    warn: pick('warn'),
    error: pick('error'),
  });
}

export { Logger, getLogger, LOG_LEVEL_ORDER };
export type { GetLoggerOptions, LoggerMethods, LogFn, LogLevel };
