export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export type LogContext = Record<string, unknown>;

export interface Logger {
  error: (message: string, error?: Error | LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  debug: (message: string, context?: LogContext) => void;
  trace: (message: string, context?: LogContext) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export const formatMessage = (level: LogLevel, message: string, context?: LogContext): string => {
  const timestamp = new Date().toISOString();
  const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
  return `[${timestamp}] [${level.toUpperCase()}] ${message}${suffix}`;
};

/**
 * Console logger with a mutable threshold.
 * The threshold starts from LOG_LEVEL and is raised or lowered by the CLI
 * verbosity flag.
 */
export function createLogger(initialLevel: LogLevel = 'info'): Logger & { setLevel: (level: LogLevel) => void; getLevel: () => LogLevel } {
  let threshold: LogLevel = initialLevel;

  const enabled = (level: LogLevel): boolean => LEVEL_RANK[level] <= LEVEL_RANK[threshold];

  return {
    setLevel: (level: LogLevel): void => {
      threshold = level;
    },
    getLevel: (): LogLevel => threshold,
    error: (message: string, error?: Error | LogContext): void => {
      if (error instanceof Error) {
        console.error(formatMessage('error', message));
        console.error(error.stack || error.message);
        return;
      }
      console.error(formatMessage('error', message, error));
    },
    warn: (message: string, context?: LogContext): void => {
      if (enabled('warn')) {
        console.warn(formatMessage('warn', message, context));
      }
    },
    info: (message: string, context?: LogContext): void => {
      if (enabled('info')) {
        console.info(formatMessage('info', message, context));
      }
    },
    debug: (message: string, context?: LogContext): void => {
      if (enabled('debug')) {
        console.debug(formatMessage('debug', message, context));
      }
    },
    trace: (message: string, context?: LogContext): void => {
      if (enabled('trace')) {
        console.debug(formatMessage('trace', message, context));
      }
    },
  };
}

const envLevel = process.env.LOG_LEVEL;

export const logger = createLogger(envLevel && isLogLevel(envLevel) ? envLevel : 'info');

/** Sink that drops everything; handy for library callers that want silence. */
export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
  trace: () => undefined,
};
