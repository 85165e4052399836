/**
 * Logger Interface
 * Structured logging abstraction; every component defaults to noopLogger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/* eslint-disable @typescript-eslint/no-empty-function */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
/* eslint-enable @typescript-eslint/no-empty-function */

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function write(level: LogLevel, message: string, context?: LogContext): void {
  const line = `[${level.toUpperCase()}] ${message}`;
  const sink = console[level];
  if (context) {
    sink(line, context);
  } else {
    sink(line);
  }
}

/**
 * Console logger writing one line per entry, context appended as an object
 */
export const consoleLogger: Logger = {
  debug: (message, context) => write('debug', message, context),
  info: (message, context) => write('info', message, context),
  warn: (message, context) => write('warn', message, context),
  error: (message, context) => write('error', message, context),
};

/**
 * Create a prefixed logger that adds a component prefix to all messages
 */
export function createPrefixedLogger(logger: Logger, prefix: string): Logger {
  return {
    debug: (message, context) => logger.debug(`[${prefix}] ${message}`, context),
    info: (message, context) => logger.info(`[${prefix}] ${message}`, context),
    warn: (message, context) => logger.warn(`[${prefix}] ${message}`, context),
    error: (message, context) => logger.error(`[${prefix}] ${message}`, context),
  };
}

/**
 * Drop entries below `minLevel`
 */
export function createLevelLogger(logger: Logger, minLevel: LogLevel): Logger {
  const threshold = LEVEL_ORDER[minLevel];
  const gate =
    (level: LogLevel) =>
    (message: string, context?: LogContext): void => {
      if (LEVEL_ORDER[level] >= threshold) {
        logger[level](message, context);
      }
    };
  return {
    debug: gate('debug'),
    info: gate('info'),
    warn: gate('warn'),
    error: gate('error'),
  };
}
