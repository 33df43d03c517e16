/**
 * Universal Logger Interface
 * Compatible with Pino, Winston, console, and custom loggers
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * One log method, in the call shapes pino and winston both accept
 */
export interface LogMethod {
  (message: string, ...args: unknown[]): void;
  (obj: object, message?: string, ...args: unknown[]): void;
}

/**
 * Logger interface that works with popular logging libraries
 *
 * @example Pino
 * ```typescript
 * import pino from 'pino';
 * const client = createClient({ transport, logger: pino({ level: 'debug' }) });
 * ```
 *
 * @example Console
 * ```typescript
 * const client = createClient({ transport, logger: console });
 * ```
 */
export interface Logger {
  /** Detailed diagnostics: dial targets, connection reuse */
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[minLevel];
}

/**
 * Console adapter - wraps console to match Logger interface
 */
export const consoleLogger: Logger = {
  debug: (msgOrObj: string | object, ...args: unknown[]) => console.debug(msgOrObj, ...args),
  info: (msgOrObj: string | object, ...args: unknown[]) => console.info(msgOrObj, ...args),
  warn: (msgOrObj: string | object, ...args: unknown[]) => console.warn(msgOrObj, ...args),
  error: (msgOrObj: string | object, ...args: unknown[]) => console.error(msgOrObj, ...args),
};

/**
 * Silent logger - no output
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

function forward(logger: Logger, level: LogLevel, msgOrObj: string | object, args: unknown[]): void {
  if (typeof msgOrObj === 'string') {
    logger[level](msgOrObj, ...args);
    return;
  }
  const [message, ...rest] = args;
  logger[level](msgOrObj, typeof message === 'string' ? message : undefined, ...rest);
}

/**
 * Create a logger that only logs at or above the specified level
 */
export function createLevelLogger(baseLogger: Logger, minLevel: LogLevel): Logger {
  const gate =
    (level: LogLevel) =>
    (msgOrObj: string | object, ...args: unknown[]): void => {
      if (isLevelEnabled(level, minLevel)) {
        forward(baseLogger, level, msgOrObj, args);
      }
    };

  return {
    debug: gate('debug'),
    info: gate('info'),
    warn: gate('warn'),
    error: gate('error'),
  };
}
