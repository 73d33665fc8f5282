import type { Logger, LoggerMeta, LogLevel } from './types';

/**
 * Logs to console.debug, console.info, console.warn, and console.error.
 */
export class ConsoleLogger implements Logger {
  debug(message: string, meta?: LoggerMeta): void {
    meta ? console.debug(`[debug] ${message}`, meta) : console.debug(`[debug] ${message}`);
  }
  info(message: string, meta?: LoggerMeta): void {
    meta ? console.info(`[info] ${message}`, meta) : console.info(`[info] ${message}`);
  }
  warn(message: string, meta?: LoggerMeta): void {
    meta ? console.warn(`[warn] ${message}`, meta) : console.warn(`[warn] ${message}`);
  }
  error(message: string, meta?: LoggerMeta): void {
    meta ? console.error(`[error] ${message}`, meta) : console.error(`[error] ${message}`);
  }
}

export const consoleLogger: Logger = new ConsoleLogger();

export const noopLogger: Logger = {
  debug: () => {
    /* no-op */
  },
  info: () => {
    /* no-op */
  },
  warn: () => {
    /* no-op */
  },
  error: () => {
    /* no-op */
  },
};

export function logAt(logger: Logger, level: LogLevel, message: string, meta?: LoggerMeta): void {
  logger[level](message, meta);
}
