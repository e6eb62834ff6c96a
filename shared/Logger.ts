/**
 * Logging
 * electron-log (node entry) configured for a headless bridge process.
 * File output stays off until configureLogging() enables it.
 */

import log from 'electron-log/node';

export interface Logger {
  error(...params: unknown[]): void;
  warn(...params: unknown[]): void;
  info(...params: unknown[]): void;
  debug(...params: unknown[]): void;
}

export interface LoggingOptions {
  verbose: boolean;
  filePath?: string;
}

const LOG_FORMAT = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}';
const MAX_LOG_FILE_SIZE = 10 * 1024 * 1024; // 10MB

log.transports.file.level = false;
log.transports.console.format = LOG_FORMAT;

export function configureLogging(options: LoggingOptions): void {
  log.transports.console.level = options.verbose ? 'debug' : 'info';

  if (options.filePath) {
    const filePath = options.filePath;
    log.transports.file.level = 'debug';
    log.transports.file.maxSize = MAX_LOG_FILE_SIZE;
    log.transports.file.format = LOG_FORMAT;
    log.transports.file.resolvePathFn = () => filePath;
  } else {
    log.transports.file.level = false;
  }
}

export function createLogger(scope: string): Logger {
  return log.scope(scope);
}

export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};
