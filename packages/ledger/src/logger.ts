/**
 * Scoped console logger.
 *
 * debug/info are written only when debug is enabled; warn/error always are.
 */

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  scope: string;
  debug?: boolean;
}

export function createLogger(options: LoggerOptions): Logger {
  const prefix = `[${options.scope}]`;
  const verbose = options.debug ?? false;

  return {
    debug(message, ...args) {
      if (verbose) {
        console.debug(`${prefix} ${message}`, ...args);
      }
    },
    info(message, ...args) {
      if (verbose) {
        console.log(`${prefix} ${message}`, ...args);
      }
    },
    warn(message, ...args) {
      console.warn(`${prefix} ${message}`, ...args);
    },
    error(message, ...args) {
      console.error(`${prefix} ${message}`, ...args);
    },
  };
}
