export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  debug?: boolean;
  sink?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

/**
 * Console-backed logger that prefixes every line with `[scope]`.
 * Debug lines are dropped unless `debug` is enabled.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? console;
  const prefix = `[${scope}]`;
  return {
    debug: (message) => {
      if (options.debug) {
        sink.debug(`${prefix} ${message}`);
      }
    },
    info: (message) => sink.info(`${prefix} ${message}`),
    warn: (message) => sink.warn(`${prefix} ${message}`),
    error: (message) => sink.error(`${prefix} ${message}`),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
