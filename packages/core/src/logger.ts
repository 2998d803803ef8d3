/**
 * Logger handle accepted by every core component.
 *
 * The core never writes to the console on its own; callers pass a
 * logger in (the CLI passes its `log` module).
 */
export type Logger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

const noop = () => {
  /* silent */
};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/**
 * Prefixes every message with a scope, e.g. `[session-manager] ...`.
 */
export function scopedLogger(logger: Logger, scope: string): Logger {
  return {
    debug: (message) => logger.debug(`[${scope}] ${message}`),
    info: (message) => logger.info(`[${scope}] ${message}`),
    warn: (message) => logger.warn(`[${scope}] ${message}`),
    error: (message) => logger.error(`[${scope}] ${message}`),
  };
}
