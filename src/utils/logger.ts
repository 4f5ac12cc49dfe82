/**
 * Logger for the conversion engine.
 *
 * The engine never writes to the console on its own: the default logger
 * discards everything. Hosts that want diagnostics install one with
 * `setLogger(consoleLogger)` or their own implementation.
 */

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, error?: unknown, ...args: unknown[]): void;
}

export const consoleLogger: Logger = {
  debug(message: string, ...args: unknown[]): void {
    console.debug(`[DEBUG] ${message}`, ...args);
  },
  info(message: string, ...args: unknown[]): void {
    console.info(`[INFO] ${message}`, ...args);
  },
  warn(message: string, ...args: unknown[]): void {
    console.warn(`[WARN] ${message}`, ...args);
  },
  error(message: string, error?: unknown, ...args: unknown[]): void {
    if (error !== undefined) {
      console.error(`[ERROR] ${message}`, error, ...args);
    } else {
      console.error(`[ERROR] ${message}`, ...args);
    }
  },
};

export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
};

let activeLogger: Logger = noopLogger;

export function setLogger(logger: Logger): void {
  activeLogger = logger;
}

export function getLogger(): Logger {
  return activeLogger;
}

/**
 * Logger that prefixes every message with a component name, resolved lazily so
 * a later `setLogger()` call still takes effect.
 */
export function createLogger(component: string): Logger {
  return {
    debug: (message, ...args) => activeLogger.debug(`[${component}] ${message}`, ...args),
    info: (message, ...args) => activeLogger.info(`[${component}] ${message}`, ...args),
    warn: (message, ...args) => activeLogger.warn(`[${component}] ${message}`, ...args),
    error: (message, error, ...args) => activeLogger.error(`[${component}] ${message}`, error, ...args),
  };
}
