/**
 * @file Logger
 * @description Minimal leveled logger shared by the runtime, contracts and scripts
 */

/**
 * Logger interface for runtime operations
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Create a console logger that drops messages below `level`
 */
export function createLogger(prefix: string, level: LogLevel = "info"): Logger {
  const enabled = (target: LogLevel) => LEVEL_ORDER[target] >= LEVEL_ORDER[level];
  return {
    debug: (msg, ...args) => enabled("debug") && console.debug(`[${prefix}] ${msg}`, ...args),
    info: (msg, ...args) => enabled("info") && console.info(`[${prefix}] ${msg}`, ...args),
    warn: (msg, ...args) => enabled("warn") && console.warn(`[${prefix}] ${msg}`, ...args),
    error: (msg, ...args) => enabled("error") && console.error(`[${prefix}] ${msg}`, ...args),
  };
}

function levelFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(raw) ? raw : "warn";
}

/**
 * Default console logger, level taken from LOG_LEVEL (defaults to warn)
 */
export const defaultLogger: Logger = createLogger("badge", levelFromEnv());

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
