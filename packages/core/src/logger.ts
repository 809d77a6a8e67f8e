/**
 * Tagged console logging: every line is written as `[tag] message`.
 *
 * The threshold comes from SIFT_LOG_LEVEL (debug | info | warn | error | silent),
 * defaulting to "warn" so library code stays quiet unless asked.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const DEFAULT_LOG_LEVEL: LogLevel = "warn";

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

/**
 * Resolve the active log level from the environment.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.SIFT_LOG_LEVEL?.trim().toLowerCase();
  if (raw !== undefined && isLogLevel(raw)) {
    return raw;
  }
  return DEFAULT_LOG_LEVEL;
}

/**
 * Create a logger whose lines are prefixed with `[tag]`.
 */
export function createLogger(tag: string, level: LogLevel = resolveLogLevel()): Logger {
  const threshold = LEVEL_RANK[level];
  const enabled = (candidate: LogLevel) => LEVEL_RANK[candidate] >= threshold;

  return {
    debug(message) {
      if (enabled("debug")) console.debug(`[${tag}] ${message}`);
    },
    info(message) {
      if (enabled("info")) console.info(`[${tag}] ${message}`);
    },
    warn(message) {
      if (enabled("warn")) console.warn(`[${tag}] ${message}`);
    },
    error(message) {
      if (enabled("error")) console.error(`[${tag}] ${message}`);
    },
  };
}

/** Logger that discards everything */
export const silentLogger: Logger = createLogger("silent", "silent");
