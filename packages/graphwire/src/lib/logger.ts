import {
  getEnvVariable,
  isDevEnvironment,
  type EnvDetectionOverrides,
} from "./env-detection";

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Environment variable consulted when no level is configured explicitly. */
export const LOG_LEVEL_ENV = "GRAPHWIRE_LOG_LEVEL";

export interface Logger {
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

const SEVERITY: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function isLogger(value: unknown): value is Logger {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (["error", "warn", "info", "debug"] as const).every(
    (method) =>
      method in value && typeof Reflect.get(value, method) === "function",
  );
}

/**
 * Pick the effective level: an explicit level wins, then `GRAPHWIRE_LOG_LEVEL`,
 * then `warn` in development and `error` in production.
 */
export function resolveLogLevel(
  explicit?: LogLevel,
  env?: EnvDetectionOverrides,
): LogLevel {
  if (explicit) {
    return explicit;
  }
  const fromEnv = getEnvVariable(LOG_LEVEL_ENV, env)?.trim().toLowerCase();
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return isDevEnvironment(env) ? "warn" : "error";
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Appended to the `[graphwire]` prefix, e.g. `[graphwire:checkout]`. */
  name?: string;
}

export function createConsoleLogger(
  options: ConsoleLoggerOptions = {},
): Logger {
  const threshold = SEVERITY[options.level ?? resolveLogLevel()];
  const prefix = options.name ? `[graphwire:${options.name}]` : "[graphwire]";

  const emit =
    (level: Exclude<LogLevel, "silent">) =>
    (message: string, ...details: unknown[]): void => {
      if (SEVERITY[level] > threshold || typeof console === "undefined") {
        return;
      }
      console[level](`${prefix} ${message}`, ...details);
    };

  return {
    error: emit("error"),
    warn: emit("warn"),
    info: emit("info"),
    debug: emit("debug"),
  };
}

export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};
