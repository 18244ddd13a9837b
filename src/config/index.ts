/**
 * Application configuration.
 * Environment-driven settings for the CLI and default loggers.
 */

import { ConfigError, optionalEnv, optionalEnvBool, optionalEnvChoice } from "./env.js";
import type { LogLevel } from "../logging/logger.js";

export { ConfigError } from "./env.js";

// Pipeline configuration (steps, failure policy, step parameters)
export * from "./pipeline/index.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;
const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type Environment = (typeof ENVIRONMENTS)[number];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: Environment;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level when a pipeline config does not set one (default: warn in production, else info) */
  readonly logLevel: LogLevel;
  /** Append log lines to a file as well as the console */
  readonly logToFile: boolean;
  /** Directory for log files */
  readonly logDir: string;
}

/**
 * Log level used when LOG_LEVEL is unset: quieter in production.
 */
export function defaultLogLevel(env: Environment): LogLevel {
  return env === "production" ? "warn" : "info";
}

/**
 * Read application configuration from the environment.
 * Throws ConfigError on malformed values.
 */
export function loadAppConfig(): AppConfig {
  const env = optionalEnvChoice("NODE_ENV", ENVIRONMENTS, "development");

  return Object.freeze({
    env,
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnvChoice("LOG_LEVEL", LOG_LEVELS, defaultLogLevel(env)),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
  });
}

let cached: AppConfig | null = null;

/**
 * Application configuration singleton, read on first access.
 */
export function getAppConfig(): AppConfig {
  if (cached === null) {
    cached = loadAppConfig();
  }
  return cached;
}

/**
 * Validate the environment at startup so a bad value fails fast.
 */
export function validateConfig(): AppConfig {
  try {
    return getAppConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      throw err;
    }
    throw new ConfigError(
      `Failed to read configuration: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}
