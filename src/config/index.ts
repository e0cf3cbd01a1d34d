/**
 * Process configuration.
 * Validates and exposes typed values read from the environment.
 */

import { ConfigError, maybeEnv, optionalEnv, optionalEnvBool } from "./env.js";
import { LOG_LEVELS, isLogLevel, type LogLevel } from "../logging/logger.js";

export { ConfigError } from "./env.js";

// Re-export .debyrc configuration module
export * from "./deby/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode; forces the debug log level */
  readonly debug: boolean;
  /** Log level as given; checked by validateConfig() */
  readonly logLevel: string;
  /** Path of the .debyrc file */
  readonly configFile: string;
  /** Directory receiving changelog and control */
  readonly debianDir: string;
  /** Optional log file; file logging is off when unset */
  readonly logFile: string | undefined;
}

/**
 * Read configuration from the environment.
 * Called on every access so tests can change process.env between runs.
 */
export function loadAppConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    configFile: optionalEnv("DEBY_CONFIG", ".debyrc"),
    debianDir: optionalEnv("DEBY_DEBIAN_DIR", "debian"),
    logFile: maybeEnv("DEBY_LOG_FILE"),
  };
}

/**
 * Validate process configuration.
 * Call this at startup to fail fast.
 *
 * @returns The effective log level
 * @throws ConfigError on an unknown NODE_ENV or LOG_LEVEL
 */
export function validateConfig(config: AppConfig): LogLevel {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be ${LOG_LEVELS.join(", ")}.`
    );
  }

  return config.debug ? "debug" : config.logLevel;
}
