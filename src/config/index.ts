/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvBool } from "./env.js";

export { ConfigError } from "./env.js";

/** Context file looked up when the caller names none. */
export const DEFAULT_CONTEXT_FILE = "treeplate.json";

/** Used in place of DEFAULT_CONTEXT_FILE when that file is absent. */
export const FALLBACK_CONTEXT_FILE = "treeplate.yml";

const ENVIRONMENTS: readonly string[] = ["development", "production", "test"];
const LOG_LEVELS: readonly string[] = ["debug", "info", "warn", "error"];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Also append log lines to a file under logDir */
  readonly logToFile: boolean;
  /** Directory for log files */
  readonly logDir: string;
  /** Context file name used by the CLI when --context is not given */
  readonly contextFile: string;
}

/**
 * Load configuration from the environment.
 * Fails fast on malformed boolean values.
 */
function loadConfig(): AppConfig {
  return Object.freeze({
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    logDir: optionalEnv("LOG_DIR", ".treeplate/logs"),
    contextFile: optionalEnv("TREEPLATE_CONTEXT_FILE", DEFAULT_CONTEXT_FILE),
  });
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate that the configuration values are usable.
 * Call this at application startup to fail fast.
 */
export function validateConfig(): void {
  if (!ENVIRONMENTS.includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be ${ENVIRONMENTS.join(", ")}.`
    );
  }

  if (!LOG_LEVELS.includes(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be ${LOG_LEVELS.join(", ")}.`
    );
  }
}
