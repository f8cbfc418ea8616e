/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvBool, optionalEnvEnum } from "./env.js";
import type { LogLevel } from "../logging/index.js";

export { ConfigError } from "./env.js";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export const DUPLICATE_POLICIES = ["overwrite", "error"] as const;

/**
 * What happens when an action of the same kind is added to a workflow twice.
 */
export type DuplicatePolicy = (typeof DUPLICATE_POLICIES)[number];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: LogLevel;
  /** Append log lines to a file under logDir */
  readonly logToFile: boolean;
  /** Directory for log files */
  readonly logDir: string;
  /** Application name, also used as the log file name */
  readonly appName: string;
  /** Default duplicate-action policy for new workflows */
  readonly duplicatePolicy: DuplicatePolicy;
}

/**
 * Load and validate application configuration.
 * Fails fast on malformed values.
 */
function loadConfig(): AppConfig {
  return Object.freeze({
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnvEnum("LOG_LEVEL", LOG_LEVELS, "info"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    appName: optionalEnv("APP_NAME", "model-workflows"),
    duplicatePolicy: optionalEnvEnum(
      "WORKFLOW_DUPLICATE_POLICY",
      DUPLICATE_POLICIES,
      "overwrite"
    ),
  });
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate that the loaded configuration is usable.
 * Call this at application startup to fail fast.
 */
export function validateConfig(): void {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }
}
