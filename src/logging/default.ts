/**
 * Process-wide logger built from the application configuration.
 */

import { config } from "../config/index.js";
import { createLogger, type Logger } from "./logger.js";

let defaultLogger: Logger | null = null;

/**
 * Get the shared logger, creating it on first use.
 */
export function getDefaultLogger(): Logger {
  if (defaultLogger === null) {
    defaultLogger = createLogger({
      level: config.logLevel,
      logDir: config.logDir,
      logFile: `${config.appName}.log`,
      file: config.logToFile,
    });
  }
  return defaultLogger;
}
