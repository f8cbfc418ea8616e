/**
 * model-workflows: bind a formula or recipe preprocessor to a model
 * specification and fit both against a dataset in one step.
 */

export * from "./workflow/index.js";
export * from "./blueprint/index.js";
export * from "./preprocessing/index.js";
export * from "./models/index.js";
export * from "./data/index.js";
export {
  createLogger,
  getDefaultLogger,
  initRunId,
  getRunId,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logging/index.js";
export { config, validateConfig, ConfigError, type AppConfig } from "./config/index.js";
