/**
 * Core module exports for @lazyview/core
 *
 * This package provides:
 * - Configuration (env, config files, programmatic)
 * - Contract errors and precondition checks
 * - Scoped logging
 */

export { config, defineConfig, type LazyviewConfig, type ContractsConfig } from "./config.js";

export {
  ContractError,
  PreconditionError,
  InvariantError,
  ConfigError,
  requirePrecondition,
  requireArgument,
  type ConfigErrorReason,
} from "./errors.js";

export {
  createLogger,
  setLogWriter,
  formatLogLine,
  type Logger,
  type LogLevel,
  type LogWriter,
} from "./logger.js";
