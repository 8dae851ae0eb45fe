/**
 * @conductor/shared/logger
 *
 * Centralized logging infrastructure using Pino
 */

export { createLogger, serializeError } from "./logger.js";

export { LOG_LEVELS } from "./types.js";
export type { LogLevel, Logger, LoggerConfig, LoggerContext } from "./types.js";

export { getDefaultConfig, getPackageLogLevel, parseLogLevel } from "./config.js";

export { createLogFormatter, createPrefix } from "./formatters.js";
