/**
 * Logger type definitions for @conductor/shared/logger
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface LoggerContext {
  package: string; // 'server', 'shared'
  module?: string; // 'scheduler', 'store', 'api'
  runId?: string;
  taskId?: string;
  agent?: string; // Agent name when applicable
  implementer?: string;
  requestId?: string; // Request ID for API calls
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  fileOutput: boolean;
  filePath?: string;
  redact?: string[];
}

export interface Logger {
  debug(msg: string, context?: Partial<LoggerContext>): void;
  info(msg: string, context?: Partial<LoggerContext>): void;
  warn(msg: string, context?: Partial<LoggerContext>): void;
  error(msg: string, err?: Error, context?: Partial<LoggerContext>): void;
  child(context: Partial<LoggerContext>): Logger;
}
