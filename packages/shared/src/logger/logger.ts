/**
 * Pino-backed logger
 *
 * All loggers of a process write through one transport per destination, so
 * creating many loggers never piles up exit listeners.
 */

import pino from "pino";
import { getDefaultConfig, getPackageLogLevel } from "./config.js";
import { createLogFormatter } from "./formatters.js";
import type { Logger, LoggerConfig, LoggerContext } from "./types.js";

type Transport = ReturnType<typeof pino.transport>;

const STDOUT = "stdout";
const transports = new Map<string, Transport>();

function prettyTarget(): pino.TransportTargetOptions {
  return {
    target: "pino-pretty",
    level: "debug",
    options: {
      colorize: true,
      translateTime: "HH:MM:ss",
      ignore: "pid,hostname,prefix,package,module",
      // string template: transport options are cloned into a worker thread
      messageFormat: "{prefix} {msg}",
    },
  };
}

function fileTarget(destination: string | number): pino.TransportTargetOptions {
  return {
    target: "pino/file",
    level: "debug",
    options: { destination, mkdir: true },
  };
}

function transportFor(config: LoggerConfig): Transport {
  const toFile = config.fileOutput && config.filePath;
  const key = toFile ? `file:${config.filePath}` : config.prettyPrint ? "pretty" : STDOUT;

  let transport = transports.get(key);
  if (!transport) {
    const target = toFile
      ? fileTarget(config.filePath ?? 1)
      : config.prettyPrint
        ? prettyTarget()
        : fileTarget(1);
    transport = pino.transport({ targets: [target] });
    transports.set(key, transport);
  }
  return transport;
}

export function serializeError(err: Error): Record<string, unknown> {
  return {
    name: err.name,
    message: err.message,
    stack: err.stack,
    cause: err.cause,
  };
}

class PinoLogger implements Logger {
  public constructor(
    private readonly pinoLogger: pino.Logger,
    private readonly context: LoggerContext
  ) {}

  public debug(msg: string, context?: Partial<LoggerContext>): void {
    this.pinoLogger.debug(this.fields(context), msg);
  }

  public info(msg: string, context?: Partial<LoggerContext>): void {
    this.pinoLogger.info(this.fields(context), msg);
  }

  public warn(msg: string, context?: Partial<LoggerContext>): void {
    this.pinoLogger.warn(this.fields(context), msg);
  }

  public error(msg: string, err?: Error, context?: Partial<LoggerContext>): void {
    const fields = this.fields(context);
    this.pinoLogger.error(err ? { ...fields, err: serializeError(err) } : fields, msg);
  }

  public child(context: Partial<LoggerContext>): Logger {
    return new PinoLogger(this.pinoLogger.child(context), { ...this.context, ...context });
  }

  private fields(context?: Partial<LoggerContext>): LoggerContext {
    return { ...this.context, ...context };
  }
}

/**
 * Logger for one package. The level comes from LOG_LEVEL_<PACKAGE>, then
 * LOG_LEVEL, unless `config.level` is given.
 */
export function createLogger(packageName: string, config: Partial<LoggerConfig> = {}): Logger {
  const resolved: LoggerConfig = {
    ...getDefaultConfig(),
    level: getPackageLogLevel(packageName),
    ...config,
  };

  const options: pino.LoggerOptions = {
    level: resolved.level,
    redact: resolved.redact ?? [],
    formatters: { log: createLogFormatter(packageName) },
  };

  // silent loggers never start a transport worker
  const instance =
    resolved.level === "silent" ? pino(options) : pino(options, transportFor(resolved));

  return new PinoLogger(instance, { package: packageName });
}
