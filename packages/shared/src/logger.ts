/**
 * Pino Logger Factory
 *
 * Structured logging for the sheet packages via pino.
 * Provides typed loggers with module bindings.
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Log level */
  level?: "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";
  /** Enable pretty printing (for development) */
  pretty?: boolean;
  /** Base bindings (always included in logs) */
  base?: Record<string, unknown>;
  /** Custom transport */
  transport?: LoggerOptions["transport"];
  /** Write to this stream instead of stdout (ignored when a transport is used) */
  destination?: DestinationStream;
}

function envLevel(): LoggerConfig["level"] {
  const level = process.env.LOG_LEVEL;
  switch (level) {
    case "trace":
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "fatal":
    case "silent":
      return level;
    default:
      return "info";
  }
}

/**
 * Default logger configuration
 */
const DEFAULT_CONFIG: LoggerConfig = {
  level: envLevel(),
  pretty: process.env.NODE_ENV === "development",
  base: {
    service: "docksheet",
  },
};

/**
 * Create a pino logger instance
 */
export function createLogger(config?: LoggerConfig): Logger {
  const mergedConfig = { ...DEFAULT_CONFIG, ...config };

  const options: LoggerOptions = {
    level: mergedConfig.level,
    base: mergedConfig.base,
  };

  if (mergedConfig.transport) {
    options.transport = mergedConfig.transport;
  } else if (mergedConfig.pretty && !mergedConfig.destination) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  if (mergedConfig.destination && !options.transport) {
    return pino(options, mergedConfig.destination);
  }
  return pino(options);
}

/**
 * Logger surface used across the sheet packages
 */
export interface RuntimeLogger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: Error | Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): RuntimeLogger;
}

/**
 * Create a runtime logger wrapper
 */
export function createRuntimeLogger(config?: LoggerConfig & { module?: string }): RuntimeLogger {
  const base = createLogger(config);
  const logger = config?.module ? base.child({ module: config.module }) : base;

  return wrapLogger(logger);
}

function wrapLogger(logger: Logger): RuntimeLogger {
  return {
    trace: (msg, data) => (data ? logger.trace(data, msg) : logger.trace(msg)),
    debug: (msg, data) => (data ? logger.debug(data, msg) : logger.debug(msg)),
    info: (msg, data) => (data ? logger.info(data, msg) : logger.info(msg)),
    warn: (msg, data) => (data ? logger.warn(data, msg) : logger.warn(msg)),
    error: (msg, err) => {
      if (err instanceof Error) {
        logger.error({ err }, msg);
      } else if (err) {
        logger.error(err, msg);
      } else {
        logger.error(msg);
      }
    },
    child: (bindings) => wrapLogger(logger.child(bindings)),
  };
}

export type { Logger } from "pino";

let defaultLogger: RuntimeLogger | null = null;

/**
 * Get or create the default runtime logger, optionally scoped to a module
 */
export function getLogger(module?: string): RuntimeLogger {
  if (!defaultLogger) {
    defaultLogger = createRuntimeLogger();
  }
  return module ? defaultLogger.child({ module }) : defaultLogger;
}

/**
 * Replace the default logger (modules created afterwards pick it up)
 */
export function setDefaultLogger(logger: RuntimeLogger | null): void {
  defaultLogger = logger;
}
