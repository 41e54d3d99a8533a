/**
 * Pino logger factory with a narrow wrapper the rest of the package logs through.
 */

import pino, { type Logger, type LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
  level?: LogLevel;
  /** Pretty-print through pino-pretty (development only). */
  pretty?: boolean;
  /** Bindings included on every line. */
  base?: Record<string, unknown>;
  /** Child binding for the emitting module. */
  module?: string;
}

export interface RuntimeLogger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: unknown): void;
  child(bindings: Record<string, unknown>): RuntimeLogger;
}

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function levelFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return LOG_LEVELS.find((level) => level === raw) ?? "info";
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    level: config.level ?? levelFromEnv(),
    base: config.base ?? { service: "deskpilot" },
  };

  if (config.pretty ?? process.env.LOG_PRETTY === "1") {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return pino(options);
}

export function createRuntimeLogger(config: LoggerConfig = {}): RuntimeLogger {
  const base = createLogger(config);
  return wrapLogger(config.module ? base.child({ module: config.module }) : base);
}

export function createSilentLogger(): RuntimeLogger {
  return createRuntimeLogger({ level: "silent", pretty: false });
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
      } else if (err !== undefined) {
        logger.error({ detail: err }, msg);
      } else {
        logger.error(msg);
      }
    },
    child: (bindings) => wrapLogger(logger.child(bindings)),
  };
}

let defaultLogger: RuntimeLogger | null = null;

export function getLogger(): RuntimeLogger {
  if (!defaultLogger) {
    defaultLogger = createRuntimeLogger();
  }
  return defaultLogger;
}
