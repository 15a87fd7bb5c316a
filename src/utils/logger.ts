/**
 * @fileoverview Leveled console logger.
 * Engine modules log through this interface and never print directly, so the
 * CLI can route lines around its spinner.
 */

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Options for creating a logger.
 */
export interface LoggerOptions {
  /** Minimum level written. Defaults to STATSYNC_LOG_LEVEL, then "info". */
  level?: LogLevel;
  /** Line sink. Defaults to console.log / console.error. */
  write?: (line: string, level: LogLevel) => void;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

function defaultWrite(line: string, level: LogLevel): void {
  if (level === "error" || level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
}

const FORMATTERS: Record<LogLevel, (message: string) => string> = {
  debug: (message) => chalk.dim(message),
  info: (message) => message,
  warn: (message) => chalk.yellow(`⚠ ${message}`),
  error: (message) => chalk.red(`✖ ${message}`),
};

/**
 * Creates a logger that writes chalk-formatted lines.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env.STATSYNC_LOG_LEVEL;
  const level: LogLevel =
    options.level ?? (isLogLevel(envLevel) ? envLevel : "info");
  const write = options.write ?? defaultWrite;

  const log = (at: LogLevel, message: string): void => {
    if (LOG_LEVELS[at] < LOG_LEVELS[level]) {
      return;
    }
    write(FORMATTERS[at](message), at);
  };

  return {
    debug: (message) => log("debug", message),
    info: (message) => log("info", message),
    warn: (message) => log("warn", message),
    error: (message) => log("error", message),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
