/**
 * Unified logging abstraction for safecrate.
 *
 * Centralizes all console output with consistent styling and log levels.
 * Uses picocolors for terminal styling.
 *
 * IMPORTANT: All safecrate output MUST go through this module.
 * Never use console.log/console.error directly in other modules.
 */

import pc from "picocolors";

/** Log levels in order of verbosity (debug is most verbose). */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

interface LoggerConfig {
  level: LogLevel;
  /** If true, suppress ALL output including errors */
  quiet: boolean;
}

const config: LoggerConfig = {
  level: LogLevel.INFO,
  quiet: false,
};

function canOutput(level: LogLevel): boolean {
  return !config.quiet && config.level <= level;
}

/**
 * Enable quiet mode: suppress ALL output.
 * Only exit codes communicate success/failure.
 */
export function enableQuietMode(): void {
  config.quiet = true;
  config.level = LogLevel.SILENT;
}

/** Restore normal output. */
export function disableQuietMode(): void {
  config.quiet = false;
  config.level = LogLevel.INFO;
}

export function isQuiet(): boolean {
  return config.quiet;
}

/** Set the minimum log level. Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

export function getLogLevel(): LogLevel {
  return config.level;
}

function formatMessage(message: string): string {
  return config.level === LogLevel.DEBUG ? `[safecrate] ${message}` : message;
}

/**
 * Logger object with level-aware methods.
 *
 * Usage:
 *   log.debug("$ docker ps -a")
 *   log.info("normal output")
 *   log.warn("warning message")
 *   log.error("error message")
 *   log.success("completed!")
 */
export const log = {
  /** Shown only at DEBUG level (--verbose). */
  debug(message: string): void {
    if (canOutput(LogLevel.DEBUG)) {
      console.log(pc.dim(formatMessage(message)));
    }
  },

  info(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(formatMessage(message));
    }
  },

  /** Yellow, to stderr. */
  warn(message: string): void {
    if (canOutput(LogLevel.WARN)) {
      console.warn(pc.yellow(formatMessage(message)));
    }
  },

  /** Red, to stderr. */
  error(message: string): void {
    if (canOutput(LogLevel.ERROR)) {
      console.error(pc.red(formatMessage(message)));
    }
  },

  success(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.green(formatMessage(message)));
    }
  },

  dim(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.dim(formatMessage(message)));
    }
  },

  bold(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.bold(formatMessage(message)));
    }
  },

  /** Yellow highlight on stdout (info level, not a warning). */
  yellow(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.yellow(formatMessage(message)));
    }
  },

  newline(): void {
    if (canOutput(LogLevel.INFO)) {
      console.log();
    }
  },
};
