/**
 * Unified logging abstraction for hostprep.
 *
 * Centralizes all console output with consistent styling and log levels.
 * Uses picocolors for terminal styling.
 *
 * IMPORTANT: All hostprep output MUST go through this module.
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

/** Logger configuration. */
interface LoggerConfig {
  level: LogLevel;
  /** If true, suppress ALL output including errors */
  quiet: boolean;
}

/** Global logger configuration. */
const config: LoggerConfig = {
  level: LogLevel.INFO,
  quiet: false,
};

/**
 * Check if output is allowed at current level.
 */
function canOutput(level: LogLevel): boolean {
  return !config.quiet && config.level <= level;
}

/**
 * Enable quiet mode: suppress ALL output, including the package managers'.
 * Only exit codes communicate success/failure.
 */
export function enableQuietMode(): void {
  config.quiet = true;
  config.level = LogLevel.SILENT;
}

/**
 * Check if quiet mode is enabled.
 */
export function isQuiet(): boolean {
  return config.quiet;
}

/**
 * Set the minimum log level. Messages below this level are suppressed.
 */
export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

/**
 * Logger object with level-aware methods.
 *
 * Usage:
 *   log.debug("+ dpkg --get-selections")
 *   log.info("Installing python3 via apt-get")
 *   log.warn("python3 is not installed")
 *   log.error("Installation of python3 failed")
 *   log.success("Host is provisioned")
 */
export const log = {
  /** Debug-level message, dim. Used for command traces. */
  debug(message: string): void {
    if (canOutput(LogLevel.DEBUG)) {
      console.log(pc.dim(message));
    }
  },

  /** Info-level message (default level), unstyled. */
  info(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(message);
    }
  },

  /** Warning, yellow, to stderr. */
  warn(message: string): void {
    if (canOutput(LogLevel.WARN)) {
      console.warn(pc.yellow(message));
    }
  },

  /** Error, red, to stderr. */
  error(message: string): void {
    if (canOutput(LogLevel.ERROR)) {
      console.error(pc.red(message));
    }
  },

  success(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.green(message));
    }
  },

  dim(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.dim(message));
    }
  },

  /**
   * Raw output without any styling (for composed `style` strings).
   * Respects log level (info).
   */
  raw(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(message);
    }
  },
};

/**
 * Styled string builders (for complex compositions).
 * These return styled strings without printing.
 *
 * Usage:
 *   log.raw(`${style.cyan("python3")} ${style.dim("system")}`)
 */
export const style = {
  dim: (text: string) => pc.dim(text),
  cyan: (text: string) => pc.cyan(text),
};
