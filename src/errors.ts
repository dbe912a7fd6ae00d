/**
 * Unified exception hierarchy for hostprep.
 *
 * All custom exceptions inherit from HostprepError for consistent error handling.
 * CLI catches these and converts to exit codes and user-friendly messages.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 *   It may be imported by: all other hostprep modules.
 *   It should NOT import from any other hostprep modules.
 */

/**
 * Base exception for all hostprep errors.
 */
export class HostprepError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HostprepError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration-related errors.
 *
 * Examples:
 *   - Explicit config file that does not exist
 *   - Config file that cannot be read
 */
export class ConfigError extends HostprepError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Input validation errors.
 *
 * Examples:
 *   - Package name that the package manager would reject or read as a flag
 *   - Invalid service account name
 */
export class ValidationError extends HostprepError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Base class for failures while changing the host. */
export class ProvisionError extends HostprepError {
  constructor(message: string) {
    super(message);
    this.name = "ProvisionError";
  }
}

/** Raised (or returned) when a package install command exits non-zero. */
export class InstallError extends ProvisionError {
  readonly packageName: string;
  /** Exit code of the failing command; becomes the process exit code. */
  readonly exitCode: number;
  /** The command line that failed, for diagnostics. */
  readonly command: string;

  constructor(packageName: string, exitCode: number, command: string, detail?: string) {
    super(`Installation of ${packageName} failed with exit code ${exitCode}${detail ? `: ${detail}` : ""}`);
    this.name = "InstallError";
    this.packageName = packageName;
    this.exitCode = exitCode;
    this.command = command;
  }
}

/**
 * Extract error details from an unknown error for user-friendly messages.
 *
 * Handles execa-style errors with stderr/shortMessage, plus standard Error objects.
 * Truncates output to maxLength to avoid overwhelming log output.
 *
 * @param error - Unknown error to extract details from.
 * @param maxLength - Maximum length of returned string (default: 1000).
 * @returns Human-readable error details.
 */
export function extractErrorDetails(error: unknown, maxLength = 1000): string {
  if (!(error instanceof Error)) {
    return String(error).slice(0, maxLength);
  }

  if ("stderr" in error && typeof error.stderr === "string" && error.stderr) {
    return error.stderr.slice(0, maxLength);
  }
  if ("shortMessage" in error && typeof error.shortMessage === "string" && error.shortMessage) {
    return error.shortMessage.slice(0, maxLength);
  }
  return error.message.slice(0, maxLength);
}
