/**
 * Unified error handling utilities for hostprep.
 *
 * Maps failures to process exit codes and logs them with a hint where the
 * exit code is a well-known one.
 */

import { extractErrorDetails, HostprepError, InstallError } from "./errors.js";
import { log } from "./logger.js";

/** Hints for well-known install command exit codes. */
const EXIT_CODE_SUGGESTIONS: Record<number, string> = {
  100: "Run 'apt-get update' and check that the package name exists", // apt-get
  124: "Check network access to the package mirror", // timed out
  127: "Install the package manager first (or check PATH)", // not found
};

export function getExitCodeSuggestion(code: number): string | undefined {
  return EXIT_CODE_SUGGESTIONS[code];
}

/**
 * Check if an exit code indicates user-initiated termination (not an error).
 */
export function isUserTermination(code: number): boolean {
  return code === 130 || code === 143; // SIGINT (Ctrl+C) or SIGTERM
}

/**
 * Process exit code for an error: the failing command's own code for
 * install failures, 1 for everything else.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof InstallError) {
    return error.exitCode === 0 ? 1 : error.exitCode;
  }
  return 1;
}

/**
 * Log an error with context.
 *
 * @param error - The error object
 * @param operation - What operation was being performed
 */
export function logError(error: unknown, operation: string): void {
  log.error(`Failed to ${operation}: ${extractErrorDetails(error)}`);

  if (error instanceof InstallError) {
    log.dim(`Command: ${error.command}`);
    if (!isUserTermination(error.exitCode)) {
      const suggestion = getExitCodeSuggestion(error.exitCode);
      if (suggestion) {
        log.dim(suggestion);
      }
    }
  }

  // Stack traces only help for unexpected errors
  if (!(error instanceof HostprepError) && error instanceof Error && error.stack) {
    log.debug(error.stack);
  }
}
