/**
 * Command execution for hostprep, over execa.
 *
 * Both helpers resolve instead of rejecting on a non-zero exit, so callers
 * decide what a failure means. Every command is traced at debug level.
 */

import { execa, ExecaError } from "execa";

import { isQuiet, log } from "./logger.js";

/** Exit code reported when the command itself cannot be found (shell convention). */
export const EXIT_NOT_FOUND = 127;
/** Exit code reported when a command is killed by its timeout (timeout(1) convention). */
export const EXIT_TIMED_OUT = 124;

export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** The executable was not found in PATH */
  notFound: boolean;
  timedOut: boolean;
}

export interface ExecOptions {
  timeout?: number;
}

/** Render a command line for logs and error messages. */
export function formatCommand(cmd: string, args: readonly string[]): string {
  return [cmd, ...args].join(" ");
}

function failedResult(error: ExecaError): ExecResult {
  const notFound = error.code === "ENOENT";
  const timedOut = error.timedOut;
  let exitCode = error.exitCode ?? 1;
  if (notFound) {
    exitCode = EXIT_NOT_FOUND;
  } else if (timedOut) {
    exitCode = EXIT_TIMED_OUT;
  }
  return {
    exitCode,
    stdout: typeof error.stdout === "string" ? error.stdout : "",
    stderr: typeof error.stderr === "string" ? error.stderr : "",
    notFound,
    timedOut,
  };
}

/**
 * Execute a command and capture its output. Never rejects on command failure.
 */
export async function exec(cmd: string, args: string[], opts: ExecOptions = {}): Promise<ExecResult> {
  log.debug(`+ ${formatCommand(cmd, args)}`);
  try {
    const result = await execa(cmd, args, {
      timeout: opts.timeout,
      stdin: "ignore",
    });
    return {
      exitCode: result.exitCode ?? 0,
      stdout: result.stdout,
      stderr: result.stderr,
      notFound: false,
      timedOut: false,
    };
  } catch (error: unknown) {
    if (error instanceof ExecaError) {
      return failedResult(error);
    }
    throw error;
  }
}

/**
 * Execute with stdio inherited so the package manager's own progress and
 * errors reach the user. In quiet mode its output is discarded instead.
 * stdout/stderr of the result are always empty.
 */
export async function execInherit(cmd: string, args: string[], opts: ExecOptions = {}): Promise<ExecResult> {
  log.debug(`+ ${formatCommand(cmd, args)}`);
  try {
    const result = await execa(cmd, args, {
      timeout: opts.timeout,
      stdin: "ignore",
      stdout: isQuiet() ? "ignore" : "inherit",
      stderr: isQuiet() ? "ignore" : "inherit",
    });
    return { exitCode: result.exitCode ?? 0, stdout: "", stderr: "", notFound: false, timedOut: false };
  } catch (error: unknown) {
    if (error instanceof ExecaError) {
      return { ...failedResult(error), stdout: "", stderr: "" };
    }
    throw error;
  }
}
