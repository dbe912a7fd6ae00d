/**
 * Exit hooks for hostprep.
 *
 * Hooks run once on every exit path: success, failure, or a terminating
 * signal. They never change the exit code.
 */

import { log } from "./logger.js";

export type ExitHook = (code: number) => void;

const hooks: ExitHook[] = [];
let installed = false;

/** Run every registered hook. A throwing hook is logged and the rest still run. */
export function runExitHooks(code: number): void {
  for (const hook of hooks.splice(0)) {
    try {
      hook(code);
    } catch (e) {
      log.debug(`Exit hook failed: ${String(e)}`);
    }
  }
}

/**
 * Register a hook to run at process exit.
 *
 * The first call also installs the process handlers. SIGINT and SIGTERM exit
 * with 128 + signal number so the hooks still run.
 */
export function onExit(hook: ExitHook): void {
  hooks.push(hook);
  if (installed) {return;}
  installed = true;

  process.once("exit", runExitHooks);
  process.once("SIGINT", () => process.exit(130));
  process.once("SIGTERM", () => process.exit(143));
}

/** Nothing is left behind by a run, so cleanup only records the exit. */
export function cleanup(code: number): void {
  log.debug(`Exiting with code ${code}`);
}
