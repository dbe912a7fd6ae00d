/**
 * Privilege elevation for install commands.
 */

import { SUDO_COMMAND } from "../constants.js";

export interface ElevatedCommand {
  readonly command: string;
  readonly args: string[];
}

/** True when the current process runs as root. Always false where uid is unknown. */
export function isRoot(): boolean {
  return process.getuid?.() === 0;
}

/**
 * Prefix a command with sudo when needed.
 *
 * @param sudo - true/false forces the choice; undefined means "only when not root".
 */
export function elevate(command: string, args: string[], sudo?: boolean): ElevatedCommand {
  const useSudo = sudo ?? !isRoot();
  return useSudo ? { command: SUDO_COMMAND, args: [command, ...args] } : { command, args };
}

/**
 * Run a command as another account, then elevate it again as that account.
 *
 * `sudo -u <account> sudo <command>` keeps the account's environment (HOME,
 * pip cache) while the install itself still runs privileged.
 */
export function asServiceAccount(account: string, command: string, args: string[]): ElevatedCommand {
  return { command: SUDO_COMMAND, args: ["-u", account, SUDO_COMMAND, command, ...args] };
}
