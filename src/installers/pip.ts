/**
 * Language package installer backed by pip3.
 */

import { DEFAULT_SERVICE_ACCOUNT, INSTALL_TIMEOUT, PIP_COMMAND, QUERY_TIMEOUT } from "../constants.js";
import { InstallError } from "../errors.js";
import { exec, execInherit, formatCommand } from "../exec.js";
import { log } from "../logger.js";
import { err, ok, type Result } from "../result.js";
import { hasListedPackage } from "./detection.js";
import type { PackageInstaller } from "./installer.js";
import { asServiceAccount, elevate, type ElevatedCommand } from "./privilege.js";

export interface PipInstallerOptions {
  /**
   * Account the install runs as. `null` installs directly (elevated when
   * needed). Defaults to DEFAULT_SERVICE_ACCOUNT.
   */
  serviceAccount?: string | null;
  /** Force sudo on or off when no service account is used */
  sudo?: boolean;
  queryTimeout?: number;
  installTimeout?: number;
}

export class PipInstaller implements PackageInstaller {
  readonly kind = "language" as const;
  readonly label = `python ${PIP_COMMAND}`;

  constructor(private readonly options: PipInstallerOptions = {}) {}

  get serviceAccount(): string | null {
    return this.options.serviceAccount === undefined ? DEFAULT_SERVICE_ACCOUNT : this.options.serviceAccount;
  }

  async isInstalled(name: string): Promise<boolean> {
    const result = await exec(PIP_COMMAND, ["list"], {
      timeout: this.options.queryTimeout ?? QUERY_TIMEOUT,
    });
    if (result.exitCode !== 0) {
      log.debug(`${PIP_COMMAND} list failed (exit ${result.exitCode}): ${result.stderr.trim()}`);
      return false;
    }
    return hasListedPackage(result.stdout, name);
  }

  /** The command line used to install `name`. */
  installCommand(name: string): ElevatedCommand {
    const args = ["install", name];
    const account = this.serviceAccount;
    return account === null
      ? elevate(PIP_COMMAND, args, this.options.sudo)
      : asServiceAccount(account, PIP_COMMAND, args);
  }

  async install(name: string): Promise<Result<void, InstallError>> {
    const { command, args } = this.installCommand(name);
    const result = await execInherit(command, args, {
      timeout: this.options.installTimeout ?? INSTALL_TIMEOUT,
    });
    if (result.exitCode !== 0) {
      const detail = result.notFound ? `${command} not found` : undefined;
      return err(new InstallError(name, result.exitCode, formatCommand(command, args), detail));
    }
    return ok(undefined);
  }
}
