/**
 * System package installer backed by dpkg and apt-get.
 */

import { APT_COMMAND, DPKG_COMMAND, ENV_COMMAND, INSTALL_TIMEOUT, QUERY_TIMEOUT } from "../constants.js";
import { InstallError } from "../errors.js";
import { exec, execInherit, formatCommand } from "../exec.js";
import { log } from "../logger.js";
import { err, ok, type Result } from "../result.js";
import { hasInstalledSelection } from "./detection.js";
import type { PackageInstaller } from "./installer.js";
import { elevate } from "./privilege.js";

export interface AptInstallerOptions {
  /** Force sudo on or off; default is "only when not root" */
  sudo?: boolean;
  queryTimeout?: number;
  installTimeout?: number;
}

export class AptInstaller implements PackageInstaller {
  readonly kind = "system" as const;
  readonly label = APT_COMMAND;

  constructor(private readonly options: AptInstallerOptions = {}) {}

  async isInstalled(name: string): Promise<boolean> {
    const result = await exec(DPKG_COMMAND, ["--get-selections"], {
      timeout: this.options.queryTimeout ?? QUERY_TIMEOUT,
    });
    if (result.exitCode !== 0) {
      log.debug(`${DPKG_COMMAND} query failed (exit ${result.exitCode}): ${result.stderr.trim()}`);
      return false;
    }
    return hasInstalledSelection(result.stdout, name);
  }

  async install(name: string): Promise<Result<void, InstallError>> {
    // sudo resets the environment, so DEBIAN_FRONTEND travels in argv
    const { command, args } = elevate(
      ENV_COMMAND,
      ["DEBIAN_FRONTEND=noninteractive", APT_COMMAND, "-y", "install", name],
      this.options.sudo
    );
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
