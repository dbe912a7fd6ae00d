/**
 * Installer abstraction for hostprep.
 *
 * One implementation per package manager. The provisioner only talks to this
 * interface, so it can run against in-process fakes in tests.
 */

import type { InstallError } from "../errors.js";
import type { Result } from "../result.js";
import type { InstallerKind } from "../types/requirements.js";

export interface PackageInstaller {
  /** Which requirements this installer satisfies */
  readonly kind: InstallerKind;
  /** Shown in "Installing <name> via <label>" */
  readonly label: string;

  /**
   * Query the host. A query that fails to answer counts as "not installed".
   */
  isInstalled(name: string): Promise<boolean>;

  /** Install one package. Never throws for a failing install command. */
  install(name: string): Promise<Result<void, InstallError>>;
}

/** One installer per kind. */
export type InstallerSet = Readonly<Record<InstallerKind, PackageInstaller>>;
