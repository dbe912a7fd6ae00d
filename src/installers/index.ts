/**
 * Package installers for hostprep.
 *
 * Re-exports from specialized sub-modules:
 * - installer.ts: PackageInstaller interface
 * - detection.ts: listing parsers (hasInstalledSelection, hasListedPackage)
 * - apt.ts / pip.ts: concrete installers
 */

import { AptInstaller, type AptInstallerOptions } from "./apt.js";
import type { InstallerSet } from "./installer.js";
import { PipInstaller, type PipInstallerOptions } from "./pip.js";

export { type PackageInstaller, type InstallerSet } from "./installer.js";
export { escapeRegExp, hasInstalledSelection, hasListedPackage } from "./detection.js";
export { AptInstaller, type AptInstallerOptions } from "./apt.js";
export { PipInstaller, type PipInstallerOptions } from "./pip.js";
export { elevate, asServiceAccount, isRoot } from "./privilege.js";

/** Build the host installers (apt for system packages, pip for language packages). */
export function createHostInstallers(options: AptInstallerOptions & PipInstallerOptions = {}): InstallerSet {
  return {
    system: new AptInstaller(options),
    language: new PipInstaller(options),
  };
}
