/**
 * hostprep - idempotent package provisioning for Debian hosts.
 *
 * This is the main entry point for the hostprep npm package.
 */

// Re-export main types and functions
export { VERSION, DEFAULT_REQUIREMENTS } from "./constants.js";
export { Provisioner, orderRequirements, missingRequirements, type ProvisionerOptions, type TransitionListener } from "./provisioner.js";
export {
  AptInstaller,
  PipInstaller,
  createHostInstallers,
  hasInstalledSelection,
  hasListedPackage,
  type PackageInstaller,
  type InstallerSet,
} from "./installers/index.js";
export { loadHostprepConfig, resolveRequirements, type HostprepConfig } from "./config-file.js";
export { HostprepError, ConfigError, ValidationError, ProvisionError, InstallError } from "./errors.js";
export { ok, err, type Result } from "./result.js";
export type {
  InstallerKind,
  PackageRequirement,
  ProvisionReport,
  RequirementState,
  StepOutcome,
} from "./types/requirements.js";
