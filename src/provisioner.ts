/**
 * Idempotent provisioning for hostprep.
 *
 * For each requirement: check the host, install when absent, log and move on
 * when present. The first failed install ends the run; nothing after it is
 * checked, and nothing before it is undone.
 *
 * Dependency direction:
 *   This module imports from: installers (interface only), logger, result, validation
 *   It should NOT import from: cli, config-file, exec
 */

import { DEFAULT_REQUIREMENTS } from "./constants.js";
import type { InstallError } from "./errors.js";
import type { InstallerSet, PackageInstaller } from "./installers/installer.js";
import { log } from "./logger.js";
import { err, ok, type Result } from "./result.js";
import type {
  PackageRequirement,
  ProvisionReport,
  RequirementState,
  StepOutcome,
} from "./types/requirements.js";
import { validatePackageName, validateRequirements } from "./validation.js";

/** Observer for every state change of every requirement. */
export type TransitionListener = (requirement: PackageRequirement, state: RequirementState) => void;

export interface ProvisionerOptions {
  installers: InstallerSet;
  /** Report only: query every requirement but never install */
  check?: boolean;
  onTransition?: TransitionListener;
}

/**
 * Order requirements so every system package comes before any language
 * package (the runtime and its installer must exist first). Order within
 * each group is kept.
 */
export function orderRequirements(requirements: readonly PackageRequirement[]): PackageRequirement[] {
  return [
    ...requirements.filter((r) => r.installer === "system"),
    ...requirements.filter((r) => r.installer === "language"),
  ];
}

export class Provisioner {
  private readonly installers: InstallerSet;
  private readonly check: boolean;
  private readonly onTransition?: TransitionListener;

  constructor(options: ProvisionerOptions) {
    this.installers = options.installers;
    this.check = options.check ?? false;
    this.onTransition = options.onTransition;
  }

  /** Ensure a package from the system package manager is installed. */
  ensureSystemPackage(name: string): Promise<Result<StepOutcome, InstallError>> {
    return this.ensure({ name, installer: "system" });
  }

  /** Ensure a library from the language package manager is installed. */
  ensureLanguagePackage(name: string): Promise<Result<StepOutcome, InstallError>> {
    return this.ensure({ name, installer: "language" });
  }

  /**
   * Check one requirement and install it when absent.
   *
   * @throws ValidationError if the name is invalid for its installer (before any command runs).
   */
  async ensure(requirement: PackageRequirement): Promise<Result<StepOutcome, InstallError>> {
    validatePackageName(requirement.name, requirement.installer);
    const installer = this.installers[requirement.installer];
    const { name } = requirement;

    this.transition(requirement, "unchecked");
    if (await installer.isInstalled(name)) {
      this.transition(requirement, "present");
      log.info(`${name} already installed. Skipping....`);
      return ok<StepOutcome>({ requirement, state: "present" });
    }

    this.transition(requirement, "absent");
    if (this.check) {
      log.warn(`${name} is not installed`);
      return ok<StepOutcome>({ requirement, state: "absent" });
    }

    return this.install(installer, requirement);
  }

  private async install(
    installer: PackageInstaller,
    requirement: PackageRequirement
  ): Promise<Result<StepOutcome, InstallError>> {
    const { name } = requirement;
    this.transition(requirement, "installing");
    log.info(`Installing ${name} via ${installer.label}`);

    const result = await installer.install(name);
    if (!result.ok) {
      this.transition(requirement, "failed");
      return err(result.error);
    }

    this.transition(requirement, "installed");
    log.info(`Installation of ${name} completed.`);
    return ok<StepOutcome>({ requirement, state: "installed" });
  }

  /**
   * Provision every requirement in order (system packages first).
   *
   * @returns The report of every step, or the first install failure.
   * @throws ValidationError if any requirement name is invalid (before any command runs).
   */
  async run(
    requirements: readonly PackageRequirement[] = DEFAULT_REQUIREMENTS
  ): Promise<Result<ProvisionReport, InstallError>> {
    validateRequirements(requirements);

    const steps: StepOutcome[] = [];
    for (const requirement of orderRequirements(requirements)) {
      const result = await this.ensure(requirement);
      if (!result.ok) {
        return err(result.error);
      }
      steps.push(result.value);
    }

    return ok({
      steps,
      installs: steps.filter((s) => s.state === "installed").length,
    });
  }

  private transition(requirement: PackageRequirement, state: RequirementState): void {
    this.onTransition?.(requirement, state);
  }
}

/** Requirements a check-only report found missing. */
export function missingRequirements(report: ProvisionReport): PackageRequirement[] {
  return report.steps.filter((s) => s.state === "absent").map((s) => s.requirement);
}
