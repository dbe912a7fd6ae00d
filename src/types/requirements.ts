/**
 * Requirement and outcome types shared by the installers and the provisioner.
 */

/** Which package manager satisfies a requirement. */
export type InstallerKind = "system" | "language";

/** A package that must be present on the host. */
export interface PackageRequirement {
  readonly name: string;
  readonly installer: InstallerKind;
}

/**
 * Lifecycle of a single requirement during one run.
 *
 *   unchecked -> present                              (terminal)
 *   unchecked -> absent -> installing -> installed    (terminal)
 *                                     -> failed       (terminal, aborts the run)
 *
 * In check-only mode `absent` is terminal.
 */
export type RequirementState =
  | "unchecked"
  | "present"
  | "absent"
  | "installing"
  | "installed"
  | "failed";

/** Terminal state reached by a requirement that did not abort the run. */
export type StepState = Extract<RequirementState, "present" | "absent" | "installed">;

export interface StepOutcome {
  readonly requirement: PackageRequirement;
  readonly state: StepState;
}

export interface ProvisionReport {
  readonly steps: readonly StepOutcome[];
  /** Number of install commands that ran. */
  readonly installs: number;
}
