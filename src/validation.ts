/**
 * Input validation utilities for hostprep.
 *
 * Package and account names end up as argv entries of privileged commands,
 * so they are checked against the package managers' own naming rules first.
 *
 * Dependency direction:
 *   This module imports from: errors.ts
 *   It should NOT import from: cli, provisioner, installers
 */

import { ValidationError } from "./errors.js";
import type { InstallerKind, PackageRequirement } from "./types/requirements.js";

/** Debian policy 5.6.1: lowercase alphanumerics, plus, minus, period; at least two chars. */
const DEBIAN_PACKAGE_PATTERN = /^[a-z0-9][a-z0-9+.-]+$/;

/** PEP 508 distribution name: alphanumeric ends, with . _ - in between. */
const PYTHON_PACKAGE_PATTERN = /^[A-Za-z0-9]([A-Za-z0-9._-]*[A-Za-z0-9])?$/;

/** useradd NAME_REGEX default (Debian). */
const ACCOUNT_NAME_PATTERN = /^[a-z_][a-z0-9_-]*\$?$/;

export function isValidSystemPackageName(name: string): boolean {
  return DEBIAN_PACKAGE_PATTERN.test(name);
}

export function isValidLanguagePackageName(name: string): boolean {
  return PYTHON_PACKAGE_PATTERN.test(name);
}

export function isValidAccountName(name: string): boolean {
  return ACCOUNT_NAME_PATTERN.test(name);
}

/**
 * Validate a package name for the installer that will receive it.
 *
 * @throws ValidationError if the name is not acceptable to that installer.
 */
export function validatePackageName(name: string, installer: InstallerKind): void {
  const valid = installer === "system" ? isValidSystemPackageName(name) : isValidLanguagePackageName(name);
  if (!valid) {
    const rule = installer === "system"
      ? "lowercase letters, digits, '+', '-' and '.', starting with a letter or digit"
      : "letters, digits, '.', '_' and '-', starting and ending with a letter or digit";
    throw new ValidationError(`Invalid ${installer} package name '${name}'. Must contain only ${rule}.`);
  }
}

/**
 * Validate every requirement before anything is queried or installed.
 *
 * @throws ValidationError on the first invalid name.
 */
export function validateRequirements(requirements: readonly PackageRequirement[]): void {
  for (const requirement of requirements) {
    validatePackageName(requirement.name, requirement.installer);
  }
}

/**
 * @throws ValidationError if the account name is not a valid login name.
 */
export function validateAccountName(name: string): void {
  if (!isValidAccountName(name)) {
    throw new ValidationError(`Invalid service account '${name}'. Must be a valid login name.`);
  }
}
