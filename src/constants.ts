/**
 * Constants module for hostprep.
 *
 * All timeout values and shared constants are defined here (SSOT).
 */

import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

import type { PackageRequirement } from "./types/requirements.js";

// === Version (SSOT: package.json) ===
function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}
export const VERSION: string = readVersion();

// === Naming (SSOT) ===
export const HOSTPREP_PREFIX = "hostprep";

// === Command Timeouts (milliseconds) ===
export const QUERY_TIMEOUT = 30_000; // dpkg --get-selections, pip3 list
export const INSTALL_TIMEOUT = 900_000; // 15 min for a single package install

// === Package Manager Commands ===
export const DPKG_COMMAND = "dpkg";
export const APT_COMMAND = "apt-get";
export const ENV_COMMAND = "env";
export const PIP_COMMAND = "pip3";
export const SUDO_COMMAND = "sudo";

/** Account that owns language package installs (the provisioned VM's login user). */
export const DEFAULT_SERVICE_ACCOUNT = "vagrant";

// === Default Requirements ===
// Runtime and installer first; the libraries need both.
export const DEFAULT_SYSTEM_PACKAGES: readonly string[] = ["python3", "python3-pip"];
export const DEFAULT_LANGUAGE_PACKAGES: readonly string[] = ["icalendar", "iso8601"];

export const DEFAULT_REQUIREMENTS: readonly PackageRequirement[] = [
  ...DEFAULT_SYSTEM_PACKAGES.map((name) => ({ name, installer: "system" as const })),
  ...DEFAULT_LANGUAGE_PACKAGES.map((name) => ({ name, installer: "language" as const })),
];

// === Config Paths ===
export const PROJECT_CONFIG_FILES = ["hostprep.yaml", "hostprep.yml", ".hostpreprc"] as const;

/** Get the global config file path (~/.hostprep/config.yaml). */
export function getGlobalConfigPath(): string {
  return join(homedir(), `.${HOSTPREP_PREFIX}`, "config.yaml");
}
