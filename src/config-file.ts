/**
 * Configuration file support for hostprep.
 *
 * Loads settings from hostprep.yaml or .hostpreprc files.
 * Supports both per-project and global configuration.
 *
 * Config file locations (in order of precedence):
 *   1. --config <path> (explicit; must exist)
 *   2. ./hostprep.yaml, ./hostprep.yml, ./.hostpreprc (project-specific)
 *   3. ~/.hostprep/config.yaml (global)
 *
 * Example:
 *   serviceAccount: vagrant
 *   sudo: true
 *   system:
 *     - python3
 *     - python3-pip
 *   language:
 *     - icalendar
 *
 * Dependency direction:
 *   This module imports from: constants.ts, errors.ts, logger.ts, validation.ts
 *   It should NOT import from: cli, provisioner, installers
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import {
  DEFAULT_LANGUAGE_PACKAGES,
  DEFAULT_SYSTEM_PACKAGES,
  getGlobalConfigPath,
  PROJECT_CONFIG_FILES,
} from "./constants.js";
import { ConfigError } from "./errors.js";
import { log } from "./logger.js";
import type { PackageRequirement } from "./types/requirements.js";
import { validateAccountName, validatePackageName } from "./validation.js";

/**
 * hostprep configuration options.
 * All fields are optional - CLI flags take precedence.
 */
export interface HostprepConfig {
  /** Account for language package installs; null installs directly */
  serviceAccount?: string | null;
  /** Force sudo on/off; unset means "only when not root" */
  sudo?: boolean;
  /** Replaces the default system package list */
  system?: string[];
  /** Replaces the default language package list */
  language?: string[];
}

type ParsedValue = string | number | boolean | null | string[];

function parseScalar(raw: string): string | number | boolean | null {
  const value = raw.replace(/^["']|["']$/g, "").trim();
  if (value === "true") {return true;}
  if (value === "false") {return false;}
  if (value === "null" || value === "~") {return null;}
  if (/^\d+$/.test(value)) {return parseInt(value, 10);}
  return value;
}

/**
 * Parse YAML-like config (key: value, plus `key:` followed by `- item` lines).
 * Supports basic YAML without external dependencies.
 */
export function parseSimpleYaml(content: string): Record<string, ParsedValue> {
  const result: Record<string, ParsedValue> = {};
  let listKey: string | null = null;

  for (const rawLine of content.split("\n")) {
    const line = rawLine.replace(/\s+#.*$/, "").trimEnd();
    const trimmed = line.trim();
    if (trimmed.startsWith("#") || trimmed === "") {
      continue;
    }

    // List items belong to the last `key:` with an empty value
    const item = trimmed.match(/^-\s+(.+)$/)?.[1];
    if (item !== undefined) {
      if (listKey === null) {
        throw new ConfigError(`List item without a key: '${trimmed}'`);
      }
      const list = result[listKey];
      const value = String(parseScalar(item));
      result[listKey] = Array.isArray(list) ? [...list, value] : [value];
      continue;
    }

    const match = trimmed.match(/^([a-zA-Z_][a-zA-Z0-9_-]*):\s*(.*)$/);
    const key = match?.[1];
    const value = match?.[2];
    if (key === undefined || value === undefined) {
      throw new ConfigError(`Cannot parse line: '${trimmed}'`);
    }
    if (value === "") {
      listKey = key;
      result[key] = [];
    } else {
      listKey = null;
      result[key] = parseScalar(value);
    }
  }

  return result;
}

function toStringList(value: ParsedValue | undefined, key: string, path: string): string[] | undefined {
  if (value === undefined) {return undefined;}
  if (!Array.isArray(value)) {
    throw new ConfigError(`${path}: '${key}' must be a list`);
  }
  return value;
}

/**
 * Map parsed values to HostprepConfig, validating names.
 *
 * @throws ConfigError on wrong value types.
 * @throws ValidationError on invalid package or account names.
 */
export function toConfig(parsed: Record<string, ParsedValue>, path: string): HostprepConfig {
  const config: HostprepConfig = {};

  const account = parsed.serviceAccount;
  if (account === null) {
    config.serviceAccount = null;
  } else if (typeof account === "string") {
    validateAccountName(account);
    config.serviceAccount = account;
  } else if (account !== undefined) {
    throw new ConfigError(`${path}: 'serviceAccount' must be a name or null`);
  }

  if (typeof parsed.sudo === "boolean") {
    config.sudo = parsed.sudo;
  } else if (parsed.sudo !== undefined) {
    throw new ConfigError(`${path}: 'sudo' must be true or false`);
  }

  const system = toStringList(parsed.system, "system", path);
  if (system) {
    system.forEach((name) => validatePackageName(name, "system"));
    config.system = system;
  }

  const language = toStringList(parsed.language, "language", path);
  if (language) {
    language.forEach((name) => validatePackageName(name, "language"));
    config.language = language;
  }

  for (const key of Object.keys(parsed)) {
    if (!["serviceAccount", "sudo", "system", "language"].includes(key)) {
      log.warn(`${path}: unknown key '${key}' ignored`);
    }
  }

  return config;
}

/**
 * Load configuration from file.
 *
 * @returns null when the file does not exist.
 */
export function loadConfigFile(path: string): HostprepConfig | null {
  if (!existsSync(path)) {
    return null;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (e) {
    throw new ConfigError(`Cannot read config file ${path}: ${String(e)}`);
  }
  return toConfig(parseSimpleYaml(content), path);
}

/**
 * Find and load project-specific config file.
 */
function loadProjectConfig(projectPath: string): HostprepConfig | null {
  for (const filename of PROJECT_CONFIG_FILES) {
    const configPath = join(projectPath, filename);
    const config = loadConfigFile(configPath);
    if (config) {
      log.debug(`Loaded project config: ${configPath}`);
      return config;
    }
  }
  return null;
}

/**
 * Merge configurations with proper precedence.
 * Later configs override earlier ones field by field; lists are replaced, not merged.
 */
export function mergeConfigs(...configs: (HostprepConfig | null)[]): HostprepConfig {
  const result: HostprepConfig = {};

  for (const config of configs) {
    if (!config) {continue;}
    if (config.serviceAccount !== undefined) {result.serviceAccount = config.serviceAccount;}
    if (config.sudo !== undefined) {result.sudo = config.sudo;}
    if (config.system !== undefined) {result.system = config.system;}
    if (config.language !== undefined) {result.language = config.language;}
  }

  return result;
}

export interface LoadConfigOptions {
  /** Explicit config file (--config); replaces project config lookup */
  configPath?: string;
  /** Override for the global config location */
  globalConfigPath?: string;
}

/**
 * Load hostprep configuration.
 *
 * Loads and merges configuration from:
 *   1. Global config (~/.hostprep/config.yaml)
 *   2. Explicit --config file, or project config (./hostprep.yaml, ./.hostpreprc)
 *
 * CLI flags should be applied on top of the returned config.
 *
 * @throws ConfigError if an explicit config file does not exist.
 */
export function loadHostprepConfig(projectPath: string, options: LoadConfigOptions = {}): HostprepConfig {
  const globalPath = options.globalConfigPath ?? getGlobalConfigPath();
  const globalConfig = loadConfigFile(globalPath);
  if (globalConfig) {
    log.debug(`Loaded global config: ${globalPath}`);
  }

  let localConfig: HostprepConfig | null;
  if (options.configPath !== undefined) {
    localConfig = loadConfigFile(options.configPath);
    if (!localConfig) {
      throw new ConfigError(`Config file not found: ${options.configPath}`);
    }
    log.debug(`Loaded config: ${options.configPath}`);
  } else {
    localConfig = loadProjectConfig(projectPath);
  }

  return mergeConfigs(globalConfig, localConfig);
}

/**
 * Resolve the requirement list: configured lists replace the defaults per kind.
 * System packages come first.
 */
export function resolveRequirements(config: HostprepConfig): PackageRequirement[] {
  const system = config.system ?? DEFAULT_SYSTEM_PACKAGES;
  const language = config.language ?? DEFAULT_LANGUAGE_PACKAGES;
  return [
    ...system.map((name): PackageRequirement => ({ name, installer: "system" })),
    ...language.map((name): PackageRequirement => ({ name, installer: "language" })),
  ];
}
