/**
 * Commander program for hostprep.
 *
 * Kept apart from cli.ts so tests can drive the commands with fake
 * installers and an isolated config location.
 */

import { Command, CommanderError } from "commander";

import { loadHostprepConfig, resolveRequirements, type HostprepConfig } from "./config-file.js";
import { VERSION } from "./constants.js";
import { exitCodeFor, logError } from "./error-handler.js";
import { createHostInstallers, type InstallerSet } from "./installers/index.js";
import { enableQuietMode, log, LogLevel, setLogLevel, style } from "./logger.js";
import { missingRequirements, Provisioner } from "./provisioner.js";
import { validateAccountName } from "./validation.js";

/** Options shared by every command. */
type GlobalOptions = {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
};

type ProvisionOptions = GlobalOptions & {
  check?: boolean;
  /** false when --no-service-account is given */
  serviceAccount?: string | false;
  sudo?: boolean;
};

/** Settings the installers are built from, after config and flags are merged. */
export interface InstallerSettings {
  serviceAccount?: string | null;
  sudo?: boolean;
}

export interface ProgramDeps {
  createInstallers?: (settings: InstallerSettings) => InstallerSet;
  globalConfigPath?: string;
  cwd?: string;
  setExitCode?: (code: number) => void;
}

function applyLogOptions(options: GlobalOptions): void {
  if (options.quiet) {
    enableQuietMode();
  } else if (options.verbose) {
    setLogLevel(LogLevel.DEBUG);
  }
}

/**
 * Merge CLI flags over the file config (CLI > project > global).
 */
export function resolveInstallerSettings(config: HostprepConfig, options: ProvisionOptions): InstallerSettings {
  let serviceAccount = config.serviceAccount;
  if (options.serviceAccount === false) {
    serviceAccount = null;
  } else if (options.serviceAccount !== undefined) {
    validateAccountName(options.serviceAccount);
    serviceAccount = options.serviceAccount;
  }
  return { serviceAccount, sudo: options.sudo ?? config.sudo };
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const createInstallers = deps.createInstallers ?? createHostInstallers;
  const setExitCode = deps.setExitCode ?? ((code: number) => { process.exitCode = code; });
  const loadConfig = (options: GlobalOptions) =>
    loadHostprepConfig(deps.cwd ?? process.cwd(), {
      configPath: options.config,
      globalConfigPath: deps.globalConfigPath,
    });

  const program = new Command();

  program
    .name("hostprep")
    .description("Idempotently install the system and Python packages a host needs")
    .version(VERSION)
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({ writeErr: (str) => log.error(str.trimEnd()) })
    .option("-c, --config <path>", "Config file (default: ./hostprep.yaml, then ~/.hostprep/config.yaml)")
    .option("-v, --verbose", "Trace every command that runs")
    .option("-q, --quiet", "Suppress all output (exit code only)")
    .option("--check", "Report missing packages without installing anything")
    .option("-u, --service-account <user>", "Account that runs pip installs (default: vagrant)")
    .option("--no-service-account", "Run pip installs directly instead of as a service account")
    .option("--sudo", "Always prefix install commands with sudo")
    .option("--no-sudo", "Never prefix install commands with sudo")
    .hook("preAction", (_thisCommand, actionCommand) => {
      // Apply -q/-v before any command runs
      const options: GlobalOptions = actionCommand.optsWithGlobals();
      applyLogOptions(options);
    })
    .action(async (options: ProvisionOptions) => {
      const config = loadConfig(options);
      const settings = resolveInstallerSettings(config, options);
      const provisioner = new Provisioner({
        installers: createInstallers(settings),
        check: options.check,
      });

      const result = await provisioner.run(resolveRequirements(config));
      if (!result.ok) {
        logError(result.error, `install ${result.error.packageName}`);
        setExitCode(exitCodeFor(result.error));
        return;
      }

      const report = result.value;
      const missing = missingRequirements(report);
      if (missing.length > 0) {
        log.warn(`Missing: ${missing.map((r) => r.name).join(", ")}`);
        setExitCode(1);
      } else if (report.installs > 0) {
        log.success(`Installed ${report.installs} package(s)`);
      } else {
        log.dim("Nothing to install");
      }
    });

  program
    .command("list")
    .description("Show the packages hostprep ensures, in install order")
    .action((_options: unknown, command: Command) => {
      const options: GlobalOptions = command.optsWithGlobals();
      for (const requirement of resolveRequirements(loadConfig(options))) {
        log.raw(`${style.cyan(requirement.name)} ${style.dim(`(${requirement.installer})`)}`);
      }
    });

  return program;
}

/**
 * Parse argv and run the selected command.
 *
 * @returns The process exit code.
 */
export async function main(argv: string[], deps: ProgramDeps = {}): Promise<number> {
  let exitCode = 0;
  const program = createProgram({
    ...deps,
    setExitCode: (code) => {
      exitCode = code;
    },
  });

  try {
    await program.parseAsync(argv);
  } catch (error: unknown) {
    // Already reported by commander (usage errors, --help, --version)
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    logError(error, "provision host");
    return exitCodeFor(error);
  }
  return exitCode;
}
