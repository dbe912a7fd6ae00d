import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { main, resolveInstallerSettings, type InstallerSettings } from "../src/program.js";
import { ValidationError } from "../src/errors.js";
import { createFakeInstallers } from "./mocks/installer-mock.js";

const ANSI = /\x1b\[[0-9;]*m/g;

describe("hostprep CLI", () => {
  let dir: string;
  let settings: InstallerSettings[];

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "hostprep-cli-"));
    settings = [];
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  function run(args: string[], fakes = createFakeInstallers()) {
    const code = main(["node", "hostprep", ...args], {
      cwd: dir,
      globalConfigPath: join(dir, "global.yaml"),
      createInstallers: (s) => {
        settings.push(s);
        return fakes.installers;
      },
    });
    return { code, ...fakes };
  }

  function stdoutLines(): string[] {
    return vi.mocked(console.log).mock.calls.map((call) => String(call[0]).replace(ANSI, ""));
  }

  it("exits 0 and installs nothing on a provisioned host", async () => {
    const { code, recorder } = run(
      [],
      createFakeInstallers({ system: ["python3", "python3-pip"], language: ["icalendar", "iso8601"] })
    );

    expect(await code).toBe(0);
    expect(recorder.installs).toEqual([]);
    expect(stdoutLines().filter((line) => line.endsWith("already installed. Skipping...."))).toHaveLength(4);
  });

  it("installs all four requirements in order on a bare host", async () => {
    const { code, recorder } = run([]);

    expect(await code).toBe(0);
    expect(recorder.installs.map((c) => c.name)).toEqual(["python3", "python3-pip", "icalendar", "iso8601"]);
    expect(stdoutLines().at(-1)).toBe("Installed 4 package(s)");
  });

  it("exits with the failing install's exit code and stops there", async () => {
    const fakes = createFakeInstallers();
    fakes.installers.system.failOn("python3", 100);

    expect(await run([], fakes).code).toBe(100);
    expect(fakes.recorder.installs.map((c) => c.name)).toEqual(["python3"]);
    expect(vi.mocked(console.error).mock.calls.map((call) => String(call[0]).replace(ANSI, ""))).toEqual([
      "Failed to install python3: Installation of python3 failed with exit code 100",
    ]);
  });

  it("--check exits 1 when something is missing and installs nothing", async () => {
    const { code, recorder } = run(["--check"], createFakeInstallers({ system: ["python3", "python3-pip"] }));

    expect(await code).toBe(1);
    expect(recorder.installs).toEqual([]);
    expect(vi.mocked(console.warn).mock.calls.map((call) => String(call[0]).replace(ANSI, "")).at(-1)).toBe(
      "Missing: icalendar, iso8601"
    );
  });

  it("passes the service account flags to the installers", async () => {
    await run(["--no-service-account", "--no-sudo"]).code;
    await run(["-u", "deploy"]).code;

    expect(settings).toEqual([
      { serviceAccount: null, sudo: false },
      { serviceAccount: "deploy", sudo: undefined },
    ]);
  });

  it("exits 1 on an invalid service account", async () => {
    const { code, recorder } = run(["--service-account", "Root"]);

    expect(await code).toBe(1);
    expect(recorder.queries).toEqual([]);
  });

  it("reads requirements from --config", async () => {
    const configPath = join(dir, "ci.yaml");
    writeFileSync(configPath, "system:\n  - git\nlanguage:\n  - requests\n");

    const { code, recorder } = run(["--config", configPath]);

    expect(await code).toBe(0);
    expect(recorder.installs.map((c) => c.name)).toEqual(["git", "requests"]);
  });

  it("exits 1 when --config points nowhere", async () => {
    const { code } = run(["--config", join(dir, "missing.yaml")]);
    expect(await code).toBe(1);
  });

  it("rejects a mistyped subcommand without querying or installing", async () => {
    const { code, recorder } = run(["lsit"]);

    expect(await code).toBe(1);
    expect(recorder.queries).toEqual([]);
    expect(recorder.installs).toEqual([]);
    expect(settings).toEqual([]);
    expect(vi.mocked(console.error).mock.calls.map((call) => String(call[0]).replace(ANSI, ""))).toEqual([
      "error: too many arguments. Expected 0 arguments but got 1.",
    ]);
  });

  it("rejects an unknown option with exit code 1", async () => {
    const { code, recorder } = run(["--frobnicate"]);

    expect(await code).toBe(1);
    expect(recorder.queries).toEqual([]);
  });

  it("list prints requirements in install order", async () => {
    writeFileSync(join(dir, "hostprep.yaml"), "language:\n  - iso8601\n");
    const { code, recorder } = run(["list"]);

    expect(await code).toBe(0);
    expect(recorder.queries).toEqual([]);
    expect(stdoutLines()).toEqual(["python3 (system)", "python3-pip (system)", "iso8601 (language)"]);
  });
});

describe("resolveInstallerSettings", () => {
  it("prefers CLI flags over the config file", () => {
    expect(resolveInstallerSettings({ serviceAccount: "vagrant", sudo: true }, { serviceAccount: "deploy" })).toEqual({
      serviceAccount: "deploy",
      sudo: true,
    });
  });

  it("keeps the config value when no flag is given", () => {
    expect(resolveInstallerSettings({ serviceAccount: null }, {})).toEqual({ serviceAccount: null, sudo: undefined });
  });

  it("validates a service account given on the command line", () => {
    expect(() => resolveInstallerSettings({}, { serviceAccount: "-x" })).toThrow(ValidationError);
  });
});
