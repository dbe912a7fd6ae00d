import { beforeEach, describe, expect, it, vi } from "vitest";

import { InstallError } from "../src/errors.js";
import { exec, execInherit, type ExecResult } from "../src/exec.js";
import { AptInstaller } from "../src/installers/apt.js";
import { createHostInstallers } from "../src/installers/index.js";
import { PipInstaller } from "../src/installers/pip.js";
import { asServiceAccount, elevate } from "../src/installers/privilege.js";

vi.mock("../src/exec.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../src/exec.js")>();
  return { ...actual, exec: vi.fn(), execInherit: vi.fn() };
});

function result(overrides: Partial<ExecResult> = {}): ExecResult {
  return { exitCode: 0, stdout: "", stderr: "", notFound: false, timedOut: false, ...overrides };
}

describe("AptInstaller", () => {
  beforeEach(() => {
    vi.mocked(exec).mockReset();
    vi.mocked(execInherit).mockReset();
  });

  it("queries dpkg selections", async () => {
    vi.mocked(exec).mockResolvedValue(result({ stdout: "python3\t\t\tinstall\npython3-pip\t\tdeinstall\n" }));
    const apt = new AptInstaller();

    expect(await apt.isInstalled("python3")).toBe(true);
    expect(await apt.isInstalled("python3-pip")).toBe(false);
    expect(exec).toHaveBeenCalledWith("dpkg", ["--get-selections"], { timeout: 30_000 });
  });

  it("reads a failed query as not installed", async () => {
    vi.mocked(exec).mockResolvedValue(result({ exitCode: 127, notFound: true, stdout: "python3\tinstall\n" }));
    expect(await new AptInstaller().isInstalled("python3")).toBe(false);
  });

  it("installs with apt-get -y install under sudo, noninteractive past sudo's env reset", async () => {
    vi.mocked(execInherit).mockResolvedValue(result());
    const outcome = await new AptInstaller({ sudo: true }).install("python3");

    expect(outcome).toEqual({ ok: true, value: undefined });
    expect(execInherit).toHaveBeenCalledWith(
      "sudo",
      ["env", "DEBIAN_FRONTEND=noninteractive", "apt-get", "-y", "install", "python3"],
      { timeout: 900_000 }
    );
  });

  it("installs without sudo when disabled", async () => {
    vi.mocked(execInherit).mockResolvedValue(result());
    await new AptInstaller({ sudo: false, installTimeout: 5_000 }).install("git");

    expect(execInherit).toHaveBeenCalledWith(
      "env",
      ["DEBIAN_FRONTEND=noninteractive", "apt-get", "-y", "install", "git"],
      { timeout: 5_000 }
    );
  });

  it("returns an InstallError carrying the exit code", async () => {
    vi.mocked(execInherit).mockResolvedValue(result({ exitCode: 100 }));
    const outcome = await new AptInstaller({ sudo: false }).install("nosuchpkg");

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(InstallError);
      expect(outcome.error.exitCode).toBe(100);
      expect(outcome.error.command).toBe("env DEBIAN_FRONTEND=noninteractive apt-get -y install nosuchpkg");
      expect(outcome.error.message).toBe("Installation of nosuchpkg failed with exit code 100");
    }
  });

  it("mentions a missing command", async () => {
    vi.mocked(execInherit).mockResolvedValue(result({ exitCode: 127, notFound: true }));
    const outcome = await new AptInstaller({ sudo: true }).install("git");

    expect(!outcome.ok && outcome.error.message).toBe("Installation of git failed with exit code 127: sudo not found");
  });
});

describe("PipInstaller", () => {
  beforeEach(() => {
    vi.mocked(exec).mockReset();
    vi.mocked(execInherit).mockReset();
  });

  it("queries pip3 list", async () => {
    vi.mocked(exec).mockResolvedValue(result({ stdout: "Package   Version\n--------- -------\nicalendar 5.0.13\n" }));
    const pip = new PipInstaller();

    expect(await pip.isInstalled("icalendar")).toBe(true);
    expect(await pip.isInstalled("iso8601")).toBe(false);
    expect(exec).toHaveBeenCalledWith("pip3", ["list"], { timeout: 30_000 });
  });

  it("reads a failed query as not installed", async () => {
    vi.mocked(exec).mockResolvedValue(result({ exitCode: 1, stdout: "icalendar (5.0.13)\n" }));
    expect(await new PipInstaller().isInstalled("icalendar")).toBe(false);
  });

  it("installs as the vagrant account by default", async () => {
    vi.mocked(execInherit).mockResolvedValue(result());
    await new PipInstaller().install("icalendar");

    expect(execInherit).toHaveBeenCalledWith(
      "sudo",
      ["-u", "vagrant", "sudo", "pip3", "install", "icalendar"],
      { timeout: 900_000 }
    );
  });

  it("installs as a configured service account", () => {
    expect(new PipInstaller({ serviceAccount: "deploy" }).installCommand("iso8601")).toEqual({
      command: "sudo",
      args: ["-u", "deploy", "sudo", "pip3", "install", "iso8601"],
    });
  });

  it("installs directly when the service account is disabled", () => {
    const direct = new PipInstaller({ serviceAccount: null, sudo: false });
    expect(direct.serviceAccount).toBeNull();
    expect(direct.installCommand("iso8601")).toEqual({ command: "pip3", args: ["install", "iso8601"] });
    expect(new PipInstaller({ serviceAccount: null, sudo: true }).installCommand("iso8601")).toEqual({
      command: "sudo",
      args: ["pip3", "install", "iso8601"],
    });
  });

  it("returns an InstallError on failure", async () => {
    vi.mocked(execInherit).mockResolvedValue(result({ exitCode: 2 }));
    const outcome = await new PipInstaller().install("iso8601");

    expect(!outcome.ok && outcome.error.exitCode).toBe(2);
    expect(!outcome.ok && outcome.error.command).toBe("sudo -u vagrant sudo pip3 install iso8601");
  });
});

describe("privilege", () => {
  it("elevate respects an explicit choice", () => {
    expect(elevate("apt-get", ["update"], true)).toEqual({ command: "sudo", args: ["apt-get", "update"] });
    expect(elevate("apt-get", ["update"], false)).toEqual({ command: "apt-get", args: ["update"] });
  });

  it("elevate uses sudo only when not root by default", () => {
    vi.spyOn(process, "getuid").mockReturnValue(0);
    expect(elevate("apt-get", ["update"]).command).toBe("apt-get");
    vi.spyOn(process, "getuid").mockReturnValue(1000);
    expect(elevate("apt-get", ["update"]).command).toBe("sudo");
    vi.restoreAllMocks();
  });

  it("asServiceAccount switches user then elevates", () => {
    expect(asServiceAccount("vagrant", "pip3", ["install", "x"])).toEqual({
      command: "sudo",
      args: ["-u", "vagrant", "sudo", "pip3", "install", "x"],
    });
  });
});

describe("createHostInstallers", () => {
  it("builds apt for system and pip for language packages", () => {
    const installers = createHostInstallers({ serviceAccount: "deploy" });
    expect(installers.system).toBeInstanceOf(AptInstaller);
    expect(installers.language).toBeInstanceOf(PipInstaller);
    expect(installers.system.label).toBe("apt-get");
    expect(installers.language.label).toBe("python pip3");
  });
});
