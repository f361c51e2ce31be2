import { chmodSync, existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { HarnessConfigOverrides } from "../src/config/harness.js";
import type { CommandResult, RunCommandOptions } from "../src/harness/commands.js";
import { HARNESS_CONTEXT, SshHarness, SshHarnessSkipError, type SshHarnessDeps } from "../src/harness/harness.js";
import { generatedFiles } from "../src/harness/paths.js";
import type { DaemonProcess, SpawnDaemonOptions } from "../src/harness/sshd.js";

const PUBLIC_KEY = "ssh-ed25519 AAAAtestkey tester@harness\n";
const HOST_KEY_LINE = "|1|hashedhost ssh-ed25519 AAAAhostkey\n";

interface Fixture {
  root: string;
  home: string;
  cwd: string;
  bin: string;
  config: HarnessConfigOverrides;
}

function createFixture(): Fixture {
  const root = mkdtempSync(join(tmpdir(), "harness-lifecycle-"));
  const home = join(root, "home");
  const cwd = join(root, "work");
  const bin = join(root, "bin");
  mkdirSync(join(home, ".ssh"), { recursive: true });
  mkdirSync(cwd);
  mkdirSync(bin);

  for (const program of ["sshd", "ssh-keygen", "ssh-keyscan"]) {
    writeFileSync(join(bin, program), "#!/bin/sh\nexit 0\n");
    chmodSync(join(bin, program), 0o755);
  }

  return {
    root,
    home,
    cwd,
    bin,
    config: {
      cwd,
      homeDir: home,
      sshdBin: join(bin, "sshd"),
      sshKeygenBin: join(bin, "ssh-keygen"),
      sshKeyscanBin: join(bin, "ssh-keyscan"),
      logFile: null,
      protectKeyDirectories: false
    }
  };
}

function fakeRunCommand(options: { keyscan: (argv: string[]) => CommandResult }) {
  return vi.fn(async (argv: string[], _options?: RunCommandOptions): Promise<CommandResult> => {
    if (argv[0].endsWith("ssh-keygen")) {
      const keyPath = argv[argv.indexOf("-f") + 1];
      writeFileSync(keyPath, "PRIVATE KEY\n");
      writeFileSync(`${keyPath}.pub`, PUBLIC_KEY);
      return { exitCode: 0, stdout: "", stderr: "" };
    }

    if (argv[0].endsWith("ssh-keyscan")) {
      return options.keyscan(argv);
    }

    return { exitCode: 0, stdout: "", stderr: "" };
  });
}

function fakeDaemon(startsUp: boolean) {
  const terminate = vi.fn();
  const spawnDaemon = vi.fn((argv: string[], _options: SpawnDaemonOptions): DaemonProcess => {
    if (startsUp) {
      const configPath = argv[argv.indexOf("-f") + 1];
      writeFileSync(join(configPath, "..", "sshd.pid"), "4242\n");
    }
    return { pid: 4242, terminate };
  });

  return { spawnDaemon, terminate };
}

const ipv4Only = (argv: string[]): CommandResult =>
  argv.includes("-4")
    ? { exitCode: 0, stdout: HOST_KEY_LINE, stderr: "" }
    : { exitCode: 0, stdout: "", stderr: "" };

describe("SshHarness", () => {
  let fixture: Fixture;
  let sleep: SshHarnessDeps["sleep"];

  beforeEach(() => {
    fixture = createFixture();
    sleep = vi.fn(async () => undefined);
  });

  afterEach(() => {
    rmSync(fixture.root, { recursive: true, force: true });
  });

  it("sets up the daemon files and reverts user files on teardown", async () => {
    const knownHosts = join(fixture.home, ".ssh", "known_hosts");
    const sshConfig = join(fixture.home, ".ssh", "config");
    const environmentFile = join(fixture.home, ".ssh", "environment");
    writeFileSync(knownHosts, "existing-host ssh-ed25519 AAAAold\n");

    const runCommand = fakeRunCommand({ keyscan: ipv4Only });
    const daemon = fakeDaemon(true);
    const harness = new SshHarness({
      config: { ...fixture.config, sshEnvironment: { VCS_TEST: "1" }, sshEnvironmentFile: true },
      env: { PATH: "/usr/bin" },
      deps: { runCommand, spawnDaemon: daemon.spawnDaemon, sleep }
    });

    await harness.setup();

    const { paths } = harness;
    expect(harness.running).toBe(true);
    expect(harness.setupErrors.size).toBe(0);
    expect(harness.env).toEqual({ PATH: "/usr/bin", LANG: "C" });
    expect(runCommand.mock.calls.filter(([argv]) => argv[0].endsWith("ssh-keygen"))).toHaveLength(4);
    expect(runCommand.mock.calls[0][1]).toEqual({ input: undefined, env: { PATH: "/usr/bin", LANG: "C" } });
    expect(daemon.spawnDaemon.mock.calls[0][0]).toEqual([join(fixture.bin, "sshd"), "-D", "-4", "-f", paths.sshdConfig]);

    expect(readFileSync(paths.sshdConfig, "utf8").split("\n")).toContain("PermitUserEnvironment yes");
    expect(readFileSync(paths.authorizedKeys, "utf8")).toBe(PUBLIC_KEY);
    expect(statSync(paths.userKey.path).mode & 0o777).toBe(0o400);
    expect(readFileSync(environmentFile, "utf8")).toBe("VCS_TEST=1\n");
    expect(readFileSync(knownHosts, "utf8")).toBe(`existing-host ssh-ed25519 AAAAold\n${HOST_KEY_LINE}`);
    expect(readFileSync(sshConfig, "utf8")).toBe(
      `\nHost test-harness\n        HostName localhost\n        Port 2200\n        IdentityFile ${paths.userKey.path}\n`
    );
    expect(harness.registry.paths(HARNESS_CONTEXT)).toEqual([environmentFile, sshConfig, knownHosts]);

    await harness.teardown();

    expect(daemon.terminate).toHaveBeenCalledTimes(1);
    expect(harness.running).toBe(false);
    expect(generatedFiles(paths).filter((path) => existsSync(path))).toEqual([]);
    expect(readFileSync(knownHosts, "utf8")).toBe("existing-host ssh-ed25519 AAAAold\n");
    expect(existsSync(sshConfig)).toBe(false);
    expect(existsSync(environmentFile)).toBe(false);
    expect(existsSync(`${knownHosts}.backup`)).toBe(false);
    expect(harness.registry.contextNames()).toEqual([]);

    await harness.teardown();
    expect(daemon.terminate).toHaveBeenCalledTimes(1);
  });

  it("passes the environment through authorized_keys options by default", async () => {
    const harness = new SshHarness({
      config: { ...fixture.config, sshEnvironment: { VCS_TEST: "1" }, updateSshConfig: false },
      env: {},
      deps: { runCommand: fakeRunCommand({ keyscan: ipv4Only }), spawnDaemon: fakeDaemon(true).spawnDaemon, sleep }
    });

    await harness.setup();

    expect(readFileSync(harness.paths.authorizedKeys, "utf8")).toBe(`environment="VCS_TEST=1" ${PUBLIC_KEY}`);
    expect(existsSync(join(fixture.home, ".ssh", "config"))).toBe(false);
    expect(existsSync(join(fixture.home, ".ssh", "environment"))).toBe(false);

    await harness.teardown();
  });

  it("skips with every missing program listed", async () => {
    const harness = new SshHarness({
      config: { ...fixture.config, sshdBin: join(fixture.bin, "no-sshd"), sshKeyscanBin: join(fixture.bin, "no-keyscan") },
      env: {},
      deps: { runCommand: fakeRunCommand({ keyscan: ipv4Only }), spawnDaemon: fakeDaemon(true).spawnDaemon, sleep }
    });

    const failure = harness.setup();

    await expect(failure).rejects.toBeInstanceOf(SshHarnessSkipError);
    await expect(failure).rejects.toThrow(
      "One or more errors occurred while trying to setup the ssh harness:\n" +
        ` - ${join(fixture.bin, "no-sshd")}\n    Program not found.\n` +
        ` - ${join(fixture.bin, "no-keyscan")}\n    Program not found.\n`
    );
  });

  it("stops the daemon and cleans up when the pid file never appears", async () => {
    const daemon = fakeDaemon(false);
    const harness = new SshHarness({
      config: { ...fixture.config, sshEnvironment: { VCS_TEST: "1" }, sshEnvironmentFile: true },
      env: {},
      deps: { runCommand: fakeRunCommand({ keyscan: ipv4Only }), spawnDaemon: daemon.spawnDaemon, sleep }
    });

    let caught: unknown;
    try {
      await harness.setup();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SshHarnessSkipError);
    if (caught instanceof SshHarnessSkipError) {
      expect(Object.fromEntries(caught.errors)).toEqual({
        [join(fixture.bin, "sshd")]: "Not starting or crashing at startup."
      });
    }
    expect(sleep).toHaveBeenCalledTimes(5);
    expect(daemon.terminate).toHaveBeenCalledTimes(1);
    expect(generatedFiles(harness.paths).filter((path) => existsSync(path))).toEqual([]);
    expect(existsSync(join(fixture.home, ".ssh", "environment"))).toBe(false);
    expect(harness.registry.contextNames()).toEqual([]);
  });

  it("skips when no host key could be scanned and restores known_hosts", async () => {
    const knownHosts = join(fixture.home, ".ssh", "known_hosts");
    writeFileSync(knownHosts, "existing\n");
    const harness = new SshHarness({
      config: fixture.config,
      env: {},
      deps: {
        runCommand: fakeRunCommand({ keyscan: () => ({ exitCode: 1, stdout: "", stderr: "refused" }) }),
        spawnDaemon: fakeDaemon(true).spawnDaemon,
        sleep
      }
    });

    let caught: unknown;
    try {
      await harness.setup();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SshHarnessSkipError);
    if (caught instanceof SshHarnessSkipError) {
      expect(caught.errors.get("updateKnownHosts")).toBe("ssh-keyscan failed with status 1: refused\nOutput: ");
    }
    expect(readFileSync(knownHosts, "utf8")).toBe("existing\n");
    expect(existsSync(join(fixture.home, ".ssh", "config"))).toBe(false);
  });

  it("stops the daemon and reverts user files when a late setup step throws", async () => {
    const knownHosts = join(fixture.home, ".ssh", "known_hosts");
    writeFileSync(knownHosts, "existing\n");
    const daemon = fakeDaemon(true);
    const harness = new SshHarness({
      config: fixture.config,
      env: {},
      deps: {
        runCommand: fakeRunCommand({
          keyscan: () => {
            throw new Error("spawn ssh-keyscan ENOENT");
          }
        }),
        spawnDaemon: daemon.spawnDaemon,
        sleep
      }
    });

    let caught: unknown;
    try {
      await harness.setup();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SshHarnessSkipError);
    if (caught instanceof SshHarnessSkipError) {
      expect(Object.fromEntries(caught.errors)).toEqual({ updateKnownHosts: "spawn ssh-keyscan ENOENT" });
    }
    expect(daemon.terminate).toHaveBeenCalledTimes(1);
    expect(harness.running).toBe(false);
    expect(harness.registry.contextNames()).toEqual([]);
    expect(readFileSync(knownHosts, "utf8")).toBe("existing\n");
    expect(existsSync(`${knownHosts}.backup`)).toBe(false);
    expect(existsSync(join(fixture.home, ".ssh", "config"))).toBe(false);
    expect(generatedFiles(harness.paths).filter((path) => existsSync(path))).toEqual([]);
  });

  it("warns when a command fails", async () => {
    const emitWarning = vi.fn();
    const runCommand = vi.fn(async (): Promise<CommandResult> => ({ exitCode: 2, stdout: "", stderr: "boom" }));
    const harness = new SshHarness({ config: fixture.config, env: {}, deps: { runCommand, emitWarning } });

    const status = await harness.runCommandWarnIfFails(["git", "push"], "Push", "payload");

    expect(status).toBe(2);
    expect(runCommand).toHaveBeenCalledWith(["git", "push"], { input: "payload", env: { LANG: "C" } });
    expect(emitWarning).toHaveBeenCalledWith("Push operation failed (2):\nboom");
  });
});
