import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InvalidStateError, NotRegisteredError } from "../src/backup/errors.js";
import { BackupRegistry } from "../src/backup/registry.js";

describe("BackupRegistry", () => {
  let root: string;
  let registry: BackupRegistry;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "backup-registry-"));
    registry = new BackupRegistry();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("tracks editors per context by absolute path", () => {
    const first = registry.edit("ssh", join(root, "config"));
    const second = registry.edit("ssh", join(root, "known_hosts"));
    const third = registry.edit("vcs", join(root, "config"));

    expect(registry.contextNames()).toEqual(["ssh", "vcs"]);
    expect(registry.paths("ssh")).toEqual([join(root, "config"), join(root, "known_hosts")]);
    expect(registry.get("ssh", join(root, "sub", "..", "config"))).toBe(first);
    expect(registry.get("missing", join(root, "config"))).toBeUndefined();

    second.restore();
    first.restore();
    third.restore();
    expect(registry.contextNames()).toEqual([]);
  });

  it("restores every editor of a context and leaves the others alone", () => {
    const config = join(root, "config");
    const knownHosts = join(root, "known_hosts");
    writeFileSync(config, "Host a\n");
    writeFileSync(knownHosts, "host-a\n");

    registry.edit("ssh", config).withEdit((handle) => handle.write("Host b\n"));
    registry.edit("ssh", knownHosts).withEdit((handle) => handle.write("host-b\n"));
    const kept = registry.edit("vcs", join(root, "other"));

    registry.clearContext("ssh");

    expect(readFileSync(config, "utf8")).toBe("Host a\n");
    expect(readFileSync(knownHosts, "utf8")).toBe("host-a\n");
    expect(registry.contextNames()).toEqual(["vcs"]);
    kept.restore();
  });

  it("restores existing files and deletes created ones in the same context", () => {
    const config = join(root, "config");
    const environment = join(root, "environment");
    writeFileSync(config, "Host a\n");

    registry.edit("ssh", config).withEdit((handle) => handle.write("Host b\n"));
    registry.edit("ssh", environment, { mode: "w" }).withEdit((handle) => handle.write("A=1\n"));
    expect(readFileSync(environment, "utf8")).toBe("A=1\n");

    registry.clearContext("ssh");

    expect(readFileSync(config, "utf8")).toBe("Host a\n");
    expect(existsSync(environment)).toBe(false);
    expect(existsSync(`${config}.backup`)).toBe(false);
    expect(registry.contextNames()).toEqual([]);
  });

  it("ignores unknown contexts in clearContext", () => {
    expect(() => registry.clearContext("nothing-here")).not.toThrow();
  });

  it("restores a single path with clear and rejects unknown ones", () => {
    const path = join(root, "environment");
    registry.edit("ssh", path).withEdit((handle) => handle.write("A=1\n"));

    registry.clear("ssh", path);
    expect(registry.paths("ssh")).toEqual([]);

    expect(() => registry.clear("ssh", path)).toThrow(NotRegisteredError);
    expect(() => registry.clear("ssh", path)).toThrow(`No backup registered for '${path}' in context 'ssh'.`);
  });

  it("keeps restoring after a failure and rethrows it", () => {
    const open = registry.edit("ssh", join(root, "open"));
    const closed = registry.edit("ssh", join(root, "closed"));
    open.enter();

    expect(() => registry.clearContext("ssh")).toThrow(InvalidStateError);
    expect(closed.restored).toBe(true);
    expect(registry.paths("ssh")).toEqual([join(root, "open")]);

    open.exit();
    open.restore();
  });

  it("aggregates several restore failures", () => {
    const first = registry.edit("ssh", join(root, "first"));
    const second = registry.edit("ssh", join(root, "second"));
    first.enter();
    second.enter();

    let caught: unknown;
    try {
      registry.clearContext("ssh");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AggregateError);
    if (caught instanceof AggregateError) {
      expect(caught.errors).toHaveLength(2);
      expect(caught.message).toBe("Failed to restore 2 files in context 'ssh'.");
    }

    first.exit();
    second.exit();
    registry.clearContext("ssh");
    expect(registry.contextNames()).toEqual([]);
  });

  it("refuses to unregister a different editor than the registered one", () => {
    const first = registry.edit("ssh", join(root, "first"));
    const second = registry.edit("ssh", join(root, "second"));

    expect(() => registry.unregister("ssh", join(root, "first"), second)).toThrow(
      `Registered and passed editors for '${join(root, "first")}' in context 'ssh' do not match.`
    );

    first.restore();
    second.restore();
  });
});
