import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolveVcsSshLogger } from "../src/config/vcs-ssh.js";
import { createFileSink, createLogger, logger, parseLogLevel, rolloverLogFile } from "../src/logging/logger.js";

const NOW = new Date("2026-01-02T03:04:05.000Z");

describe("logger", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "logger-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("writes formatted lines at or above its level", () => {
    const lines: string[] = [];
    const log = createLogger({ name: "ssh-harness", level: "info", sinks: [(line) => lines.push(line)], now: () => NOW, pid: 42 });

    log.debug("hidden");
    log.info("started");
    log.error("failed");

    expect(lines).toEqual([
      "2026-01-02T03:04:05.000Z ssh-harness[42] INFO: started\n",
      "2026-01-02T03:04:05.000Z ssh-harness[42] ERROR: failed\n"
    ]);
  });

  it("follows level changes after creation", () => {
    const lines: string[] = [];
    const log = createLogger({ name: "vcs-ssh", level: "warn", sinks: [(line) => lines.push(line)], now: () => NOW, pid: 7 });

    expect(log.isEnabled("verbose")).toBe(false);
    log.level = "verbose";
    log.verbose("now visible");

    expect(lines).toEqual(["2026-01-02T03:04:05.000Z vcs-ssh[7] VERBOSE: now visible\n"]);
  });

  it("is disabled without sinks", () => {
    expect(logger.isEnabled("error")).toBe(false);
  });

  it("appends to a file sink and rolls the previous log over", () => {
    const path = join(root, "ssh-harness.log");
    writeFileSync(path, "previous run\n");

    rolloverLogFile(path);
    const log = createLogger({ name: "ssh-harness", sinks: [createFileSink(path)], now: () => NOW, pid: 1 });
    log.warn("fresh");

    expect(readFileSync(`${path}.1`, "utf8")).toBe("previous run\n");
    expect(readFileSync(path, "utf8")).toBe("2026-01-02T03:04:05.000Z ssh-harness[1] WARN: fresh\n");
  });

  it("parses log levels leniently", () => {
    expect(parseLogLevel(" WARN ")).toBe("warn");
    expect(parseLogLevel("loud")).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });

  it("logs vcs-ssh only when a log file is configured", () => {
    expect(resolveVcsSshLogger({})).toBe(logger);

    const path = join(root, "vcs-ssh.log");
    const fileLogger = resolveVcsSshLogger({ VCS_SSH_LOG_FILE: path, VCS_SSH_LOG_LEVEL: "debug" });
    expect(fileLogger.level).toBe("debug");
    fileLogger.debug("dispatching");

    expect(existsSync(path)).toBe(true);
    expect(readFileSync(path, "utf8")).toMatch(/ vcs-ssh\[\d+\] DEBUG: dispatching\n$/);
  });
});
