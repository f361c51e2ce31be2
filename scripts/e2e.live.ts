import { existsSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { SshHarness, SshHarnessSkipError } from "../src/harness/harness.js";

type CheckStatus = "PASS" | "FAIL" | "SKIP";

interface CheckResult {
  name: string;
  status: CheckStatus;
  detail: string;
}

const PROJECT_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), "..");
const VCS_SSH_BIN = join(PROJECT_ROOT, "dist", "bin", "vcs-ssh.js");

/**
 * Runs a real sshd through the harness and talks to vcs-ssh over ssh with
 * git. Needs OpenSSH and git installed and a prior `npm run build`.
 */
async function main(): Promise<void> {
  const checks: CheckResult[] = [];

  if (!existsSync(VCS_SSH_BIN)) {
    console.log(`[e2e:live] SKIP bootstrap: ${VCS_SSH_BIN} is missing, run \`npm run build\` first.`);
    return;
  }

  const workDir = await mkdtemp(join(tmpdir(), "vcs-ssh-live-"));
  const repo = join(workDir, "mirror.git");
  const harness = new SshHarness({
    config: {
      baseDir: join(workDir, "sshd"),
      authorizedKeyOptions: `command=${quoteForAuthorizedKeys(
        `${process.execPath} ${VCS_SSH_BIN} --read-only ${repo}`
      )},no-port-forwarding,no-X11-forwarding,no-agent-forwarding`,
      debug: true
    }
  });

  try {
    await harness.setup();
    checks.push({ name: "harness setup", status: "PASS", detail: `sshd listening on port ${harness.config.port}` });
  } catch (error) {
    if (error instanceof SshHarnessSkipError) {
      console.log(`[e2e:live] SKIP harness setup: ${error.message}`);
      await rm(workDir, { recursive: true, force: true });
      return;
    }

    throw error;
  }

  const host = harness.config.sshConfigHostName;
  try {
    const init = await harness.runCommand(["git", "init", "--bare", "--quiet", repo]);
    if (init.exitCode !== 0) {
      throw new Error(`git init failed: ${init.stderr.trim()}`);
    }

    const illegal = await harness.runCommand(["ssh", "-o", "BatchMode=yes", host, "ls"]);
    checks.push(
      illegal.exitCode === 255 && illegal.stderr.includes('remote: Illegal command "ls"')
        ? { name: "reject shell command", status: "PASS", detail: "ls was refused" }
        : { name: "reject shell command", status: "FAIL", detail: `status ${illegal.exitCode}: ${illegal.stderr.trim()}` }
    );

    const lsRemote = await harness.runCommand(["git", "ls-remote", `${host}:${repo}`]);
    checks.push(
      lsRemote.exitCode === 0
        ? { name: "read-only fetch", status: "PASS", detail: "git ls-remote succeeded" }
        : { name: "read-only fetch", status: "FAIL", detail: `status ${lsRemote.exitCode}: ${lsRemote.stderr.trim()}` }
    );

    const unknown = await harness.runCommand(["git", "ls-remote", `${host}:${join(workDir, "other.git")}`]);
    checks.push(
      unknown.exitCode !== 0 && unknown.stderr.includes("Illegal repository")
        ? { name: "unknown repository", status: "PASS", detail: "access refused" }
        : { name: "unknown repository", status: "FAIL", detail: `status ${unknown.exitCode}: ${unknown.stderr.trim()}` }
    );

    const local = join(workDir, "local");
    const identity = ["-c", "user.name=vcs-ssh live", "-c", "user.email=live@example.invalid"];
    await harness.runCommandWarnIfFails(["git", "init", "--quiet", local], "Init");
    await harness.runCommandWarnIfFails(["git", "-C", local, ...identity, "commit", "--allow-empty", "-m", "live"], "Commit");

    const push = await harness.runCommand(["git", "-C", local, "push", `${host}:${repo}`, "HEAD:refs/heads/main"]);
    checks.push(
      push.exitCode !== 0 && push.stderr.includes("read only access")
        ? { name: "read-only push", status: "PASS", detail: `push refused with status ${push.exitCode}` }
        : { name: "read-only push", status: "FAIL", detail: `status ${push.exitCode}: ${push.stderr.trim()}` }
    );
  } catch (error) {
    checks.push({ name: "vcs-ssh flow", status: "FAIL", detail: formatError(error) });
  } finally {
    await harness.teardown();
    await rm(workDir, { recursive: true, force: true });
  }

  for (const check of checks) {
    console.log(`[e2e:live] ${check.status} ${check.name}: ${check.detail}`);
  }

  if (checks.some((check) => check.status === "FAIL")) {
    process.exitCode = 1;
  }
}

/** authorized_keys options take double-quoted values. */
function quoteForAuthorizedKeys(command: string): string {
  return `"${command.replaceAll("\\", "\\\\").replaceAll('"', '\\"')}"`;
}

function formatError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}

await main();
