import { resolveVcsSshLogger } from "../config/vcs-ssh.js";
import type { Logger } from "../logging/logger.js";
import { parseVcsSshArgs, renderVcsSshHelp, renderVcsSshVersion, VcsSshUsageError } from "../vcs/args.js";
import { createDefaultVcsSshDeps, runVcsSsh, type VcsSshDeps } from "../vcs/dispatch.js";
import type { RepoAccess } from "../vcs/handlers.js";
import type { TextWriter } from "../vcs/reject.js";

export const EXIT_USAGE = 2;

export interface VcsSshCliDeps {
  env: NodeJS.ProcessEnv;
  stdout: TextWriter;
  stderr: TextWriter;
  cwd: () => string;
  resolveLogger: (env: NodeJS.ProcessEnv) => Logger;
  runVcsSsh: (access: RepoAccess, deps: VcsSshDeps) => Promise<number>;
}

const defaultDeps: VcsSshCliDeps = {
  env: process.env,
  stdout: process.stdout,
  stderr: process.stderr,
  cwd: () => process.cwd(),
  resolveLogger: resolveVcsSshLogger,
  runVcsSsh
};

export async function runVcsSshCli(argv: string[], deps: VcsSshCliDeps = defaultDeps): Promise<number> {
  let invocation: ReturnType<typeof parseVcsSshArgs>;
  try {
    invocation = parseVcsSshArgs(argv, { cwd: deps.cwd() });
  } catch (error) {
    if (error instanceof VcsSshUsageError) {
      deps.stderr.write(`usage: vcs-ssh [DIR ...] [--read-only DIR ...] [--read-write DIR ...]\nvcs-ssh: error: ${error.message}\n`);
      return EXIT_USAGE;
    }

    throw error;
  }

  if (invocation.action === "help") {
    deps.stdout.write(`${renderVcsSshHelp()}\n`);
    return 0;
  }

  if (invocation.action === "version") {
    deps.stdout.write(`${renderVcsSshVersion()}\n`);
    return 0;
  }

  const dispatchDeps = createDefaultVcsSshDeps({
    env: deps.env,
    stderr: deps.stderr,
    cwd: deps.cwd,
    logger: deps.resolveLogger(deps.env)
  });
  return deps.runVcsSsh(invocation.access, dispatchDeps);
}
