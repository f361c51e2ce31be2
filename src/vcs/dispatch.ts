import { logger as defaultLogger, type Logger } from "../logging/logger.js";
import type { HomeLookup } from "../utils/paths.js";
import { parseOriginalCommand } from "./command.js";
import { bzrHandle, gitHandle, hgHandle, type HandlerDeps, type RepoAccess } from "./handlers.js";
import { findExecutable, pipeDispatch } from "./process.js";
import { rejectCommand, warnNoAccessControl, type TextWriter } from "./reject.js";

export interface VcsSshDeps {
  env: NodeJS.ProcessEnv;
  stderr: TextWriter;
  logger: Logger;
  getuid: () => number;
  cwd: () => string;
  pipeDispatch: (argv: string[]) => Promise<number>;
  findExecutable: (command: string) => string | null;
  homeLookup?: HomeLookup;
  handlers: {
    git: typeof gitHandle;
    hg: typeof hgHandle;
    bzr: typeof bzrHandle;
  };
}

const BZR_SERVE_COMMAND = ["bzr", "serve", "--inet", "--directory=/", "--allow-writes"];
const SVN_SERVE_COMMAND = "svnserve -t";

const defaultDeps: VcsSshDeps = {
  env: process.env,
  stderr: process.stderr,
  logger: defaultLogger,
  getuid: () => process.getuid?.() ?? -1,
  cwd: () => process.cwd(),
  pipeDispatch: (argv) => pipeDispatch(argv),
  findExecutable: (command) => findExecutable(command, process.env.PATH),
  handlers: {
    git: gitHandle,
    hg: hgHandle,
    bzr: bzrHandle
  }
};

export function createDefaultVcsSshDeps(overrides: Partial<VcsSshDeps> = {}): VcsSshDeps {
  const env = overrides.env ?? defaultDeps.env;
  return {
    ...defaultDeps,
    findExecutable: (command) => findExecutable(command, env.PATH),
    pipeDispatch: (argv) => pipeDispatch(argv, env),
    ...overrides
  };
}

export async function runVcsSsh(access: RepoAccess, deps: VcsSshDeps = defaultDeps): Promise<number> {
  const { logger, stderr } = deps;
  const originalCommand = deps.env.SSH_ORIGINAL_COMMAND ?? "?";

  logger.info(`vcs-ssh started with command \`${originalCommand}' for user ${deps.getuid()}.`);
  logger.debug(
    [
      "Accessible repositories are:",
      "  + read-only:",
      ...formatRepoList(access.readOnly),
      "  + read-write:",
      ...formatRepoList(access.readWrite)
    ].join("\n")
  );

  const parsed = parseOriginalCommand(originalCommand);
  if (!parsed.ok) {
    logger.debug(`Original command parsing failed with error: ${parsed.reason}`);
    return finish(logger, rejectCommand(stderr, originalCommand, parsed.reason));
  }

  const argv = parsed.argv;
  const handlerDeps: HandlerDeps = {
    stderr,
    pipeDispatch: deps.pipeDispatch,
    findExecutable: deps.findExecutable,
    cwd: deps.cwd,
    homeLookup: deps.homeLookup
  };

  let result: number;
  if (isHgServe(argv)) {
    logger.debug("Selected the Mercurial handler.");
    result = await deps.handlers.hg(argv, access, handlerDeps);
  } else if (isGitPack(argv)) {
    logger.debug("Selected the Git handler.");
    result = await deps.handlers.git(argv, access, handlerDeps);
  } else if (sameArgv(argv, BZR_SERVE_COMMAND)) {
    logger.debug("Selected the Bazaar handler.");
    warnNoAccessControl(stderr, "Bazaar");
    result = await deps.handlers.bzr(argv, access, handlerDeps);
  } else if (originalCommand === SVN_SERVE_COMMAND) {
    logger.debug("Selected the Subversion handler.");
    warnNoAccessControl(stderr, "Subversion");
    result = await deps.pipeDispatch(argv);
  } else {
    logger.error("Could not determine a valid handler.");
    result = rejectCommand(stderr, originalCommand);
  }

  return finish(logger, result);
}

function finish(logger: Logger, result: number): number {
  logger.info(`vcs-ssh exiting with status \`${result}'`);
  return result;
}

function isHgServe(argv: string[]): boolean {
  return argv.length === 5 && argv[0] === "hg" && argv[1] === "-R" && argv[3] === "serve" && argv[4] === "--stdio";
}

function isGitPack(argv: string[]): boolean {
  return argv.length === 2 && (argv[0] === "git-receive-pack" || argv[0] === "git-upload-pack");
}

function sameArgv(left: string[], right: string[]): boolean {
  return left.length === right.length && left.every((value, index) => value === right[index]);
}

function formatRepoList(repos: string[]): string[] {
  return repos.length === 0 ? ["    - None"] : repos.map((repo) => `    - ${repo}`);
}
