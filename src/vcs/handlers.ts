import { resolveUserPath, type HomeLookup } from "../utils/paths.js";
import { buildRejectPushHook, rejectMissingCommand, rejectPush, rejectRepo, type TextWriter } from "./reject.js";

export interface RepoAccess {
  readWrite: string[];
  readOnly: string[];
}

export interface HandlerDeps {
  stderr: TextWriter;
  pipeDispatch: (argv: string[]) => Promise<number>;
  findExecutable: (command: string) => string | null;
  cwd: () => string;
  homeLookup?: HomeLookup;
}

export type VcsHandler = (argv: string[], access: RepoAccess, deps: HandlerDeps) => Promise<number>;

const HG_HOOK_NAME = "vcs-ssh";

export function requireCommand(handler: VcsHandler): VcsHandler {
  return async (argv, access, deps) => {
    const [command] = argv;
    if (!command || deps.findExecutable(command) === null) {
      return rejectMissingCommand(deps.stderr);
    }

    return handler(argv, access, deps);
  };
}

export const gitHandle: VcsHandler = requireCommand(async (argv, access, deps) => {
  const [command, path] = argv;
  const repo = normalizeRepoPath(path, deps);

  if (!access.readWrite.includes(repo) && !access.readOnly.includes(repo)) {
    return rejectRepo(deps.stderr, repo);
  }

  if (access.readOnly.includes(repo) && command === "git-receive-pack") {
    return rejectPush(deps.stderr);
  }

  return deps.pipeDispatch([command, repo]);
});

export const hgHandle: VcsHandler = requireCommand(async (argv, access, deps) => {
  const repo = normalizeRepoPath(argv[2], deps);
  const isReadOnly = access.readOnly.includes(repo);

  if (!isReadOnly && !access.readWrite.includes(repo)) {
    return rejectRepo(deps.stderr, repo);
  }

  const rewritten = ["hg", "-R", repo, "serve", "--stdio"];
  if (isReadOnly) {
    const hook = buildRejectPushHook();
    rewritten.push(
      "--config",
      `hooks.prechangegroup.${HG_HOOK_NAME}=${hook}`,
      "--config",
      `hooks.prepushkey.${HG_HOOK_NAME}=${hook}`
    );
  }

  return deps.pipeDispatch(rewritten);
});

export const bzrHandle: VcsHandler = requireCommand(async (argv, _access, deps) => deps.pipeDispatch(argv));

export function normalizeRepoPath(path: string, deps: Pick<HandlerDeps, "cwd" | "homeLookup">): string {
  return resolveUserPath(path, { cwd: deps.cwd(), lookup: deps.homeLookup });
}
