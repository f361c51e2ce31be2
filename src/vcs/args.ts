import { resolveUserPath, type HomeLookup } from "../utils/paths.js";
import type { RepoAccess } from "./handlers.js";

export const VERSION = "1.0.5";

export class VcsSshUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VcsSshUsageError";
  }
}

export type VcsSshInvocation = { action: "help" } | { action: "version" } | { action: "serve"; access: RepoAccess };

export interface ParseVcsSshArgsOptions {
  cwd?: string;
  homeLookup?: HomeLookup;
}

type DirOption = "--read-only" | "--read-write";

const DIR_OPTIONS: ReadonlySet<string> = new Set<DirOption>(["--read-only", "--read-write"]);

export function parseVcsSshArgs(argv: string[], options: ParseVcsSshArgsOptions = {}): VcsSshInvocation {
  const readOnly: string[] = [];
  const readWrite: string[] = [];
  const positional: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    if (token === "-h" || token === "--help") {
      return { action: "help" };
    }

    if (token === "-v" || token === "--version") {
      return { action: "version" };
    }

    if (token === "--") {
      positional.push(...argv.slice(index + 1));
      break;
    }

    const [name, inlineValue] = splitOption(token);
    if (isDirOption(name)) {
      const target = name === "--read-only" ? readOnly : readWrite;
      const values = inlineValue === undefined ? [] : [inlineValue];
      while (index + 1 < argv.length && !isOptionLike(argv[index + 1])) {
        values.push(argv[index + 1]);
        index += 1;
      }

      if (values.length === 0) {
        throw new VcsSshUsageError(`argument ${name}: expected at least one argument`);
      }

      target.push(...values);
      continue;
    }

    if (isOptionLike(token)) {
      throw new VcsSshUsageError(`unrecognized arguments: ${token}`);
    }

    positional.push(token);
  }

  const normalize = (path: string): string => resolveUserPath(path, { cwd: options.cwd, lookup: options.homeLookup });
  return {
    action: "serve",
    access: {
      readWrite: [...readWrite, ...positional].map(normalize),
      readOnly: readOnly.map(normalize)
    }
  };
}

export function renderVcsSshHelp(): string {
  return [
    "vcs-ssh: share multiple vcs repositories of different kinds on a single user account, via ssh.",
    "",
    "Usage:",
    "  vcs-ssh [DIR ...] [--read-only DIR ...] [--read-write DIR ...]",
    "",
    "To be used in ~/.ssh/authorized_keys with the \"command\" option, see sshd(8):",
    '  command="vcs-ssh path/to/repo1 --read-only /path/to/repo2",no-port-forwarding,no-X11-forwarding,no-agent-forwarding ssh-ed25519 ...',
    "",
    "Options:",
    "  DIR                     Repository directories accessible in r/w mode",
    "  --read-only DIR ...     Repository directories accessible in read-only mode",
    "  --read-write DIR ...    Repository directories accessible in r/w mode",
    "  -v, --version           Show version",
    "  -h, --help              Show help"
  ].join("\n");
}

export function renderVcsSshVersion(): string {
  return `vcs-ssh version ${VERSION}`;
}

function splitOption(token: string): [string, string | undefined] {
  if (!token.startsWith("--")) {
    return [token, undefined];
  }

  const equalsIndex = token.indexOf("=");
  return equalsIndex === -1 ? [token, undefined] : [token.slice(0, equalsIndex), token.slice(equalsIndex + 1)];
}

function isDirOption(value: string): value is DirOption {
  return DIR_OPTIONS.has(value);
}

function isOptionLike(value: string): boolean {
  return value.startsWith("-") && value !== "-";
}
