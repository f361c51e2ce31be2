import { spawn } from "node:child_process";
import { accessSync, constants, statSync } from "node:fs";
import { constants as osConstants } from "node:os";
import { delimiter, resolve } from "node:path";

export function findExecutable(command: string, pathValue: string | undefined): string | null {
  for (const directory of (pathValue ?? "").split(delimiter)) {
    if (directory === "") {
      continue;
    }

    const candidate = resolve(directory, command);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }

  return null;
}

export function isExecutableFile(path: string): boolean {
  if (!(statSync(path, { throwIfNoEntry: false })?.isFile() ?? false)) {
    return false;
  }

  try {
    accessSync(path, constants.R_OK | constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export async function pipeDispatch(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const [command, ...args] = argv;
  if (!command) {
    throw new Error("Cannot dispatch an empty command.");
  }

  return new Promise<number>((resolvePromise, reject) => {
    const child = spawn(command, args, { stdio: "inherit", shell: false, env });
    child.once("error", reject);
    child.once("close", (code, signal) => {
      resolvePromise(toExitStatus(code, signal));
    });
  });
}

export function toExitStatus(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code;
  }

  if (signal !== null) {
    return 128 + (osConstants.signals[signal] ?? 0);
  }

  return 255;
}
