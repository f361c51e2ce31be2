import { mkdirSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";

export interface ThrowableTempDirOptions {
  prefix?: string;
  suffix?: string;
  dir?: string;
  onWarning?: (message: string) => void;
}

export async function withThrowableTempDir<T>(
  body: (dir: string) => T | Promise<T>,
  options: ThrowableTempDirOptions = {}
): Promise<T> {
  const parent = resolve(options.dir ?? tmpdir());
  mkdirSync(parent, { recursive: true, mode: 0o700 });

  const created = mkdtempSync(join(parent, options.prefix ?? "throw-"));
  const dir = options.suffix ? renameWithSuffix(created, options.suffix) : created;

  const previous = process.cwd();
  if (previous === dir) {
    const message = `Already in temporary directory '${dir}'.`;
    if (options.onWarning) {
      options.onWarning(message);
    } else {
      process.emitWarning(message);
    }
  } else {
    process.chdir(dir);
  }

  try {
    return await body(dir);
  } finally {
    process.chdir(previous);
    rmSync(dir, { recursive: true, force: true });
  }
}

function renameWithSuffix(dir: string, suffix: string): string {
  const target = `${dir}${suffix}`;
  mkdirSync(target, { mode: 0o700 });
  rmSync(dir, { recursive: true });
  return target;
}
