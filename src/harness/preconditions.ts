import { accessSync, constants, mkdirSync, statSync } from "node:fs";

export const OWNER_RWX = 0o700;

export type HarnessErrors = Map<string, string>;

export function modeToString(mode: number): string {
  return `0${mode.toString(8)}`;
}

export function checkDirectory(errors: HarnessErrors, path: string, mode = OWNER_RWX): boolean {
  const existing = statSync(path, { throwIfNoEntry: false });
  if (!existing) {
    try {
      mkdirSync(path, { recursive: true, mode });
    } catch (error) {
      errors.set(`checkDirectory(${path})`, error instanceof Error ? error.message : String(error));
      return false;
    }
  } else if (!existing.isDirectory()) {
    errors.set(`checkDirectory(${path})`, `'${path}' is not a directory.`);
    return false;
  }

  // mkdir is subject to the umask.
  const actual = statSync(path).mode & 0o7777;
  if ((actual & mode) !== mode) {
    errors.set(
      `checkDirectory(${path}, ${modeToString(mode)})`,
      `Insufficient permissions on directory '${path}': need ${modeToString(mode)} but got ${modeToString(actual)}.`
    );
    return false;
  }

  return true;
}

export function checkAuxiliaryProgram(errors: HarnessErrors, path: string, recordError = true): boolean {
  const stats = statSync(path, { throwIfNoEntry: false });
  if (!stats?.isFile()) {
    if (recordError) {
      errors.set(path, "Program not found.");
    }
    return false;
  }

  try {
    accessSync(path, constants.R_OK | constants.X_OK);
    return true;
  } catch {
    if (recordError) {
      errors.set(path, `Program '${path}' is not executable, its mode is ${modeToString(stats.mode & 0o7777)}.`);
    }
    return false;
  }
}
