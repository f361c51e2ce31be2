import { chmodSync, statSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type { Logger } from "../logging/logger.js";
import { modeToString } from "./preconditions.js";

// rwxr-xr-x plus the sticky bit: sshd's StrictModes refuses keys under a directory others can write to.
export const KEY_DIRECTORY_MODE_MASK = 0o1755;

export interface ChangedDirectoryMode {
  path: string;
  mode: number;
}

export interface ProtectKeyDirectoriesOptions {
  stopAt?: string;
  getuid?: () => number | undefined;
  logger?: Logger;
}

export function protectKeyDirectories(baseDir: string, options: ProtectKeyDirectoriesOptions = {}): ChangedDirectoryMode[] {
  const stopAt = options.stopAt === undefined ? undefined : resolve(options.stopAt);
  const uid = options.getuid?.() ?? process.getuid?.();
  const changed: ChangedDirectoryMode[] = [];

  let path = resolve(baseDir);
  while (path !== stopAt) {
    const stats = statSync(path);
    const mode = stats.mode & 0o7777;

    if ((mode & ~KEY_DIRECTORY_MODE_MASK) !== 0) {
      if (uid !== undefined && stats.uid !== uid) {
        options.logger?.warn(`Directory '${path}' (${modeToString(mode)}) is writable by others but not owned by uid ${uid}.`);
      } else {
        chmodSync(path, mode & KEY_DIRECTORY_MODE_MASK);
        changed.push({ path, mode });
      }
    }

    const parent = dirname(path);
    if (parent === path) {
      break;
    }
    path = parent;
  }

  return changed;
}

export function restoreDirectoryModes(changed: ChangedDirectoryMode[], logger?: Logger): void {
  for (const { path, mode } of [...changed].reverse()) {
    logger?.debug(`Restoring permissions on '${path}' to ${modeToString(mode)}.`);
    try {
      chmodSync(path, mode);
    } catch (error) {
      logger?.warn(`Could not restore mode of '${path}' to ${modeToString(mode)}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
