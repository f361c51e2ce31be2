import { closeSync, copyFileSync, openSync, renameSync, statSync, unlinkSync, writeSync } from "node:fs";
import { isErrnoException } from "../utils/errno.js";

export interface BackupFileOps {
  isFile: (path: string) => boolean;
  copyFile: (source: string, destination: string) => void;
  rename: (source: string, destination: string) => void;
  unlink: (path: string) => void;
  open: (path: string, flags: string) => number;
  write: (fd: number, data: string | Uint8Array) => void;
  close: (fd: number) => void;
}

export const nodeFileOps: BackupFileOps = {
  isFile: (path) => statSync(path, { throwIfNoEntry: false })?.isFile() ?? false,
  copyFile: (source, destination) => copyFileSync(source, destination),
  rename: (source, destination) => renameSync(source, destination),
  unlink: (path) => unlinkSync(path),
  open: (path, flags) => openSync(path, flags),
  write: (fd, data) => {
    if (typeof data === "string") {
      writeSync(fd, data, null, "utf8");
      return;
    }

    writeSync(fd, data);
  },
  close: (fd) => closeSync(fd)
};

// Some platforms refuse to rename onto an existing file: delete it and rename once more.
export function moveFile(ops: BackupFileOps, source: string, destination: string): void {
  try {
    ops.rename(source, destination);
  } catch (error) {
    if (!ops.isFile(destination)) {
      throw error;
    }

    ops.unlink(destination);
    ops.rename(source, destination);
  }
}

export function removeFileIfPresent(ops: BackupFileOps, path: string): void {
  try {
    ops.unlink(path);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return;
    }

    throw error;
  }
}
