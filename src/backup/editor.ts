import { resolve } from "node:path";
import { IllegalReuseError, InvalidArgumentError, InvalidStateError } from "./errors.js";
import { moveFile, nodeFileOps, removeFileIfPresent, type BackupFileOps } from "./file-ops.js";
import type { BackupRegistry } from "./registry.js";

export const DEFAULT_BACKUP_SUFFIX = "backup";
export const DEFAULT_EDIT_MODE = "a";

export interface BackupEditorOptions {
  // fs open flags, e.g. "a", "w+", "r+".
  mode?: string;
  suffix?: string;
  fileOps?: BackupFileOps;
}

export interface EditHandle {
  readonly path: string;
  readonly fd: number;
  write(data: string | Uint8Array): void;
  writeLine(line: string): void;
}

/**
 * Edits a file through a scratch copy and keeps a backup of the original so
 * the edit can be reverted later.
 *
 * Construction registers the editor in its registry and opens the edit file
 * (`<target>.new-<suffix>`). `enter()` snapshots the target to
 * `<target>.<suffix>` and hands out the edit file; `exit()` moves the edit
 * file onto the target. `restore()` puts the target back the way it was
 * before the edit and removes the editor from the registry.
 */
export class ScopedBackupEditor {
  readonly context: string;
  readonly targetPath: string;
  readonly editPath: string;
  readonly backupPath: string;
  readonly mode: string;

  private readonly registry: BackupRegistry;
  private readonly fileOps: BackupFileOps;
  private fd: number | null = null;
  private wasEntered = false;
  private wasExited = false;
  private backupTaken = false;
  private wasRestored = false;

  constructor(registry: BackupRegistry, context: string, path: string, options: BackupEditorOptions = {}) {
    const mode = options.mode ?? DEFAULT_EDIT_MODE;
    if (isReadOnlyMode(mode)) {
      throw new InvalidArgumentError(`Wrong file opening mode: ${mode}`);
    }

    const targetPath = resolve(path);
    registry.register(context, targetPath, this);

    const suffix = options.suffix || DEFAULT_BACKUP_SUFFIX;
    this.registry = registry;
    this.fileOps = options.fileOps ?? nodeFileOps;
    this.context = context;
    this.targetPath = targetPath;
    this.mode = mode;
    this.backupPath = `${targetPath}.${suffix}`;
    this.editPath = `${targetPath}.new-${suffix}`;

    try {
      this.prepareEditFile();
      this.fd = this.fileOps.open(this.editPath, mode);
    } catch (error) {
      registry.unregister(context, targetPath, this);
      throw error;
    }
  }

  get entered(): boolean {
    return this.wasEntered;
  }

  get exited(): boolean {
    return this.wasExited;
  }

  get hasBackup(): boolean {
    return this.backupTaken;
  }

  get restored(): boolean {
    return this.wasRestored;
  }

  enter(): EditHandle {
    if (this.wasEntered) {
      throw new IllegalReuseError("A ScopedBackupEditor cannot be entered more than once.");
    }
    const fd = this.requireOpenFd();

    this.wasEntered = true;
    if (this.fileOps.isFile(this.targetPath)) {
      this.fileOps.copyFile(this.targetPath, this.backupPath);
      this.backupTaken = true;
    } else {
      // A leftover backup from an earlier run does not describe this target.
      removeFileIfPresent(this.fileOps, this.backupPath);
    }

    const ops = this.fileOps;
    return {
      path: this.editPath,
      fd,
      write(data) {
        ops.write(fd, data);
      },
      writeLine(line) {
        ops.write(fd, `${line}\n`);
      }
    };
  }

  exit(): void {
    if (!this.wasEntered || this.wasExited) {
      throw new InvalidStateError(`No open edit scope for '${this.targetPath}'.`);
    }

    const fd = this.requireOpenFd();
    this.wasExited = true;
    this.fd = null;
    this.fileOps.close(fd);
    moveFile(this.fileOps, this.editPath, this.targetPath);
  }

  withEdit<T>(body: (handle: EditHandle) => T): T {
    const handle = this.enter();
    try {
      return body(handle);
    } finally {
      this.exit();
    }
  }

  async withEditAsync<T>(body: (handle: EditHandle) => Promise<T>): Promise<T> {
    const handle = this.enter();
    try {
      return await body(handle);
    } finally {
      this.exit();
    }
  }

  restore(): void {
    if (this.wasRestored) {
      return;
    }

    if (this.wasEntered && !this.wasExited) {
      throw new InvalidStateError(`Cannot restore '${this.targetPath}' while its edit scope is open.`);
    }

    if (!this.wasEntered) {
      // Never entered: the target was not touched, only the edit file exists.
      if (this.fd !== null) {
        this.fileOps.close(this.fd);
        this.fd = null;
      }
      removeFileIfPresent(this.fileOps, this.editPath);
    } else if (this.backupTaken) {
      moveFile(this.fileOps, this.backupPath, this.targetPath);
    } else {
      removeFileIfPresent(this.fileOps, this.targetPath);
    }

    this.wasRestored = true;
    this.registry.unregister(this.context, this.targetPath, this);
  }

  private prepareEditFile(): void {
    if (!startsFromExistingContent(this.mode)) {
      return;
    }

    if (this.fileOps.isFile(this.targetPath)) {
      this.fileOps.copyFile(this.targetPath, this.editPath);
      return;
    }

    removeFileIfPresent(this.fileOps, this.editPath);
  }

  private requireOpenFd(): number {
    if (this.fd === null) {
      throw new InvalidStateError(`Edit file '${this.editPath}' is not open.`);
    }

    return this.fd;
  }
}

export function isReadOnlyMode(mode: string): boolean {
  return mode.startsWith("r") && !mode.includes("+");
}

function startsFromExistingContent(mode: string): boolean {
  return mode.startsWith("a") || mode.startsWith("r");
}
