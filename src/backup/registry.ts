import { resolve } from "node:path";
import { ScopedBackupEditor, type BackupEditorOptions } from "./editor.js";
import { AlreadyBackedUpError, NotRegisteredError } from "./errors.js";

// Not safe for concurrent use.
export class BackupRegistry {
  private readonly contexts = new Map<string, Map<string, ScopedBackupEditor>>();

  edit(context: string, path: string, options?: BackupEditorOptions): ScopedBackupEditor {
    return new ScopedBackupEditor(this, context, path, options);
  }

  register(context: string, path: string, editor: ScopedBackupEditor): void {
    let entries = this.contexts.get(context);
    if (!entries) {
      entries = new Map();
      this.contexts.set(context, entries);
    }

    if (entries.has(path)) {
      throw new AlreadyBackedUpError(context, path);
    }

    entries.set(path, editor);
  }

  unregister(context: string, path: string, editor: ScopedBackupEditor): void {
    const entries = this.contexts.get(context);
    const registered = entries?.get(path);
    if (!entries || registered === undefined) {
      throw new NotRegisteredError(`No backup registered for '${path}' in context '${context}'.`);
    }

    if (registered !== editor) {
      throw new NotRegisteredError(`Registered and passed editors for '${path}' in context '${context}' do not match.`);
    }

    entries.delete(path);
    if (entries.size === 0) {
      this.contexts.delete(context);
    }
  }

  get(context: string, path: string): ScopedBackupEditor | undefined {
    return this.contexts.get(context)?.get(resolve(path));
  }

  paths(context: string): string[] {
    return [...(this.contexts.get(context)?.keys() ?? [])];
  }

  contextNames(): string[] {
    return [...this.contexts.keys()];
  }

  clear(context: string, path: string): void {
    const editor = this.get(context, path);
    if (!editor) {
      throw new NotRegisteredError(`No backup registered for '${resolve(path)}' in context '${context}'.`);
    }

    editor.restore();
  }

  clearContext(context: string): void {
    const entries = this.contexts.get(context);
    if (!entries) {
      return;
    }

    const failures: unknown[] = [];
    for (const editor of [...entries.values()]) {
      try {
        editor.restore();
      } catch (error) {
        failures.push(error);
      }
    }

    if (failures.length === 1) {
      throw failures[0];
    }
    if (failures.length > 1) {
      throw new AggregateError(failures, `Failed to restore ${failures.length} files in context '${context}'.`);
    }
  }
}
