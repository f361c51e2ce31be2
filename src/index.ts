export { BackupRegistry } from "./backup/registry.js";
export { ScopedBackupEditor, type BackupEditorOptions, type EditHandle } from "./backup/editor.js";
export {
  AlreadyBackedUpError,
  BackupError,
  IllegalReuseError,
  InvalidArgumentError,
  InvalidStateError,
  NotRegisteredError
} from "./backup/errors.js";
export { nodeFileOps, type BackupFileOps } from "./backup/file-ops.js";
export { resolveHarnessConfig, type HarnessConfig, type HarnessConfigOverrides } from "./config/harness.js";
export { HARNESS_CONTEXT, SshHarness, SshHarnessSkipError, type SshHarnessOptions } from "./harness/harness.js";
export { hexdump } from "./harness/hexdump.js";
export { withThrowableTempDir } from "./harness/temp-dir.js";
export { createLogger, type Logger, type LogLevel } from "./logging/logger.js";
export { runVcsSsh, type VcsSshDeps } from "./vcs/dispatch.js";
export { parseVcsSshArgs } from "./vcs/args.js";
export type { RepoAccess } from "./vcs/handlers.js";
