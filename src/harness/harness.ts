import { readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { BackupRegistry } from "../backup/registry.js";
import { resolveHarnessConfig, type HarnessConfig, type HarnessConfigOverrides } from "../config/harness.js";
import { createFileSink, createLogger, rolloverLogFile, type Logger } from "../logging/logger.js";
import { formatArgv } from "../utils/shell.js";
import { logCommandResult, runCommand, type CommandResult, type CommandRunner } from "./commands.js";
import { protectKeyDirectories, restoreDirectoryModes, type ChangedDirectoryMode } from "./key-permissions.js";
import { generateKey } from "./keys.js";
import { appendScannedHostKeys, describeKeyscanFailures } from "./known-hosts.js";
import { generatedFiles, resolveHarnessPaths, type HarnessPaths } from "./paths.js";
import { checkAuxiliaryProgram, checkDirectory, type HarnessErrors } from "./preconditions.js";
import { defaultSleep, waitFor, type RetryPolicy, type SleepFn } from "./retry.js";
import { buildSshdArgv, spawnDaemon, type DaemonProcess, type DaemonSpawner } from "./sshd.js";
import {
  buildAuthorizedKeyOptions,
  renderAuthorizedKeysLine,
  renderEnvironmentFile,
  renderSshConfigHostBlock,
  renderSshdConfig
} from "./templates.js";

export const HARNESS_CONTEXT = "ssh_harness";

export const SSHD_STARTUP_POLICY: RetryPolicy = { attempts: 6, delayMs: 1_000 };

export class SshHarnessSkipError extends Error {
  readonly errors: ReadonlyMap<string, string>;

  constructor(errors: ReadonlyMap<string, string>) {
    super(formatSkipReason(errors));
    this.name = "SshHarnessSkipError";
    this.errors = errors;
  }
}

export interface SshHarnessDeps {
  runCommand: CommandRunner;
  spawnDaemon: DaemonSpawner;
  sleep: SleepFn;
  getuid: () => number | undefined;
  emitWarning: (message: string) => void;
}

export interface SshHarnessOptions {
  config?: HarnessConfigOverrides;
  env?: NodeJS.ProcessEnv;
  registry?: BackupRegistry;
  logger?: Logger;
  deps?: Partial<SshHarnessDeps>;
}

const defaultDeps: SshHarnessDeps = {
  runCommand,
  spawnDaemon,
  sleep: defaultSleep,
  getuid: () => process.getuid?.(),
  emitWarning: (message) => process.emitWarning(message, "UserWarning")
};

// Edits of the user's known_hosts, ssh config and environment go through the registry and are reverted by teardown().
export class SshHarness {
  readonly config: HarnessConfig;
  readonly paths: HarnessPaths;
  readonly env: NodeJS.ProcessEnv;
  readonly logger: Logger;
  readonly registry: BackupRegistry;

  private readonly deps: SshHarnessDeps;
  private readonly errors: HarnessErrors = new Map();
  private daemon: DaemonProcess | null = null;
  private changedModes: ChangedDirectoryMode[] = [];

  constructor(options: SshHarnessOptions = {}) {
    const env = options.env ?? process.env;
    this.config = resolveHarnessConfig(options.config, { env });
    this.paths = resolveHarnessPaths(this.config.baseDir);
    this.env = { ...env, LANG: "C" };
    this.registry = options.registry ?? new BackupRegistry();
    this.deps = { ...defaultDeps, ...(options.deps ?? {}) };
    this.logger =
      options.logger ??
      createLogger({
        name: "ssh-harness",
        level: this.config.debug ? "debug" : "warn",
        sinks: this.config.logFile === null ? [] : [createFileSink(this.config.logFile)]
      });
  }

  get setupErrors(): ReadonlyMap<string, string> {
    return this.errors;
  }

  get running(): boolean {
    return this.daemon !== null;
  }

  // Throws SshHarnessSkipError, after cleaning up, when any step fails.
  async setup(): Promise<void> {
    if (this.config.logFile !== null) {
      rolloverLogFile(this.config.logFile);
    }
    this.errors.clear();

    if (!this.checkPreconditions()) {
      await this.skip();
    }

    await this.runStep("setup", async () => {
      this.writeSshdConfig();
      if (this.config.protectKeyDirectories) {
        this.changedModes = protectKeyDirectories(this.config.baseDir, {
          getuid: this.deps.getuid,
          logger: this.logger
        });
      }
      await this.generateKeys();
      this.writeAuthorizedKeys();
      this.writeEnvironmentFile();
    });

    await this.runStep(this.config.sshdBin, async () => {
      if (!(await this.startSshd())) {
        throw new Error("Not starting or crashing at startup.");
      }
    });

    await this.runStep("updateSshConfig", () => this.updateSshConfig());
    await this.runStep("updateKnownHosts", () => this.updateKnownHosts());

    if (this.errors.size > 0) {
      await this.skip();
    }
  }

  async teardown(): Promise<void> {
    if (this.daemon !== null) {
      this.logger.debug("Stopping the SSH daemon.");
      this.daemon.terminate();
      this.daemon = null;
    }

    for (const file of generatedFiles(this.paths)) {
      this.deleteFile(file);
    }

    this.registry.clearContext(HARNESS_CONTEXT);

    restoreDirectoryModes(this.changedModes, this.logger);
    this.changedModes = [];
  }

  async runCommand(argv: string[], input?: string): Promise<CommandResult> {
    this.logger.debug(`Executing command: \`${formatArgv(argv)}'`);
    const result = await this.deps.runCommand(argv, { input, env: this.env });
    logCommandResult(this.logger, argv, result);
    return result;
  }

  async runCommandWarnIfFails(argv: string[], action: string, input?: string): Promise<number> {
    const result = await this.runCommand(argv, input);
    if (result.exitCode !== 0) {
      const message = `${action} operation failed (${result.exitCode}):\n${result.stderr}`;
      this.logger.warn(message);
      this.deps.emitWarning(message);
    }

    return result.exitCode;
  }

  private checkPreconditions(): boolean {
    // Run every check so all problems are reported at once.
    const checks = [
      checkDirectory(this.errors, this.config.homeDir),
      checkDirectory(this.errors, dirname(this.config.sshConfigPath)),
      checkDirectory(this.errors, this.config.cwd),
      checkDirectory(this.errors, this.config.baseDir),
      checkAuxiliaryProgram(this.errors, this.config.sshdBin),
      checkAuxiliaryProgram(this.errors, this.config.sshKeyscanBin),
      checkAuxiliaryProgram(this.errors, this.config.sshKeygenBin)
    ];

    return checks.every(Boolean);
  }

  private writeSshdConfig(): void {
    const content = renderSshdConfig({
      port: this.config.port,
      address: this.config.bindAddress,
      hostKeyPaths: this.paths.hostKeys.map((key) => key.path),
      pidFilePath: this.paths.sshdPidFile,
      authorizedKeysPath: this.paths.authorizedKeys,
      authMethod: this.config.authMethod,
      permitUserEnvironment: Object.keys(this.config.sshEnvironment).length > 0
    });
    this.logger.debug(content);
    writeFileSync(this.paths.sshdConfig, content, "utf8");
  }

  private async generateKeys(): Promise<void> {
    for (const key of [...this.paths.hostKeys, this.paths.userKey]) {
      await generateKey((argv) => this.runCommand(argv), this.config.sshKeygenBin, key, this.logger);
    }
  }

  private writeAuthorizedKeys(): void {
    this.logger.debug("Creating the user's authorized_keys file.");
    const publicKey = readFileSync(`${this.paths.userKey.path}.pub`, "utf8");
    const options = buildAuthorizedKeyOptions(
      this.config.authorizedKeyOptions,
      this.config.sshEnvironment,
      this.config.sshEnvironmentFile
    );
    writeFileSync(this.paths.authorizedKeys, renderAuthorizedKeysLine(options, publicKey), "utf8");
  }

  private writeEnvironmentFile(): void {
    if (!this.config.sshEnvironmentFile) {
      return;
    }

    this.registry
      .edit(HARNESS_CONTEXT, this.config.sshEnvironmentPath, { mode: "w+" })
      .withEdit((handle) => handle.write(renderEnvironmentFile(this.config.sshEnvironment)));
  }

  private async startSshd(): Promise<boolean> {
    const argv = buildSshdArgv(this.config.sshdBin, this.paths.sshdConfig);
    this.logger.debug(`Starting SSH daemon with command \`${formatArgv(argv)}'`);
    this.daemon = this.deps.spawnDaemon(argv, {
      env: this.env,
      onError: (error) => this.logger.error(`SSH daemon failed: ${error.message}`)
    });

    const started = await waitFor(() => isFile(this.paths.sshdPidFile), SSHD_STARTUP_POLICY, {
      sleep: this.deps.sleep,
      onRetry: (attempt) => this.logger.debug(`Waiting for the SSH daemon pid file (attempt ${attempt}).`)
    });
    if (!started) {
      this.daemon.terminate();
      this.daemon = null;
    }

    return started;
  }

  private updateSshConfig(): void {
    if (!this.config.updateSshConfig) {
      return;
    }

    this.registry.edit(HARNESS_CONTEXT, this.config.sshConfigPath, { mode: "a" }).withEdit((handle) =>
      handle.write(
        renderSshConfigHostBlock({
          hostName: this.config.sshConfigHostName,
          address: this.config.bindAddress,
          port: this.config.port,
          identityFile: this.paths.userKey.path
        })
      )
    );
  }

  private async updateKnownHosts(): Promise<void> {
    const failures = await this.registry
      .edit(HARNESS_CONTEXT, this.config.knownHostsPath, { mode: "a" })
      .withEditAsync((handle) =>
        appendScannedHostKeys(
          handle,
          { keyscanBin: this.config.sshKeyscanBin, port: this.config.port, address: this.config.bindAddress },
          (argv) => this.runCommand(argv),
          this.logger
        )
      );

    const failure = describeKeyscanFailures(failures);
    if (failure !== null) {
      this.errors.set("updateKnownHosts", failure);
    }
  }

  private deleteFile(path: string): void {
    this.logger.debug(`Cleaning up file '${path}'`);
    if (!isFile(path)) {
      this.logger.debug(`Path '${path}' does not designate a file.`);
      return;
    }

    try {
      rmSync(path);
      this.logger.debug(`File '${path}' removed.`);
    } catch (error) {
      this.logger.error(`Could not remove '${path}': ${formatError(error)}`);
    }
  }

  private async runStep(step: string, body: () => void | Promise<void>): Promise<void> {
    try {
      await body();
    } catch (error) {
      this.errors.set(step, formatError(error));
      await this.skip();
    }
  }

  private async skip(): Promise<never> {
    const errors = new Map(this.errors);
    try {
      await this.teardown();
    } catch (error) {
      this.logger.error(`Teardown after a failed setup failed: ${formatError(error)}`);
      errors.set("teardown", formatError(error));
    }
    throw new SshHarnessSkipError(errors);
  }
}

export function formatSkipReason(errors: ReadonlyMap<string, string>): string {
  let reason = "One or more errors occurred while trying to setup the ssh harness:\n";
  for (const [step, message] of errors) {
    reason += ` - ${step}\n`;
    for (const line of message.split("\n")) {
      reason += `    ${line}\n`;
    }
  }

  return reason;
}

function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}
