import { homedir } from "node:os";
import { join, resolve } from "node:path";

export type AuthMethod = "pubkey" | "password" | "any";

export interface HarnessConfig {
  port: number;
  bindAddress: string;
  sshdBin: string;
  sshKeygenBin: string;
  sshKeyscanBin: string;
  baseDir: string;
  cwd: string;
  homeDir: string;
  authMethod: AuthMethod;
  sshConfigHostName: string;
  // Non-empty turns on PermitUserEnvironment.
  sshEnvironment: Record<string, string>;
  sshEnvironmentFile: boolean;
  updateSshConfig: boolean;
  authorizedKeyOptions: string | null;
  protectKeyDirectories: boolean;
  knownHostsPath: string;
  sshConfigPath: string;
  sshEnvironmentPath: string;
  logFile: string | null;
  debug: boolean;
}

export type HarnessConfigOverrides = Partial<HarnessConfig>;

export interface ResolveHarnessConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  homeDir?: string;
}

const AUTH_METHODS: ReadonlySet<string> = new Set<AuthMethod>(["pubkey", "password", "any"]);

export const DEFAULT_PORT = 2200;
export const DEFAULT_BIND_ADDRESS = "localhost";
export const DEFAULT_SSHD_BIN = "/usr/sbin/sshd";
export const DEFAULT_SSH_KEYGEN_BIN = "/usr/bin/ssh-keygen";
export const DEFAULT_SSH_KEYSCAN_BIN = "/usr/bin/ssh-keyscan";
export const DEFAULT_SSH_CONFIG_HOST_NAME = "test-harness";
export const HARNESS_LOG_FILENAME = "ssh-harness.log";

export function resolveHarnessConfig(
  overrides: HarnessConfigOverrides = {},
  options: ResolveHarnessConfigOptions = {}
): HarnessConfig {
  const env = options.env ?? process.env;
  const cwd = resolve(overrides.cwd ?? options.cwd ?? process.cwd());
  const homeDir = resolve(overrides.homeDir ?? options.homeDir ?? homedir());
  const sshDir = join(homeDir, ".ssh");

  return validateHarnessConfig({
    port: overrides.port ?? parsePort(env.SSH_HARNESS_PORT) ?? DEFAULT_PORT,
    bindAddress: overrides.bindAddress ?? normalizeValue(env.SSH_HARNESS_BIND_ADDRESS) ?? DEFAULT_BIND_ADDRESS,
    sshdBin: overrides.sshdBin ?? normalizeValue(env.SSH_HARNESS_SSHD_BIN) ?? DEFAULT_SSHD_BIN,
    sshKeygenBin: overrides.sshKeygenBin ?? normalizeValue(env.SSH_HARNESS_SSH_KEYGEN_BIN) ?? DEFAULT_SSH_KEYGEN_BIN,
    sshKeyscanBin: overrides.sshKeyscanBin ?? normalizeValue(env.SSH_HARNESS_SSH_KEYSCAN_BIN) ?? DEFAULT_SSH_KEYSCAN_BIN,
    baseDir: resolve(cwd, overrides.baseDir ?? join("tests", "tmp", "sshd")),
    cwd,
    homeDir,
    authMethod: overrides.authMethod ?? "pubkey",
    sshConfigHostName: overrides.sshConfigHostName ?? DEFAULT_SSH_CONFIG_HOST_NAME,
    sshEnvironment: { ...(overrides.sshEnvironment ?? {}) },
    sshEnvironmentFile: overrides.sshEnvironmentFile ?? false,
    updateSshConfig: overrides.updateSshConfig ?? true,
    authorizedKeyOptions: overrides.authorizedKeyOptions ?? null,
    protectKeyDirectories: overrides.protectKeyDirectories ?? true,
    knownHostsPath: overrides.knownHostsPath ?? join(sshDir, "known_hosts"),
    sshConfigPath: overrides.sshConfigPath ?? join(sshDir, "config"),
    sshEnvironmentPath: overrides.sshEnvironmentPath ?? join(sshDir, "environment"),
    logFile: overrides.logFile === undefined ? join(cwd, HARNESS_LOG_FILENAME) : overrides.logFile,
    debug: overrides.debug ?? env.SSH_HARNESS_DEBUG !== undefined
  });
}

export function validateHarnessConfig(config: HarnessConfig): HarnessConfig {
  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    throw new Error(`Invalid harness port: expected an integer between 1 and 65535, got ${config.port}.`);
  }

  if (!AUTH_METHODS.has(config.authMethod)) {
    throw new Error(`Invalid harness auth method '${config.authMethod}': expected pubkey|password|any.`);
  }

  for (const [key, value] of Object.entries({
    bindAddress: config.bindAddress,
    sshdBin: config.sshdBin,
    sshKeygenBin: config.sshKeygenBin,
    sshKeyscanBin: config.sshKeyscanBin,
    sshConfigHostName: config.sshConfigHostName
  })) {
    if (value.trim() === "") {
      throw new Error(`Invalid harness config: ${key} must not be empty.`);
    }
  }

  for (const name of Object.keys(config.sshEnvironment)) {
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
      throw new Error(`Invalid ssh environment variable name '${name}'.`);
    }
  }

  return config;
}

function parsePort(value: string | undefined): number | undefined {
  const normalized = normalizeValue(value);
  if (normalized === undefined) {
    return undefined;
  }

  if (!/^\d+$/.test(normalized)) {
    throw new Error(`Invalid SSH_HARNESS_PORT '${normalized}': expected an integer.`);
  }

  return Number.parseInt(normalized, 10);
}

function normalizeValue(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
