import type { AuthMethod } from "../config/harness.js";

export interface SshdConfigValues {
  port: number;
  address: string;
  hostKeyPaths: string[];
  pidFilePath: string;
  authorizedKeysPath: string;
  authMethod: AuthMethod;
  permitUserEnvironment: boolean;
}

export function renderSshdConfig(values: SshdConfigValues): string {
  const { passwordAuth, pubkeyAuth } = authSwitches(values.authMethod);

  return [
    "# ssh-harness generated configuration file",
    `Port ${values.port}`,
    `ListenAddress ${values.address}`,
    ...values.hostKeyPaths.map((path) => `HostKey ${path}`),
    "",
    "SyslogFacility AUTH",
    "LogLevel VERBOSE",
    "",
    `PidFile ${values.pidFilePath}`,
    "LoginGraceTime 120",
    "PermitRootLogin yes",
    "StrictModes yes",
    "",
    `PubkeyAuthentication ${yesNo(pubkeyAuth)}`,
    `AuthorizedKeysFile\t${values.authorizedKeysPath}`,
    `PermitUserEnvironment ${yesNo(values.permitUserEnvironment)}`,
    "",
    "IgnoreRhosts yes",
    "HostbasedAuthentication no",
    "",
    "PermitEmptyPasswords no",
    "KbdInteractiveAuthentication no",
    `PasswordAuthentication ${yesNo(passwordAuth)}`,
    "",
    "GSSAPIAuthentication no",
    "",
    "X11Forwarding no",
    "PrintMotd no",
    "PrintLastLog no",
    "TCPKeepAlive yes",
    "Banner none",
    "AcceptEnv LANG LC_*",
    "",
    "# No sftp subsystem, and no PAM: it may prevent sshd from opening a session.",
    "UsePAM no",
    ""
  ].join("\n");
}

export interface SshConfigHostValues {
  hostName: string;
  address: string;
  port: number;
  identityFile: string;
}

export function renderSshConfigHostBlock(values: SshConfigHostValues): string {
  return [
    "",
    `Host ${values.hostName}`,
    `        HostName ${values.address}`,
    `        Port ${values.port}`,
    `        IdentityFile ${values.identityFile}`,
    ""
  ].join("\n");
}

export function buildAuthorizedKeyOptions(
  options: string | null,
  environment: Record<string, string>,
  useEnvironmentFile: boolean
): string | null {
  const entries = Object.entries(environment);
  if (entries.length === 0 || useEnvironmentFile) {
    return options;
  }

  const environmentOptions = entries.map(([key, value]) => `environment="${key}=${value}"`).join(",");
  return options === null ? environmentOptions : `${options},${environmentOptions}`;
}

export function renderAuthorizedKeysLine(options: string | null, publicKey: string): string {
  const key = publicKey.trim();
  return options === null ? `${key}\n` : `${options} ${key}\n`;
}

export function renderEnvironmentFile(environment: Record<string, string>): string {
  return Object.entries(environment)
    .map(([key, value]) => `${key}=${value}\n`)
    .join("");
}

function authSwitches(method: AuthMethod): { passwordAuth: boolean; pubkeyAuth: boolean } {
  switch (method) {
    case "password":
      return { passwordAuth: true, pubkeyAuth: false };
    case "pubkey":
      return { passwordAuth: false, pubkeyAuth: true };
    case "any":
      return { passwordAuth: true, pubkeyAuth: true };
  }
}

function yesNo(value: boolean): "yes" | "no" {
  return value ? "yes" : "no";
}
