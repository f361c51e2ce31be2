import { join } from "node:path";

export type KeyType = "rsa" | "ecdsa" | "ed25519";

export interface KeyFile {
  type: KeyType;
  path: string;
}

export interface HarnessPaths {
  hostKeys: KeyFile[];
  userKey: KeyFile;
  authorizedKeys: string;
  sshdConfig: string;
  sshdPidFile: string;
}

export const KEY_BITS: Record<KeyType, string | undefined> = {
  rsa: "2048",
  ecdsa: "256",
  ed25519: undefined
};

export function resolveHarnessPaths(baseDir: string): HarnessPaths {
  return {
    hostKeys: [
      { type: "rsa", path: join(baseDir, "host_ssh_rsa_key") },
      { type: "ecdsa", path: join(baseDir, "host_ssh_ecdsa_key") },
      { type: "ed25519", path: join(baseDir, "host_ssh_ed25519_key") }
    ],
    userKey: { type: "ed25519", path: join(baseDir, "id_ed25519") },
    authorizedKeys: join(baseDir, "authorized_keys"),
    sshdConfig: join(baseDir, "sshd_config"),
    sshdPidFile: join(baseDir, "sshd.pid")
  };
}

export function generatedFiles(paths: HarnessPaths): string[] {
  const keys = [...paths.hostKeys, paths.userKey].flatMap((key) => [key.path, `${key.path}.pub`]);
  return [...keys, paths.authorizedKeys, paths.sshdConfig];
}
