import type { EditHandle } from "../backup/editor.js";
import type { Logger } from "../logging/logger.js";
import type { CommandResult } from "./commands.js";

export type IpVersionFlag = "-4" | "-6";

export interface KeyscanTarget {
  keyscanBin: string;
  port: number;
  address: string;
}

export interface KeyscanFailure {
  ipVersion: IpVersionFlag;
  result: CommandResult;
}

const IP_VERSIONS: IpVersionFlag[] = ["-4", "-6"];

export function buildKeyscanArgv(target: KeyscanTarget, ipVersion: IpVersionFlag): string[] {
  return [target.keyscanBin, "-H", ipVersion, "-p", String(target.port), "-t", "rsa,ecdsa,ed25519", target.address];
}

export async function appendScannedHostKeys(
  handle: EditHandle,
  target: KeyscanTarget,
  run: (argv: string[]) => Promise<CommandResult>,
  logger: Logger
): Promise<KeyscanFailure[]> {
  const failures: KeyscanFailure[] = [];

  // One scan per address family: ssh-keyscan fails as a whole when either fails.
  for (const ipVersion of IP_VERSIONS) {
    const result = await run(buildKeyscanArgv(target, ipVersion));

    // ssh-keyscan exits 0 without output when it cannot connect.
    if (result.exitCode !== 0 || result.stdout.length === 0) {
      logger.debug(
        `Failed to scan host keys for IPv${ipVersion[1]}:\n==stderr==\n${result.stderr}\n==stdout==\n${result.stdout}\n==========`
      );
      failures.push({ ipVersion, result });
      continue;
    }

    logger.debug(`Appending new IPv${ipVersion[1]} host public keys to '${handle.path}':\n${result.stdout}`);
    handle.write(result.stdout);
  }

  return failures;
}

export function describeKeyscanFailures(failures: KeyscanFailure[]): string | null {
  // Only a failure of both scans is an error.
  if (failures.length < IP_VERSIONS.length) {
    return null;
  }

  const last = failures[failures.length - 1].result;
  return `ssh-keyscan failed with status ${last.exitCode}: ${last.stderr}\nOutput: ${last.stdout}`;
}
