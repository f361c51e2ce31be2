import { chmodSync, rmSync } from "node:fs";
import type { Logger } from "../logging/logger.js";
import type { CommandResult } from "./commands.js";
import { KEY_BITS, type KeyFile } from "./paths.js";

export const PRIVATE_KEY_MODE = 0o400;
export const KEY_COMMENT = "Weak key generated for test purposes only *DO NOT DISSEMINATE*";

export function buildKeygenArgv(keygenBin: string, key: KeyFile): string[] {
  const bits = KEY_BITS[key.type];
  return [
    keygenBin,
    "-q",
    "-t",
    key.type,
    ...(bits === undefined ? [] : ["-b", bits]),
    "-N",
    "",
    "-f",
    key.path,
    "-C",
    KEY_COMMENT
  ];
}

export async function generateKey(
  run: (argv: string[]) => Promise<CommandResult>,
  keygenBin: string,
  key: KeyFile,
  logger: Logger
): Promise<void> {
  rmSync(key.path, { force: true });
  rmSync(`${key.path}.pub`, { force: true });

  logger.debug(`Generating ${key.type} key '${key.path}'.`);
  const result = await run(buildKeygenArgv(keygenBin, key));
  if (result.exitCode !== 0) {
    throw new Error(
      `ssh-keygen failed with exit-status ${result.exitCode} output:\n==STDOUT==\n${result.stdout}\n==STDERR==\n${result.stderr}`
    );
  }

  chmodSync(key.path, PRIVATE_KEY_MODE);
}
