import { quoteShellArg } from "../utils/shell.js";

export const EXIT_REJECTED = 255;
export const EXIT_COMMAND_NOT_FOUND = 254;

export interface TextWriter {
  write(chunk: string): unknown;
}

export const READ_ONLY_MESSAGE =
  "\u001b[1;41mYou only have read only access to this repository\u001b[0m: you cannot push anything into it !";
export const COMMAND_NOT_FOUND_MESSAGE = "The command required to fulfill your request has not been found on this system.";

export function rejectPush(stderr: TextWriter): number {
  stderr.write(`remote: ${READ_ONLY_MESSAGE}\n`);
  return EXIT_REJECTED;
}

// hg aborts the push when a pre-hook exits non-zero.
export function buildRejectPushHook(): string {
  return [
    `echo ${quoteShellArg("Permission denied")} >&2`,
    `echo ${quoteShellArg(READ_ONLY_MESSAGE)} >&2`,
    `exit ${EXIT_REJECTED}`
  ].join("; ");
}

export function rejectRepo(stderr: TextWriter, repo: string): number {
  stderr.write(`Illegal repository "${repo}"\n`);
  return EXIT_REJECTED;
}

export function rejectCommand(stderr: TextWriter, command: string, extra = ""): number {
  const suffix = extra ? `: ${extra}` : "";
  stderr.write(`remote: Illegal command "${command}"${suffix}\n`);
  return EXIT_REJECTED;
}

export function warnNoAccessControl(stderr: TextWriter, vcsName: string): void {
  stderr.write(`remote: Warning: using ${vcsName}: no access control enforced!\n`);
}

export function rejectMissingCommand(stderr: TextWriter): number {
  stderr.write(COMMAND_NOT_FOUND_MESSAGE);
  return EXIT_COMMAND_NOT_FOUND;
}
