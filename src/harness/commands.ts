import { spawn } from "node:child_process";
import type { Logger } from "../logging/logger.js";
import { formatArgv } from "../utils/shell.js";
import { hexdump } from "./hexdump.js";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  input?: string;
  env?: NodeJS.ProcessEnv;
}

export type CommandRunner = (argv: string[], options?: RunCommandOptions) => Promise<CommandResult>;

export const runCommand: CommandRunner = async (argv, options = {}) => {
  const [command, ...args] = argv;
  if (!command) {
    throw new Error("Cannot run an empty command.");
  }

  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, {
      env: options.env ?? process.env,
      stdio: ["pipe", "pipe", "pipe"],
      shell: false
    });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.once("error", reject);
    child.once("close", (code) => {
      resolve({
        exitCode: code ?? 255,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8")
      });
    });

    child.stdin.on("error", (error: NodeJS.ErrnoException) => {
      // EPIPE: the child exited without reading its input; its status tells the rest.
      if (error.code !== "EPIPE") {
        reject(error);
      }
    });
    child.stdin.end(options.input ?? "");
  });
};

export function logCommandResult(logger: Logger, argv: string[], result: CommandResult): void {
  if (!logger.isEnabled("debug")) {
    return;
  }

  logger.debug(
    [
      `Command \`${formatArgv(argv)}' ended with status ${result.exitCode}:`,
      "==STDERR==",
      result.stderr,
      hexdump(result.stderr),
      "==STDOUT==",
      result.stdout,
      hexdump(result.stdout)
    ].join("\n")
  );
}
