import { spawn } from "node:child_process";

export interface DaemonProcess {
  readonly pid: number | undefined;
  terminate(): void;
}

export interface SpawnDaemonOptions {
  env: NodeJS.ProcessEnv;
  onError: (error: Error) => void;
}

export type DaemonSpawner = (argv: string[], options: SpawnDaemonOptions) => DaemonProcess;

export function buildSshdArgv(sshdBin: string, configPath: string): string[] {
  return [sshdBin, "-D", "-4", "-f", configPath];
}

export const spawnDaemon: DaemonSpawner = (argv, options) => {
  const [command, ...args] = argv;
  if (!command) {
    throw new Error("Cannot start an empty command.");
  }

  const child = spawn(command, args, { env: options.env, stdio: "ignore", shell: false });
  child.once("error", options.onError);

  return {
    pid: child.pid,
    terminate() {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill("SIGTERM");
      }
    }
  };
};
