#!/usr/bin/env node
import { runVcsSshCli } from "../cli/vcs-ssh.js";

try {
  process.exitCode = await runVcsSshCli(process.argv.slice(2));
} catch (error) {
  process.stderr.write(`vcs-ssh: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
}
