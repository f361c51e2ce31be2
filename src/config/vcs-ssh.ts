import { createFileSink, createLogger, logger as silentLogger, parseLogLevel, type Logger } from "../logging/logger.js";

export const VCS_SSH_LOG_FILE_ENV = "VCS_SSH_LOG_FILE";
export const VCS_SSH_LOG_LEVEL_ENV = "VCS_SSH_LOG_LEVEL";

// stderr belongs to the remote user, so logging needs a log file.
export function resolveVcsSshLogger(env: NodeJS.ProcessEnv): Logger {
  const logFile = env[VCS_SSH_LOG_FILE_ENV]?.trim();
  if (!logFile) {
    return silentLogger;
  }

  return createLogger({
    name: "vcs-ssh",
    level: parseLogLevel(env[VCS_SSH_LOG_LEVEL_ENV]) ?? "info",
    sinks: [createFileSink(logFile)]
  });
}
