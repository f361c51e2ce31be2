import { appendFileSync, existsSync, renameSync } from "node:fs";

export type LogLevel = "debug" | "verbose" | "info" | "warn" | "error";

export type LogSink = (line: string) => void;

export interface Logger {
  readonly name: string;
  level: LogLevel;
  debug(message: string): void;
  verbose(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  isEnabled(level: LogLevel): boolean;
}

export interface CreateLoggerOptions {
  name: string;
  level?: LogLevel;
  sinks?: LogSink[];
  now?: () => Date;
  pid?: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  verbose: 20,
  info: 30,
  warn: 40,
  error: 50
};

const LOG_LEVELS: ReadonlySet<string> = new Set(Object.keys(LEVEL_ORDER));

export function createLogger(options: CreateLoggerOptions): Logger {
  const sinks = options.sinks ?? [];
  const now = options.now ?? (() => new Date());
  const pid = options.pid ?? process.pid;

  const logger: Logger = {
    name: options.name,
    level: options.level ?? "info",
    debug: (message) => emit("debug", message),
    verbose: (message) => emit("verbose", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
    isEnabled: (level) => sinks.length > 0 && LEVEL_ORDER[level] >= LEVEL_ORDER[logger.level]
  };

  function emit(level: LogLevel, message: string): void {
    if (!logger.isEnabled(level)) {
      return;
    }

    const line = formatLogLine(options.name, pid, now(), level, message);
    for (const sink of sinks) {
      sink(line);
    }
  }

  return logger;
}

export function formatLogLine(name: string, pid: number, date: Date, level: LogLevel, message: string): string {
  return `${date.toISOString()} ${name}[${pid}] ${level.toUpperCase()}: ${message}\n`;
}

export function createFileSink(path: string): LogSink {
  return (line) => {
    appendFileSync(path, line, "utf8");
  };
}

// Keeps a single previous log as `<path>.1`.
export function rolloverLogFile(path: string): void {
  if (existsSync(path)) {
    renameSync(path, `${path}.1`);
  }
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

export const logger = createLogger({ name: "vcs-ssh" });
