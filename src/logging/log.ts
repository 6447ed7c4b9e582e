import { appendFile, mkdir } from "fs/promises";
import { homedir } from "os";
import { dirname, join } from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const DEFAULT_LOG_FILE = join(homedir(), ".local", "share", "toolrag", "toolrag.log");

function isLevelName(value: string): value is LogLevel | "silent" {
  return value in LEVEL_ORDER;
}

function threshold(): number {
  const configured = (process.env.TOOLRAG_LOG_LEVEL || "info").toLowerCase();
  return isLevelName(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.info;
}

function logFilePath(): string {
  return process.env.TOOLRAG_LOG_FILE || DEFAULT_LOG_FILE;
}

/**
 * Format a single log line
 */
export function formatLogLine(level: LogLevel, message: string, extra?: Record<string, unknown>): string {
  const timestamp = new Date().toISOString();
  const extraStr = extra ? ` ${JSON.stringify(extra)}` : "";
  return `${timestamp} [${level.toUpperCase()}] ${message}${extraStr}\n`;
}

/**
 * Append a line to the toolrag log file.
 * Fire and forget: callers never wait on disk I/O.
 */
export function log(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < threshold()) {
    return;
  }

  const line = formatLogLine(level, message, extra);
  const file = logFilePath();

  mkdir(dirname(file), { recursive: true })
    .then(() => appendFile(file, line))
    .catch((error: unknown) => {
      process.stderr.write(`toolrag: cannot write log file ${file}: ${String(error)}\n`);
    });
}
