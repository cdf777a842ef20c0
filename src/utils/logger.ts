import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "warn";
let logFile: string | null = null;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Send every record, whatever the console level, to a diagnostic file.
 * Pass null to detach.
 */
export function setLogFile(path: string | null): void {
  if (path) mkdirSync(dirname(path), { recursive: true });
  logFile = path;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function formatMsg(level: LogLevel, msg: string, data?: Record<string, unknown>): string {
  const ts = new Date().toISOString();
  const base = `${ts} [${level.toUpperCase()}] ${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

function emit(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
  const line = formatMsg(level, msg, data);
  if (logFile) appendFileSync(logFile, line + "\n");
  if (!shouldLog(level)) return;
  if (level === "warn" || level === "error") console.error(line);
  else console.log(line);
}

export const log = {
  debug(msg: string, data?: Record<string, unknown>): void {
    emit("debug", msg, data);
  },
  info(msg: string, data?: Record<string, unknown>): void {
    emit("info", msg, data);
  },
  warn(msg: string, data?: Record<string, unknown>): void {
    emit("warn", msg, data);
  },
  error(msg: string, data?: Record<string, unknown>): void {
    emit("error", msg, data);
  },
};

export type Logger = typeof log;
