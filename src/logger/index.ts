// 统一日志：按级别输出到控制台，error/warn 走 stderr

import { getConsoleLevel, shouldLogToConsole } from "./config.js";
import type { LogCategory, LogEntry, LogLevel, LogPayloadConvention } from "./types.js";

function now(): string {
  return new Date().toISOString();
}

export function formatConsole(entry: LogEntry): string {
  const tag = `[${entry.category}]`;
  const payloadStr =
    entry.payload != null && Object.keys(entry.payload).length > 0
      ? " " + JSON.stringify(entry.payload)
      : "";
  return `${tag} ${entry.message}${payloadStr}`;
}

function writeConsole(entry: LogEntry): void {
  const line = formatConsole(entry);
  if (entry.level === "error") {
    console.error(line);
  } else if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function emit(level: LogLevel, category: LogCategory, message: string, meta?: LogPayloadConvention): void {
  if (!shouldLogToConsole(getConsoleLevel(), level)) return;
  writeConsole({
    level,
    category,
    message,
    payload: meta && Object.keys(meta).length > 0 ? { ...meta } : undefined,
    created_at: now(),
  });
}

/** 统一 logger：控制台由 LOG_LEVEL 过滤 */
export const logger = {
  error(category: LogCategory, message: string, meta?: LogPayloadConvention) {
    emit("error", category, message, meta);
  },
  warn(category: LogCategory, message: string, meta?: LogPayloadConvention) {
    emit("warn", category, message, meta);
  },
  info(category: LogCategory, message: string, meta?: LogPayloadConvention) {
    emit("info", category, message, meta);
  },
  debug(category: LogCategory, message: string, meta?: LogPayloadConvention) {
    emit("debug", category, message, meta);
  },
};

export type { LogCategory, LogLevel } from "./types.js";
