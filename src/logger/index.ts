// 统一日志：按级别输出到控制台，每条一行 [category] message {payload}

import { getConsoleLevel, shouldLogToConsole } from "./config.js";
import type { LogCategory, LogEntry, LogLevel, LogMeta } from "./types.js";

function now(): string {
  return new Date().toISOString();
}

export function formatConsole(entry: LogEntry): string {
  const tag = `[${entry.category}]`;
  const payload = entry.source_url != null ? { source_url: entry.source_url, ...entry.payload } : entry.payload;
  const payloadStr = payload != null && Object.keys(payload).length > 0 ? " " + JSON.stringify(payload) : "";
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

function emit(level: LogLevel, category: LogCategory, message: string, meta?: LogMeta): void {
  if (!shouldLogToConsole(getConsoleLevel(), level)) return;
  const source_url = meta?.source_url;
  const payload = meta && Object.keys(meta).length > 0 ? { ...meta } : undefined;
  if (payload?.source_url !== undefined) delete payload.source_url;
  writeConsole({
    level,
    category,
    message,
    payload: payload && Object.keys(payload).length > 0 ? payload : undefined,
    source_url,
    created_at: now(),
  });
}

/** 统一 logger：控制台由 LOG_LEVEL 过滤 */
export const logger = {
  error(category: LogCategory, message: string, meta?: LogMeta) {
    emit("error", category, message, meta);
  },
  warn(category: LogCategory, message: string, meta?: LogMeta) {
    emit("warn", category, message, meta);
  },
  info(category: LogCategory, message: string, meta?: LogMeta) {
    emit("info", category, message, meta);
  },
  debug(category: LogCategory, message: string, meta?: LogMeta) {
    emit("debug", category, message, meta);
  },
};

export type { LogCategory, LogEntry, LogLevel } from "./types.js";
