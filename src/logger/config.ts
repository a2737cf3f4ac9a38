// 日志配置：从环境变量读取，不依赖配置文件以尽早可用

import type { LogLevel } from "./types.js";

const LEVEL_ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(s: string): s is LogLevel {
  return LEVEL_ORDER.some((l) => l === s);
}

export function parseLevel(s: string | undefined, fallback: LogLevel): LogLevel {
  if (!s) return fallback;
  const v = s.toLowerCase();
  return isLogLevel(v) ? v : fallback;
}

/** 当前控制台最低输出级别（默认 info） */
export function getConsoleLevel(): LogLevel {
  return parseLevel(process.env.LOG_LEVEL, "info");
}

export function levelOrder(l: LogLevel): number {
  return LEVEL_ORDER.indexOf(l);
}

/** 是否应输出到控制台 */
export function shouldLogToConsole(consoleLevel: LogLevel, entryLevel: LogLevel): boolean {
  return levelOrder(entryLevel) >= levelOrder(consoleLevel);
}
