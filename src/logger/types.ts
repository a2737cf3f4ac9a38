// 日志类型与结构化条目
// 控制台由 LOG_LEVEL 过滤（默认 info）

/** 日志级别（debug < info < warn < error） */
export type LogLevel = "error" | "warn" | "info" | "debug";

/** 日志分类：按管道阶段筛选 */
export type LogCategory =
  | "fetcher"  // 信源抓取
  | "parser"   // Feed 解析
  | "filter"   // 过滤链
  | "pipeline" // 编排
  | "writer"   // 输出写出
  | "config"   // 配置加载
  | "cli";     // 命令行入口

/** 单条日志的结构化数据 */
export interface LogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** 可选上下文（err、items 等） */
  payload?: Record<string, unknown>;
  /** 信源 URL，便于按信源查日志 */
  source_url?: string;
  created_at: string;
}

/** meta 常用字段：source_url 单独提出，其余进入 payload */
export type LogMeta = { source_url?: string; [k: string]: unknown };
