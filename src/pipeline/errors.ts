// 管道错误：任一阶段失败都会中止整次运行，不产出输出文件

import type { OutputTarget } from "./types.js";


function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}


/** 信源抓取或解析失败（网络错误、HTTP 状态码、无法识别的文档） */
export class SourceFetchError extends Error {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    super(`抓取信源失败 ${url}: ${describeCause(cause)}`, { cause });
    this.name = "SourceFetchError";
    this.url = url;
  }
}


/** 过滤器执行时抛错 */
export class FilterExecutionError extends Error {
  readonly filterName: string;
  readonly itemId: string | undefined;

  constructor(filterName: string, itemId: string | undefined, cause: unknown) {
    super(`过滤器 ${filterName} 执行失败（条目 ${itemId ?? "无 id"}）: ${describeCause(cause)}`, { cause });
    this.name = "FilterExecutionError";
    this.filterName = filterName;
    this.itemId = itemId;
  }
}


/** 序列化或写出输出目标失败 */
export class OutputWriteError extends Error {
  readonly target: string;

  constructor(target: OutputTarget, cause: unknown) {
    const label = typeof target === "string" ? target : "<stream>";
    super(`写出输出失败 ${label}: ${describeCause(cause)}`, { cause });
    this.name = "OutputWriteError";
    this.target = label;
  }
}


/** 配置文件缺失、非 JSON 或校验失败 */
export class SettingsError extends Error {
  readonly path: string;
  readonly issues: string[];

  constructor(path: string, issues: string[]) {
    super(`配置无效 ${path}: ${issues.join("; ")}`);
    this.name = "SettingsError";
    this.path = path;
    this.issues = issues;
  }
}
