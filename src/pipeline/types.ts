// Pipeline 配置与返回类型

import type { Writable } from "node:stream";
import type { FeedItem } from "../types/feedItem.js";
import type { Filter } from "../filter/types.js";
import type { HttpClient } from "../fetcher/client.js";


/** 输出目标：文件路径或可写流（流写完后不关闭） */
export type OutputTarget = string | Writable;


export interface PipelineSettings {
  /** 信源 URL 列表；缺省时不抓取，条目流为空 */
  inputs?: readonly string[];
  /** 输出目标；缺省时不写出 */
  output?: OutputTarget;
  /** 输出 Feed 标题（纯文本） */
  title: string;
  /** 输出 Feed 描述（纯文本） */
  description: string;
  /** 输出 Feed 的 self 链接，同时作为 Atom id；缺省时生成 urn:uuid */
  link?: string;
}


export interface PipelineEvaluatorOptions {
  /** 共享的 HTTP 客户端；缺省时由 evaluator 创建一个 */
  client?: HttpClient;
  /** 输出写出实现，默认 writeOutput */
  writeOutput?: (target: OutputTarget, xml: string) => Promise<void>;
  /** 时钟，用于 Atom updated */
  now?: () => Date;
}


export interface PipelineEvaluator {
  /** 抓取 → 过滤 → 去重 → 排序，返回合并后的条目 */
  evaluate(filters: readonly Filter[] | undefined, settings: PipelineSettings): Promise<FeedItem[]>;
  /** evaluate 后按 settings.output 写出 Atom；任一阶段失败则整体失败且不写出 */
  execute(filters: readonly Filter[] | undefined, settings: PipelineSettings): Promise<void>;
}
