// PipelineEvaluator：抓取 → 过滤 → 去重 → 排序 → 写出，整次运行要么完整成功要么整体失败
// 过滤器总是自上而下执行，宽泛的过滤器放前面，更具体的放后面以覆盖其结果

import { randomUUID } from "node:crypto";
import type { FeedItem } from "../types/feedItem.js";
import type { Filter } from "../filter/types.js";
import { filterItems } from "../filter/chain.js";
import { dedupItems } from "../dedup/index.js";
import { mergeItems } from "../merger/index.js";
import { crawl, flattenItems } from "../fetcher/index.js";
import { createHttpClient } from "../fetcher/client.js";
import { buildAtomXml } from "../feed/atom.js";
import { writeOutput } from "../writer/write.js";
import { logger } from "../logger/index.js";
import { OutputWriteError } from "./errors.js";
import type { PipelineEvaluator, PipelineEvaluatorOptions, PipelineSettings } from "./types.js";


export function createPipelineEvaluator(options: PipelineEvaluatorOptions = {}): PipelineEvaluator {
  // 整个 evaluator 生命周期内只有这一个客户端，传给 Fetcher 而非全局可见
  const client = options.client ?? createHttpClient();
  const write = options.writeOutput ?? writeOutput;
  const now = options.now ?? (() => new Date());

  async function evaluate(filters: readonly Filter[] | undefined, settings: PipelineSettings): Promise<FeedItem[]> {
    const start = Date.now();
    const items: Iterable<FeedItem> = settings.inputs != null
      ? flattenItems(await crawl(settings.inputs, client))
      : [];
    const merged = mergeItems(dedupItems(filterItems(items, filters)));
    logger.info("pipeline", "合并完成", {
      sources: settings.inputs?.length ?? 0,
      filters: filters?.length ?? 0,
      items: merged.length,
      durationMs: Date.now() - start,
    });
    return merged;
  }

  async function execute(filters: readonly Filter[] | undefined, settings: PipelineSettings): Promise<void> {
    const merged = await evaluate(filters, settings);
    if (settings.output == null) return;
    let xml: string;
    try {
      xml = buildAtomXml(
        {
          title: settings.title,
          description: settings.description,
          updated: now(),
          id: settings.link ?? `urn:uuid:${randomUUID()}`,
          selfLink: settings.link,
        },
        merged,
      );
    } catch (err) {
      throw new OutputWriteError(settings.output, err);
    }
    await write(settings.output, xml);
  }

  return { evaluate, execute };
}
