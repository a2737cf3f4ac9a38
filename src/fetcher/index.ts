// Fetcher：并发抓取全部信源并解析，任一信源失败则整体失败（无重试、无部分结果）

import type { FeedItem } from "../types/feedItem.js";
import { parseFeed } from "../parser/index.js";
import type { ParsedFeed } from "../parser/types.js";
import { SourceFetchError } from "../pipeline/errors.js";
import { logger } from "../logger/index.js";
import type { HttpClient } from "./client.js";


/** 抓取并解析单个信源；任何失败都包装为 SourceFetchError */
export async function fetchFeed(url: string, client: HttpClient): Promise<ParsedFeed> {
  const start = Date.now();
  try {
    const xml = await client.getText(url);
    const feed = await parseFeed(xml, url);
    logger.debug("fetcher", "信源抓取完成", {
      source_url: url,
      format: feed.format,
      items: feed.items.length,
      durationMs: Date.now() - start,
    });
    return feed;
  } catch (err) {
    logger.warn("fetcher", "信源抓取失败", { source_url: url, err: err instanceof Error ? err.message : String(err) });
    throw new SourceFetchError(url, err);
  }
}


/** 每个 URL 一个任务，全部立即启动；第一个失败即 reject，其余任务结果丢弃 */
export async function crawl(urls: readonly string[], client: HttpClient): Promise<ParsedFeed[]> {
  logger.info("fetcher", "开始并发抓取", { sources: urls.length });
  return Promise.all(urls.map((url) => fetchFeed(url, client)));
}


/** 展平为单一条目流：按信源顺序，其内按文档顺序 */
export function* flattenItems(feeds: Iterable<ParsedFeed>): Generator<FeedItem> {
  for (const feed of feeds) {
    yield* feed.items;
  }
}


export { createHttpClient } from "./client.js";
export type { HttpClient, HttpClientOptions } from "./client.js";
