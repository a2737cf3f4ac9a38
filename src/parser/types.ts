// 解析结果类型

import type { FeedItem } from "../types/feedItem.js";


/** rss1：由 RSS 1.0 (RDF) 读取器识别；generic：RSS 2.0 / Atom 自动识别 */
export type FeedFormat = "rss1" | "generic";


export interface ParsedFeed {
  format: FeedFormat;
  title?: string;
  items: FeedItem[];
}
