// Merger：物化去重后的条目并按发布时间升序排列

import type { FeedItem } from "../types/feedItem.js";


/** 稳定排序，发布时间相同的条目保持遇到顺序 */
export function mergeItems(items: Iterable<FeedItem>): FeedItem[] {
  return Array.from(items).sort((a, b) => a.published.getTime() - b.published.getTime());
}
