// Dedup：按 id、标题（不区分大小写）、alternate 链接三组键流式去重，三者都未出现过才保留

import type { FeedItem } from "../types/feedItem.js";
import { alternateLink } from "../types/feedItem.js";


/** URL 归一化（协议/主机大小写、默认端口、空路径，去掉片段与用户信息）；无法解析时按原字符串比较 */
export function normalizeLinkKey(href: string): string {
  try {
    const url = new URL(href);
    url.hash = "";
    url.username = "";
    url.password = "";
    return url.href;
  } catch {
    return href;
  }
}


/** 集合中不存在时插入并返回 true；key 缺失视为新值且不占位 */
function addIfNovel(seen: Set<string>, key: string | undefined): boolean {
  if (key == null) return true;
  if (seen.has(key)) return false;
  seen.add(key);
  return true;
}


/**
 * 惰性去重：取一条、判定、产出，再取下一条，保持遇到顺序。
 * 检查短路：id 重复时不登记标题；id 与标题都新才检查并登记链接。
 * 三个集合只属于本次迭代。
 */
export function* dedupItems(items: Iterable<FeedItem>): Generator<FeedItem> {
  const ids = new Set<string>();
  const titles = new Set<string>();
  const links = new Set<string>();

  for (const item of items) {
    if (!addIfNovel(ids, item.id)) continue;
    if (!addIfNovel(titles, item.title?.toLowerCase())) continue;
    const link = alternateLink(item);
    if (link != null && !addIfNovel(links, normalizeLinkKey(link.href))) continue;
    yield item;
  }
}
