// FilterChain：按定义顺序执行过滤器，后面有意见的过滤器覆盖前面的结果

import type { FeedItem } from "../types/feedItem.js";
import type { Filter, FilterAction } from "./types.js";
import { FilterExecutionError } from "../pipeline/errors.js";


/** 默认 include；filters 为空或缺省时所有条目都保留 */
export function applyFilters(filters: readonly Filter[] | undefined, item: FeedItem): FilterAction {
  if (filters == null) return "include";
  return filters.reduce<FilterAction>((decision, filter, index) => {
    let action: FilterAction;
    try {
      action = filter.apply(item);
    } catch (err) {
      throw new FilterExecutionError(filter.name ?? `#${index}`, item.id, err);
    }
    return action === "abstain" ? decision : action;
  }, "include");
}


/** 惰性过滤：逐条判定，只产出最终为 include 的条目 */
export function* filterItems(items: Iterable<FeedItem>, filters: readonly Filter[] | undefined): Generator<FeedItem> {
  for (const item of items) {
    if (applyFilters(filters, item) === "include") yield item;
  }
}
