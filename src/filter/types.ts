// 过滤器能力：对单个条目给出 abstain / include / exclude

import type { FeedItem } from "../types/feedItem.js";


/** abstain 表示无意见，不改变当前决定 */
export type FilterAction = "abstain" | "include" | "exclude";


export interface Filter {
  /** 日志与错误信息中使用的名字 */
  readonly name?: string;
  /** 不得修改 item */
  apply(item: FeedItem): FilterAction;
}
