// 规则过滤器：由配置文件中的 filters 块生成 Filter，按声明顺序排列

import { z } from "zod";
import type { FeedItem } from "../types/feedItem.js";
import { alternateLink } from "../types/feedItem.js";
import type { Filter, FilterAction } from "./types.js";


const DAY_MS = 24 * 60 * 60 * 1000;


const decisiveAction = z.enum(["include", "exclude"]);
const itemField = z.enum(["title", "content", "summary", "link", "author"]);


export const filterRuleSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("match"),
    field: itemField,
    pattern: z.string().min(1),
    flags: z.string().optional(),
    action: decisiveAction,
  }),
  z.object({
    type: z.literal("keywords"),
    field: itemField,
    keywords: z.array(z.string().min(1)).min(1),
    action: decisiveAction,
  }),
  z.object({
    type: z.literal("age"),
    maxDays: z.number().positive(),
    action: decisiveAction.default("exclude"),
  }),
]);


export type FilterRule = z.infer<typeof filterRuleSchema>;
export type ItemField = z.infer<typeof itemField>;


/** 取条目上的文本字段；link 取 alternate 链接 */
function fieldValue(item: FeedItem, field: ItemField): string | undefined {
  switch (field) {
    case "title":
      return item.title;
    case "content":
      return item.content;
    case "summary":
      return item.summary;
    case "link":
      return alternateLink(item)?.href;
    case "author":
      return item.author;
  }
}


/** 正则命中返回 action，否则 abstain；字段缺失视为不命中 */
export function matchFilter(field: ItemField, pattern: string, action: Exclude<FilterAction, "abstain">, flags?: string): Filter {
  // 去掉 g / y，避免 lastIndex 在多次 test 之间残留
  const regex = new RegExp(pattern, (flags ?? "").replace(/[gy]/g, ""));
  return {
    name: `match:${field}:${pattern}`,
    apply(item) {
      const value = fieldValue(item, field);
      return value != null && regex.test(value) ? action : "abstain";
    },
  };
}


/** 任一关键词（不区分大小写）出现在字段中即命中 */
export function keywordsFilter(field: ItemField, keywords: readonly string[], action: Exclude<FilterAction, "abstain">): Filter {
  const needles = keywords.map((k) => k.toLowerCase());
  return {
    name: `keywords:${field}`,
    apply(item) {
      const value = fieldValue(item, field)?.toLowerCase();
      if (value == null) return "abstain";
      return needles.some((n) => value.includes(n)) ? action : "abstain";
    },
  };
}


/** 发布时间早于 now - maxDays 的条目命中 */
export function ageFilter(maxDays: number, action: Exclude<FilterAction, "abstain">, now: () => Date = () => new Date()): Filter {
  return {
    name: `age:${maxDays}d`,
    apply(item) {
      const cutoff = now().getTime() - maxDays * DAY_MS;
      return item.published.getTime() < cutoff ? action : "abstain";
    },
  };
}


/** 将规则列表转为 Filter 列表，顺序不变 */
export function buildFilters(rules: readonly FilterRule[], now?: () => Date): Filter[] {
  return rules.map((rule) => {
    switch (rule.type) {
      case "match":
        return matchFilter(rule.field, rule.pattern, rule.action, rule.flags);
      case "keywords":
        return keywordsFilter(rule.field, rule.keywords, rule.action);
      case "age":
        return ageFilter(rule.maxDays, rule.action, now);
    }
  });
}
