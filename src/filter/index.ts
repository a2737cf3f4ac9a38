// Filter：过滤器能力定义、过滤链与内置规则过滤器

export { applyFilters, filterItems } from "./chain.js";
export { buildFilters, matchFilter, keywordsFilter, ageFilter, filterRuleSchema } from "./rules.js";
export type { Filter, FilterAction } from "./types.js";
export type { FilterRule, ItemField } from "./rules.js";
