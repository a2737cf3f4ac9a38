// feedmerge：多信源聚合为单一去重、过滤、按时间排序的 Atom Feed

export { createPipelineEvaluator, SourceFetchError, FilterExecutionError, OutputWriteError, SettingsError } from "./pipeline/index.js";
export type { PipelineEvaluator, PipelineEvaluatorOptions, PipelineSettings, OutputTarget } from "./pipeline/index.js";
export { applyFilters, filterItems, buildFilters, matchFilter, keywordsFilter, ageFilter } from "./filter/index.js";
export type { Filter, FilterAction, FilterRule } from "./filter/index.js";
export { dedupItems } from "./dedup/index.js";
export { mergeItems } from "./merger/index.js";
export { crawl, fetchFeed, flattenItems, createHttpClient } from "./fetcher/index.js";
export type { HttpClient, HttpClientOptions } from "./fetcher/index.js";
export { parseFeed } from "./parser/index.js";
export type { ParsedFeed, FeedFormat } from "./parser/index.js";
export { buildAtomXml } from "./feed/index.js";
export { writeOutput } from "./writer/write.js";
export { loadSettings, parseSettings } from "./config/settings.js";
export type { FeedItem, FeedLink } from "./types/feedItem.js";
