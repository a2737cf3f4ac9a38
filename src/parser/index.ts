// Parser：XML 文本 → ParsedFeed；先尝试 RSS 1.0 (RDF)，不是则交给 rss-parser 自动识别 RSS 2.0 / Atom

import Parser from "rss-parser";
import type { FeedItem, FeedLink } from "../types/feedItem.js";
import type { FeedFormat, ParsedFeed } from "./types.js";


const RSS1_NAMESPACE = "http://purl.org/rss/1.0/";
const EPOCH = 0;


/** rss-parser 在基础 Item 之外会带出的字段 */
interface ItemExtras {
  /** Atom <id> */
  id?: string;
  /** RDF <item rdf:about> */
  "rdf:about"?: string;
  /** Atom <author><name> */
  author?: string;
  /** 原始 <link> 元素（keepArray）：RSS 为文本，Atom 为带 $.rel / $.href 的对象 */
  rawLinks?: unknown;
}


type RawItem = Parser.Item & ItemExtras;


const parser = new Parser<Record<string, unknown>, ItemExtras>({
  customFields: {
    item: [["link", "rawLinks", { keepArray: true }]],
  },
});


/**
 * 根元素是否为绑定 RSS 1.0 命名空间的 rdf:RDF（跳过 BOM、XML 声明、注释与 DOCTYPE）。
 * 只认字面前缀 rdf:，RDF 命名空间绑定到其他前缀的文档不识别（rss-parser 同样按 rdf:RDF 分派）。
 */
export function isRss1Document(xml: string): boolean {
  const body = xml
    .replace(/^\uFEFF/, "")
    .replace(/<\?[\s\S]*?\?>|<!--[\s\S]*?-->|<!DOCTYPE[^>]*>/g, "")
    .trimStart();
  const root = /^<([\w:.-]+)([^>]*)>/.exec(body);
  return root != null && root[1] === "rdf:RDF" && root[2].includes(RSS1_NAMESPACE);
}


function nonEmpty(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}


/** isoDate 由 rss-parser 从 pubDate / dc:date / published / updated 推出；无效日期退回 epoch */
function publishedOf(raw: RawItem): Date {
  const iso = nonEmpty(raw.isoDate);
  if (iso == null) return new Date(EPOCH);
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? new Date(EPOCH) : date;
}


function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value != null && !Array.isArray(value);
}


/** 单个 <link>：文本为 RSS 链接（即 alternate）；Atom 取 $.href，缺 rel 时按 Atom 约定视为 alternate */
function toFeedLink(node: unknown): FeedLink | undefined {
  const text = nonEmpty(node);
  if (text != null) return { rel: "alternate", href: text };
  if (!isRecord(node)) return undefined;
  const attrs = isRecord(node.$) ? node.$ : {};
  const href = nonEmpty(attrs.href) ?? nonEmpty(node._);
  if (href == null) return undefined;
  return { rel: nonEmpty(attrs.rel) ?? "alternate", href };
}


/** 保留全部链接及其 rel；取不到原始元素时退回 rss-parser 的 item.link */
function linksOf(raw: RawItem): FeedLink[] {
  if (Array.isArray(raw.rawLinks)) {
    return raw.rawLinks.map(toFeedLink).filter((l): l is FeedLink => l != null);
  }
  const link = nonEmpty(raw.link);
  return link != null ? [{ rel: "alternate", href: link }] : [];
}


function toFeedItem(raw: RawItem, sourceUrl: string | undefined): FeedItem {
  const links = linksOf(raw);
  const alternate = links.find((l) => l.rel === "alternate");
  return {
    id: nonEmpty(raw.guid) ?? nonEmpty(raw.id) ?? nonEmpty(raw["rdf:about"]) ?? alternate?.href,
    title: typeof raw.title === "string" ? raw.title.trim() : undefined,
    links,
    published: publishedOf(raw),
    content: nonEmpty(raw.content),
    summary: nonEmpty(raw.summary) ?? nonEmpty(raw.contentSnippet),
    author: nonEmpty(raw.creator) ?? nonEmpty(raw.author),
    sourceUrl,
  };
}


async function read(xml: string, format: FeedFormat, sourceUrl: string | undefined): Promise<ParsedFeed> {
  const feed = await parser.parseString(xml);
  return {
    format,
    title: nonEmpty(feed.title),
    items: (feed.items ?? []).map((raw) => toFeedItem(raw, sourceUrl)),
  };
}


/** 旧格式读取器：不是 RSS 1.0 时返回 null */
export async function readRss1(xml: string, sourceUrl?: string): Promise<ParsedFeed | null> {
  if (!isRss1Document(xml)) return null;
  return read(xml, "rss1", sourceUrl);
}


/** 通用读取器：RSS 2.0 / Atom，无法识别时抛错 */
export async function readGeneric(xml: string, sourceUrl?: string): Promise<ParsedFeed> {
  return read(xml, "generic", sourceUrl);
}


export async function parseFeed(xml: string, sourceUrl?: string): Promise<ParsedFeed> {
  return (await readRss1(xml, sourceUrl)) ?? readGeneric(xml, sourceUrl);
}


export type { FeedFormat, ParsedFeed } from "./types.js";
