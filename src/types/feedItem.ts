/**
 * 管道内部统一的 Feed Item 定义
 * Parser → FilterChain → Dedup → Merger → Atom Writer
 */

/** 条目外链，rel 即关系类型（alternate / enclosure / related …） */
export interface FeedLink {
  readonly rel: string;
  readonly href: string;
}


export interface FeedItem {
  /** 条目标识：Atom id / RSS guid / RDF rdf:about，缺失时退回 alternate 链接 */
  readonly id?: string;
  /** 标题（纯文本） */
  readonly title?: string;
  /** 外链列表，每条带 rel */
  readonly links: readonly FeedLink[];
  /** 发布时间；源文档无可解析日期时为 epoch */
  readonly published: Date;
  /** 正文（HTML） */
  readonly content?: string;
  /** 摘要（纯文本） */
  readonly summary?: string;
  /** 作者 */
  readonly author?: string;
  /** 来源 Feed URL */
  readonly sourceUrl?: string;
}


/** 取第一条 rel="alternate" 的链接 */
export function alternateLink(item: FeedItem): FeedLink | undefined {
  return item.links.find((l) => l.rel === "alternate");
}
