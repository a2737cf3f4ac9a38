// Atom 1.0 输出结构

export interface AtomFeedMeta {
  /** 纯文本标题 */
  title: string;
  /** 纯文本描述，写入 <subtitle> */
  description: string;
  /** 最后更新时间 */
  updated: Date;
  /** Feed id；同时作为 rel="self" 链接时传 selfLink */
  id: string;
  selfLink?: string;
}
