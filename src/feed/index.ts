// Feed 输出：Atom 1.0 序列化

export { buildAtomXml, escapeXml } from "./atom.js";
export type { AtomFeedMeta } from "./types.js";
