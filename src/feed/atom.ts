// 将合并后的条目构建为 Atom 1.0 XML

import type { FeedItem } from "../types/feedItem.js";
import type { AtomFeedMeta } from "./types.js";


export const ATOM_NAMESPACE = "http://www.w3.org/2005/Atom";


export function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}


function buildEntry(item: FeedItem): string {
  const published = item.published.toISOString();
  let buf = `  <entry>\n`;
  if (item.id != null) buf += `    <id>${escapeXml(item.id)}</id>\n`;
  buf += `    <title type="text">${escapeXml(item.title ?? "")}</title>\n`;
  buf += `    <published>${published}</published>\n`;
  buf += `    <updated>${published}</updated>\n`;
  if (item.author != null) buf += `    <author>\n      <name>${escapeXml(item.author)}</name>\n    </author>\n`;
  for (const link of item.links) {
    buf += `    <link rel="${escapeXml(link.rel)}" href="${escapeXml(link.href)}"/>\n`;
  }
  if (item.summary != null) buf += `    <summary type="text">${escapeXml(item.summary)}</summary>\n`;
  if (item.content != null) buf += `    <content type="html">${escapeXml(item.content)}</content>\n`;
  buf += `  </entry>\n`;
  return buf;
}


/** entries 按传入顺序输出，调用方负责排序 */
export function buildAtomXml(meta: AtomFeedMeta, items: readonly FeedItem[]): string {
  const selfLink = meta.selfLink != null ? `  <link rel="self" href="${escapeXml(meta.selfLink)}"/>\n` : "";
  const entries = items.map(buildEntry).join("");
  return `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="${ATOM_NAMESPACE}">
  <title type="text">${escapeXml(meta.title)}</title>
  <subtitle type="text">${escapeXml(meta.description)}</subtitle>
  <id>${escapeXml(meta.id)}</id>
  <updated>${meta.updated.toISOString()}</updated>
${selfLink}${entries}</feed>
`;
}
