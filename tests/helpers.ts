// 测试工具：条目构造、fixture 读取、假 HttpClient、内存可写流

import { readFile } from "node:fs/promises";
import { Writable } from "node:stream";
import type { FeedItem, FeedLink } from "../src/types/feedItem.js";
import type { HttpClient } from "../src/fetcher/client.js";


export interface ItemInit {
  id?: string;
  title?: string;
  link?: string;
  links?: FeedLink[];
  published?: string;
  content?: string;
  summary?: string;
  author?: string;
}


export function item(init: ItemInit = {}): FeedItem {
  return {
    id: init.id,
    title: init.title,
    links: init.links ?? (init.link != null ? [{ rel: "alternate", href: init.link }] : []),
    published: new Date(init.published ?? "2024-01-01T00:00:00Z"),
    content: init.content,
    summary: init.summary,
    author: init.author,
  };
}


export function fixture(name: string): Promise<string> {
  return readFile(new URL(`./fixtures/${name}`, import.meta.url), "utf-8");
}


export interface FakeClient extends HttpClient {
  calls: string[];
}


/** 按 URL 返回文档；值为 Error 时 reject，未登记的 URL 也 reject */
export function fakeClient(docs: Record<string, string | Error>): FakeClient {
  const calls: string[] = [];
  return {
    calls,
    async getText(url: string): Promise<string> {
      calls.push(url);
      const doc = docs[url];
      if (doc == null) throw new Error(`connect ECONNREFUSED ${url}`);
      if (doc instanceof Error) throw doc;
      return doc;
    },
  };
}


export interface Rss2Entry {
  guid?: string;
  title: string;
  link: string;
  pubDate: string;
}


export function rss2(title: string, entries: Rss2Entry[]): string {
  const items = entries
    .map((e) => {
      const guid = e.guid != null ? `<guid>${e.guid}</guid>` : "";
      return `<item><title>${e.title}</title><link>${e.link}</link>${guid}<pubDate>${e.pubDate}</pubDate></item>`;
    })
    .join("");
  return `<?xml version="1.0"?><rss version="2.0"><channel><title>${title}</title><link>http://example.test/</link><description>${title}</description>${items}</channel></rss>`;
}


export function memoryStream(): { stream: Writable; text: () => string } {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      callback();
    },
  });
  return { stream, text: () => Buffer.concat(chunks).toString("utf-8") };
}
