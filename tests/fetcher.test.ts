import { describe, it, expect } from "vitest";
import { createHttpClient } from "../src/fetcher/client.js";
import { crawl, fetchFeed, flattenItems } from "../src/fetcher/index.js";
import type { HttpClient } from "../src/fetcher/client.js";
import { SourceFetchError } from "../src/pipeline/errors.js";
import { fakeClient, fixture, rss2 } from "./helpers.js";


describe("createHttpClient", () => {
  it("返回响应正文并带上 User-Agent", async () => {
    let seenUa: string | null = null;
    const client = createHttpClient({
      userAgent: "test-agent",
      fetch: async (_input, init) => {
        seenUa = new Headers(init?.headers).get("User-Agent");
        return new Response("<rss/>", { status: 200 });
      },
    });
    expect(await client.getText("http://a.test/feed")).toBe("<rss/>");
    expect(seenUa).toBe("test-agent");
  });

  it("非 2xx 状态码抛错", async () => {
    const client = createHttpClient({
      fetch: async () => new Response("gone", { status: 404, statusText: "Not Found" }),
    });
    await expect(client.getText("http://a.test/feed")).rejects.toThrow("HTTP 404 Not Found");
  });
});


describe("fetchFeed", () => {
  it("网络错误包装为 SourceFetchError", async () => {
    const client = fakeClient({});
    const err = await fetchFeed("http://down.test/feed", client).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceFetchError);
    expect(err).toMatchObject({ url: "http://down.test/feed" });
  });

  it("解析失败同样包装为 SourceFetchError", async () => {
    const client = fakeClient({ "http://bad.test/feed": "<html><body>nope</body></html>" });
    await expect(fetchFeed("http://bad.test/feed", client)).rejects.toBeInstanceOf(SourceFetchError);
  });
});


describe("crawl", () => {
  it("按 URL 顺序返回各信源，展平后保持信源内顺序", async () => {
    const client = fakeClient({
      "http://alpha.test/feed": await fixture("alpha.rss2.xml"),
      "http://beta.test/feed": await fixture("beta.atom.xml"),
    });
    const feeds = await crawl(["http://alpha.test/feed", "http://beta.test/feed"], client);
    expect(feeds.map((f) => f.title)).toEqual(["Alpha Blog", "Beta"]);
    expect(Array.from(flattenItems(feeds)).map((i) => i.id)).toEqual([
      "alpha-1",
      "http://alpha.test/second",
      "urn:beta:1",
      "urn:beta:2",
    ]);
    expect(client.calls).toEqual(["http://alpha.test/feed", "http://beta.test/feed"]);
  });

  it("所有请求立即并发发起", async () => {
    const calls: string[] = [];
    const resolvers: Array<() => void> = [];
    const client: HttpClient = {
      getText(url) {
        calls.push(url);
        return new Promise((resolve) => {
          resolvers.push(() => resolve(rss2(url, [])));
        });
      },
    };
    const pending = crawl(["http://a.test/", "http://b.test/", "http://c.test/"], client);
    expect(calls).toHaveLength(3);
    for (const r of resolvers) r();
    expect(await pending).toHaveLength(3);
  });

  it("任一信源失败则整体失败", async () => {
    const client = fakeClient({ "http://alpha.test/feed": await fixture("alpha.rss2.xml") });
    const err = await crawl(["http://alpha.test/feed", "http://down.test/feed"], client).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceFetchError);
    expect(err).toMatchObject({ url: "http://down.test/feed" });
  });

  it("不等待其余信源完成即返回第一个错误", async () => {
    const client: HttpClient = {
      getText(url) {
        if (url === "http://hang.test/") return new Promise<string>(() => {});
        return Promise.reject(new Error("boom"));
      },
    };
    await expect(crawl(["http://hang.test/", "http://fail.test/"], client)).rejects.toBeInstanceOf(SourceFetchError);
  });
});
