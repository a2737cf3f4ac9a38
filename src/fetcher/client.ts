// HttpClient：一次运行内共享的 HTTP 客户端，配置创建后不可变，可被并发抓取安全复用

const DEFAULT_USER_AGENT = "feedmerge/1.0";
const ACCEPT = "application/rss+xml,application/atom+xml,application/rdf+xml,application/xml,text/xml,*/*";


export interface HttpClient {
  /** GET 并返回响应正文；网络错误或非 2xx 时抛错 */
  getText(url: string): Promise<string>;
}


export interface HttpClientOptions {
  /** 覆盖 User-Agent，默认读取 FEEDMERGE_USER_AGENT */
  userAgent?: string;
  /** 替换 fetch 实现（测试用）；默认使用 Node 全局 fetch，其 dispatcher 复用 keep-alive 连接 */
  fetch?: typeof fetch;
}


export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  const fetchImpl = options.fetch ?? fetch;
  const headers: Readonly<Record<string, string>> = Object.freeze({
    "User-Agent": options.userAgent ?? process.env.FEEDMERGE_USER_AGENT ?? DEFAULT_USER_AGENT,
    "Accept": ACCEPT,
  });
  return {
    async getText(url: string): Promise<string> {
      const res = await fetchImpl(url, { headers });
      if (!res.ok) {
        throw new Error(`HTTP ${res.status} ${res.statusText}`.trim());
      }
      return res.text();
    },
  };
}
