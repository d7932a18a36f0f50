// WordPressPublisher：通过 WordPress REST API（应用密码 Basic 认证）为每个候选条目创建一篇文章

import { z } from "zod";
import type { Candidate } from "../types/candidate.js";
import type { PublishResult, PublishSink } from "./types.js";
import { renderPostContent } from "./render.js";
import type { PostStatus } from "../config/index.js";
import { AuthFailedError, PublishFailedError, errMessage } from "../errors/index.js";
import { logger } from "../logger/index.js";


export interface WordPressOptions {
  /** 站点根地址，如 https://blog.example.com */
  url: string;
  username: string;
  appPassword: string;
  postStatus: PostStatus;
  tagPrefix?: string;
  timeoutMs?: number;
  /** 便于测试注入，默认全局 fetch */
  fetchFn?: typeof fetch;
}


export interface WordPressPost {
  title: string;
  content: string;
  status: PostStatus;
}


const createdPostSchema = z.object({
  id: z.number(),
  link: z.string().optional(),
});


/** 应用密码可能带空格（WordPress 展示格式），原样参与 Basic 编码 */
export function basicAuthHeader(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, "utf8").toString("base64")}`;
}


/** 由候选条目组装 REST 请求体 */
export async function buildPost(candidate: Candidate, status: PostStatus, tagPrefix?: string): Promise<WordPressPost> {
  return {
    title: candidate.title,
    content: await renderPostContent(candidate, { tagPrefix }),
    status,
  };
}


async function readBody(res: Response): Promise<string> {
  try {
    return (await res.text()).slice(0, 500);
  } catch (err) {
    return `(无法读取响应: ${errMessage(err)})`;
  }
}


export class WordPressPublisher implements PublishSink {
  private readonly apiBase: string;
  private readonly fetchFn: typeof fetch;
  private readonly headers: Record<string, string>;

  constructor(private readonly opts: WordPressOptions) {
    this.apiBase = `${opts.url.replace(/\/+$/, "")}/wp-json/wp/v2`;
    this.fetchFn = opts.fetchFn ?? fetch;
    this.headers = {
      "Authorization": basicAuthHeader(opts.username, opts.appPassword),
      "Content-Type": "application/json",
    };
  }

  private signal(): AbortSignal {
    return AbortSignal.timeout(this.opts.timeoutMs ?? 30_000);
  }

  /** 运行前探测凭据：401 抛 AuthFailedError，其它非 2xx 抛普通 Error */
  async verifyAuth(): Promise<void> {
    const res = await this.fetchFn(`${this.apiBase}/users/me`, { headers: this.headers, signal: this.signal() });
    if (res.status === 401) {
      logger.error("publish", "认证失败，请检查用户名与应用密码", { body: await readBody(res) });
      throw new AuthFailedError();
    }
    if (!res.ok) {
      throw new Error(`WordPress 认证检查失败: HTTP ${res.status}`);
    }
    logger.info("publish", "WordPress 认证成功");
  }

  async publish(candidate: Candidate): Promise<PublishResult> {
    const post = await buildPost(candidate, this.opts.postStatus, this.opts.tagPrefix);
    let res: Response;
    try {
      res = await this.fetchFn(`${this.apiBase}/posts`, {
        method: "POST",
        headers: this.headers,
        body: JSON.stringify(post),
        signal: this.signal(),
      });
    } catch (err) {
      throw new PublishFailedError(candidate.itemId, `请求 WordPress 失败: ${errMessage(err)}`, { cause: err });
    }
    if (!res.ok) {
      const body = await readBody(res);
      const reason = res.status === 401 ? "认证失败" : `HTTP ${res.status}`;
      throw new PublishFailedError(candidate.itemId, `创建文章失败: ${reason}`, { status: res.status, responseBody: body });
    }
    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new PublishFailedError(candidate.itemId, `响应不是 JSON: ${errMessage(err)}`, { status: res.status, cause: err });
    }
    const parsed = createdPostSchema.safeParse(json);
    if (!parsed.success) {
      throw new PublishFailedError(candidate.itemId, "响应缺少文章 id", { status: res.status });
    }
    return { postId: parsed.data.id, link: parsed.data.link };
  }
}


/** dry-run：只渲染并打印文章，不发请求 */
export class DryRunPublisher implements PublishSink {
  constructor(
    private readonly postStatus: PostStatus,
    private readonly tagPrefix?: string
  ) {}

  async publish(candidate: Candidate): Promise<PublishResult> {
    const post = await buildPost(candidate, this.postStatus, this.tagPrefix);
    logger.info("publish", "dry-run，未发布", { item_id: candidate.itemId, title: post.title, content: post.content });
    return {};
  }
}
