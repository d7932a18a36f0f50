// 网关配置：用 zod 校验环境变量，产出已校验的 GatewayConfig；核心模块只接收该对象

import { z } from "zod";
import { ConfigError } from "../errors/index.js";
import { DEFAULT_DB_PATH, resolveDbPath } from "./paths.js";


export type PostStatus = "publish" | "draft";


export interface GatewayConfig {
  feed: {
    /** Pinboard RSS 地址（已由用户名/secret 拼好） */
    url: string;
    /** 最近窗口：只考虑最新的 N 条书签；未设置时沿用 Pinboard 自身的窗口 */
    maxItems?: number;
    /** 标签链接前缀，如 https://pinboard.in/u:alice；未设置时标签不加链接 */
    tagPrefix?: string;
  };
  wordpress: {
    url: string;
    username: string;
    appPassword: string;
    postStatus: PostStatus;
  };
  dbPath: string;
}


const PINBOARD_FEED_BASE = "https://feeds.pinboard.in/rss";


const optionalString = z
  .string()
  .transform((s) => s.trim())
  .optional()
  .transform((s) => (s ? s : undefined));


const envSchema = z
  .object({
    RSS_FEED_URL: optionalString.pipe(z.string().url("RSS_FEED_URL 必须是 URL").optional()),
    PINBOARD_USER: optionalString,
    PINBOARD_SECRET: optionalString,
    PINBOARD_TAG_PREFIX: optionalString,
    FEED_MAX_ITEMS: optionalString.pipe(z.coerce.number().int().positive("FEED_MAX_ITEMS 必须是正整数").optional()),
    WORDPRESS_URL: optionalString.pipe(z.string({ required_error: "缺少 WORDPRESS_URL" }).url("WORDPRESS_URL 必须是 URL")),
    WORDPRESS_USERNAME: optionalString,
    USERNAME: optionalString,
    WORDPRESS_APP_PASSWORD: optionalString,
    APP_PASSWORD: optionalString,
    POST_STATUS: optionalString.pipe(z.enum(["publish", "draft"]).default("publish")),
    DB_PATH: optionalString,
  })
  .superRefine((env, ctx) => {
    if (!env.RSS_FEED_URL && !env.PINBOARD_USER) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "需要 RSS_FEED_URL 或 PINBOARD_USER" });
    }
    if (!env.WORDPRESS_USERNAME && !env.USERNAME) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "缺少 WORDPRESS_USERNAME" });
    }
    if (!env.WORDPRESS_APP_PASSWORD && !env.APP_PASSWORD) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "缺少 WORDPRESS_APP_PASSWORD" });
    }
  });


/** 由 Pinboard 用户名（及私有 feed 的 secret）拼出 RSS 地址 */
export function pinboardFeedUrl(user: string, secret?: string): string {
  const u = encodeURIComponent(user);
  return secret ? `${PINBOARD_FEED_BASE}/secret:${encodeURIComponent(secret)}/u:${u}/` : `${PINBOARD_FEED_BASE}/u:${u}/`;
}


/** 从 feed 地址里的 /u:<name>/ 段推断用户名 */
function userFromFeedUrl(url: string): string | undefined {
  const m = url.match(/\/u:([^/?#]+)/);
  return m ? decodeURIComponent(m[1]) : undefined;
}


/** 校验环境变量并返回配置；任何问题都汇总进一个 ConfigError */
export function loadConfig(env: Record<string, string | undefined> = process.env): GatewayConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => i.message));
  }
  const e = parsed.data;
  // superRefine 已保证以下字段至少有一个
  const feedUrl = e.RSS_FEED_URL ?? pinboardFeedUrl(e.PINBOARD_USER ?? "", e.PINBOARD_SECRET);
  const user = e.PINBOARD_USER ?? userFromFeedUrl(feedUrl);
  const tagPrefix = e.PINBOARD_TAG_PREFIX ?? (user ? `https://pinboard.in/u:${user}` : undefined);
  return {
    feed: {
      url: feedUrl,
      maxItems: e.FEED_MAX_ITEMS,
      tagPrefix: tagPrefix?.replace(/\/+$/, ""),
    },
    wordpress: {
      url: e.WORDPRESS_URL.replace(/\/+$/, ""),
      username: e.WORDPRESS_USERNAME ?? e.USERNAME ?? "",
      appPassword: e.WORDPRESS_APP_PASSWORD ?? e.APP_PASSWORD ?? "",
      postStatus: e.POST_STATUS,
    },
    dbPath: resolveDbPath(e.DB_PATH ?? DEFAULT_DB_PATH),
  };
}
