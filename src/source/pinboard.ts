// PinboardReader：用 rss-parser 拉取 Pinboard 的 RSS（RDF）Feed，映射为 Candidate

import Parser from "rss-parser";
import type { Candidate } from "../types/candidate.js";
import type { FeedReader, FeedReaderOptions } from "./types.js";
import { FeedUnavailableError, errMessage } from "../errors/index.js";
import { logger } from "../logger/index.js";


type PinboardItem = Parser.Item & {
  /** dc:subject：空格分隔的标签 */
  subject?: string;
};

type PinboardFeed = Parser.Output<PinboardItem>;


const FEED_HEADERS = {
  "User-Agent": "pinpress/1.0",
  "Accept": "application/rss+xml,application/rdf+xml,application/atom+xml,application/xml,text/xml,*/*",
};


function createParser(timeoutMs: number): Parser<Record<string, unknown>, PinboardItem> {
  return new Parser<Record<string, unknown>, PinboardItem>({
    timeout: timeoutMs,
    headers: FEED_HEADERS,
    customFields: { item: [["dc:subject", "subject"]] },
  });
}


/** 标签来自 dc:subject（Pinboard）或 category（普通 RSS/Atom），按出现顺序去重 */
export function extractTags(item: PinboardItem): string[] {
  const raw: string[] = [];
  if (typeof item.subject === "string") raw.push(...item.subject.split(/\s+/));
  for (const c of item.categories ?? []) {
    if (typeof c === "string") raw.push(...c.split(/\s+/));
  }
  return Array.from(new Set(raw.filter(Boolean)));
}


/** 单条映射；没有链接的条目无法去重，返回 null 由调用方跳过 */
export function toCandidate(item: PinboardItem): Candidate | null {
  const url = item.link?.trim();
  if (!url) return null;
  const createdAt = item.isoDate ? new Date(item.isoDate) : item.pubDate ? new Date(item.pubDate) : new Date();
  return {
    itemId: url,
    title: item.title?.trim() || url,
    url,
    tags: extractTags(item),
    createdAt: Number.isNaN(createdAt.getTime()) ? new Date() : createdAt,
    description: typeof item.content === "string" ? item.content : "",
  };
}


/** Pinboard 按新到旧输出；截取最新窗口后反转，让博客按时间顺序收到文章 */
export function toCandidates(feed: PinboardFeed, maxItems?: number): Candidate[] {
  const items = maxItems ? feed.items.slice(0, maxItems) : feed.items;
  const out: Candidate[] = [];
  for (const item of items) {
    const c = toCandidate(item);
    if (c) {
      out.push(c);
    } else {
      logger.warn("feed", "条目缺少链接，跳过", { title: item.title });
    }
  }
  return out.reverse();
}


/** 解析已拿到的 Feed 文本；解析失败抛 FeedUnavailableError */
export async function parsePinboardFeed(xml: string, opts: FeedReaderOptions = {}): Promise<Candidate[]> {
  let feed: PinboardFeed;
  try {
    feed = await createParser(opts.timeoutMs ?? 15_000).parseString(xml);
  } catch (err) {
    throw new FeedUnavailableError(`Feed 解析失败: ${errMessage(err)}`, { cause: err });
  }
  return toCandidates(feed, opts.maxItems);
}


export class PinboardReader implements FeedReader {
  private readonly parser: Parser<Record<string, unknown>, PinboardItem>;

  constructor(
    private readonly feedUrl: string,
    private readonly opts: FeedReaderOptions = {}
  ) {
    this.parser = createParser(opts.timeoutMs ?? 15_000);
  }

  async fetchCandidates(): Promise<Candidate[]> {
    let feed: PinboardFeed;
    try {
      feed = await this.parser.parseURL(this.feedUrl);
    } catch (err) {
      throw new FeedUnavailableError(`拉取 Feed 失败: ${errMessage(err)}`, { cause: err });
    }
    const candidates = toCandidates(feed, this.opts.maxItems);
    logger.info("feed", "Feed 拉取完成", { count: candidates.length });
    return candidates;
  }
}
