import { describe, expect, it } from "vitest";
import { extractTags, parsePinboardFeed, toCandidate } from "../src/source/pinboard.js";
import { FeedUnavailableError } from "../src/errors/index.js";


const RSS2 = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel>
    <title>Pinboard (alice)</title>
    <link>https://pinboard.in/u:alice/</link>
    <description>recent bookmarks</description>
    <item>
      <title>Third</title>
      <link>https://example.com/c</link>
      <description>Some **note**</description>
      <pubDate>Wed, 08 Jan 2025 10:00:00 GMT</pubDate>
      <dc:subject>typescript sqlite</dc:subject>
    </item>
    <item>
      <title>Second</title>
      <link>https://example.com/b</link>
      <pubDate>Tue, 07 Jan 2025 10:00:00 GMT</pubDate>
    </item>
    <item>
      <title>First</title>
      <link>https://example.com/a</link>
      <pubDate>Mon, 06 Jan 2025 10:00:00 GMT</pubDate>
      <dc:subject>web web  tools</dc:subject>
    </item>
    <item>
      <title>No link</title>
      <pubDate>Mon, 06 Jan 2025 09:00:00 GMT</pubDate>
    </item>
  </channel>
</rss>`;


const RDF = `<?xml version="1.0" encoding="UTF-8"?>
<rdf:RDF xmlns="http://purl.org/rss/1.0/"
  xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#"
  xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel rdf:about="https://pinboard.in">
    <title>Pinboard (bob)</title>
    <link>https://pinboard.in/u:bob/</link>
    <description></description>
  </channel>
  <item rdf:about="https://example.org/new">
    <title>Newer</title>
    <link>https://example.org/new</link>
    <dc:subject>rss</dc:subject>
  </item>
  <item rdf:about="https://example.org/old">
    <title>Older</title>
    <link>https://example.org/old</link>
    <dc:subject>cron sync</dc:subject>
  </item>
</rdf:RDF>`;


describe("parsePinboardFeed", () => {
  it("按时间从旧到新返回，跳过无链接条目", async () => {
    const candidates = await parsePinboardFeed(RSS2);
    expect(candidates.map((c) => c.itemId)).toEqual([
      "https://example.com/a",
      "https://example.com/b",
      "https://example.com/c",
    ]);
  });

  it("映射标题、链接、标签、时间与备注", async () => {
    const [, , third] = await parsePinboardFeed(RSS2);
    expect(third.title).toBe("Third");
    expect(third.url).toBe("https://example.com/c");
    expect(third.tags).toEqual(["typescript", "sqlite"]);
    expect(third.createdAt.toISOString()).toBe("2025-01-08T10:00:00.000Z");
    expect(third.description).toBe("Some **note**");
  });

  it("标签按空格拆分并去重", async () => {
    const [first, second] = await parsePinboardFeed(RSS2);
    expect(first.tags).toEqual(["web", "tools"]);
    expect(second.tags).toEqual([]);
    expect(second.description).toBe("");
  });

  it("maxItems 只取最新的 N 条", async () => {
    const candidates = await parsePinboardFeed(RSS2, { maxItems: 2 });
    expect(candidates.map((c) => c.itemId)).toEqual(["https://example.com/b", "https://example.com/c"]);
  });

  it("支持 Pinboard 的 RSS 1.0（RDF）格式", async () => {
    const candidates = await parsePinboardFeed(RDF);
    expect(candidates.map((c) => [c.itemId, c.title, c.tags])).toEqual([
      ["https://example.org/old", "Older", ["cron", "sync"]],
      ["https://example.org/new", "Newer", ["rss"]],
    ]);
  });

  it("无法解析的内容抛 FeedUnavailableError", async () => {
    await expect(parsePinboardFeed("this is not a feed")).rejects.toBeInstanceOf(FeedUnavailableError);
  });
});


describe("toCandidate", () => {
  it("没有链接返回 null", () => {
    expect(toCandidate({ title: "x" })).toBeNull();
  });

  it("缺少标题时用链接代替", () => {
    expect(toCandidate({ link: " https://example.com/z " })?.title).toBe("https://example.com/z");
  });
});


describe("extractTags", () => {
  it("合并 dc:subject 与 category", () => {
    expect(extractTags({ subject: "a b", categories: ["b", "c d"] })).toEqual(["a", "b", "c", "d"]);
  });
});
