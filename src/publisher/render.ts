// 文章正文渲染：书签备注按 Markdown 转 HTML，外面包上原文链接与标签列表

import { unified } from "unified";
import remarkParse from "remark-parse";
import remarkGfm from "remark-gfm";
import remarkRehype from "remark-rehype";
import rehypeRaw from "rehype-raw";
import rehypeStringify from "rehype-stringify";
import { decodeNamedCharacterReference } from "decode-named-character-reference";
import type { Candidate } from "../types/candidate.js";


export interface RenderOptions {
  /** 标签链接前缀；为空时标签只输出文本 */
  tagPrefix?: string;
}


/** Pinboard 备注里的 HTML 常被转义一次，这里还原后再交给 Markdown（含内嵌 HTML）；命名实体区分大小写 */
export function unescapeHtml(s: string): string {
  return s.replace(/&(#x[0-9a-f]+|#[0-9]+|[a-z][a-z0-9]*);/gi, (whole, ref: string) => {
    if (ref[0] === "#") {
      const code = ref[1] === "x" || ref[1] === "X" ? parseInt(ref.slice(2), 16) : parseInt(ref.slice(1), 10);
      return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : whole;
    }
    return decodeNamedCharacterReference(ref) || whole;
  });
}


/**
 * 引用块内的文字也按 Markdown 渲染：标签前后各补一个空行，
 * 否则 CommonMark 会把 <blockquote> 到下一个空行之间整段当作原样 HTML
 */
export function openBlockquotes(markdown: string): string {
  return markdown
    .replace(/<blockquote(\s[^>]*)?>/gi, (tag) => `\n\n${tag}\n\n`)
    .replace(/<\/blockquote\s*>/gi, (tag) => `\n\n${tag}\n\n`);
}


export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}


/** Markdown → HTML；gfm 负责把裸 URL 变成链接，rehype-raw 保留备注里的 HTML 块，引用块内照常渲染 */
export async function renderMarkdown(markdown: string): Promise<string> {
  if (!markdown.trim()) return "";
  const file = await unified()
    .use(remarkParse)
    .use(remarkGfm)
    .use(remarkRehype, { allowDangerousHtml: true })
    .use(rehypeRaw)
    .use(rehypeStringify)
    .process(openBlockquotes(markdown));
  return String(file).trim();
}


export function renderTagList(tags: string[], opts: RenderOptions = {}): string {
  return tags
    .map((tag) => {
      const text = escapeHtml(tag);
      if (!opts.tagPrefix) return `<span class="delicioustag">${text}</span>`;
      const href = escapeHtml(`${opts.tagPrefix}/t:${encodeURIComponent(tag)}`);
      return `<a class="delicioustag" href="${href}">${text}</a>`;
    })
    .join(" ");
}


/** 组装完整的文章 HTML：原文链接 + 渲染后的备注 + 标签列表 */
export async function renderPostContent(candidate: Candidate, opts: RenderOptions = {}): Promise<string> {
  const title = escapeHtml(candidate.title);
  const body = await renderMarkdown(unescapeHtml(candidate.description));
  const lines = [
    "<ul><li><p>",
    `<a class="deliciouslink" href="${escapeHtml(candidate.url)}" title="${title}">${title}</a></p>`,
  ];
  if (body) lines.push("", body);
  if (candidate.tags.length > 0) {
    lines.push("", `<p class="taglist">Tags: ${renderTagList(candidate.tags, opts)}</p>`);
  }
  lines.push("</li></ul>");
  return lines.join("\n");
}
