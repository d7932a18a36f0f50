/**
 * 网关内部统一的条目定义
 * Pinboard 书签 → Candidate → WordPress 文章 → PublishedItem
 */

export interface Candidate {
  /** 去重键：书签的规范 URL */
  itemId: string;
  /** 标题 */
  title: string;
  /** 书签指向的原文链接 */
  url: string;
  /** 标签，保持 Pinboard 中的顺序，已去重 */
  tags: string[];
  /** 书签创建时间 */
  createdAt: Date;
  /** 书签备注（Markdown），可为空串 */
  description: string;
}


/** 已发布记录：仅在 Publish Sink 成功后写入一次，核心流程从不更新或删除 */
export interface PublishedItem {
  itemId: string;
  /** 写入记录的时间（ISO 字符串） */
  publishedDate: string;
  title?: string;
  /** WordPress 文章 ID */
  postId?: number;
}
