// 数据库模块：管理 SQLite 连接与 published_items 表，提供已发布记录的点查与插入

import Database from "better-sqlite3";
import type { PublishedItem } from "../types/candidate.js";
import { DuplicateItemError, StoreUnavailableError, errMessage } from "../errors/index.js";
import { ensureDbDir } from "../config/paths.js";


/** 对账循环依赖的存储契约：只有点查与插入，没有更新与删除 */
export interface ItemStore {
  isPublished(itemId: string): boolean;
  /** 重复插入抛 DuplicateItemError，其余失败抛 StoreUnavailableError */
  markPublished(item: PublishedItem): void;
}


/** 表结构保持稳定：运维会手工删行以强制重发 */
function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS published_items (
      item_id         TEXT PRIMARY KEY,
      title           TEXT,
      published_date  TEXT NOT NULL,
      post_id         INTEGER,
      created_at      TEXT DEFAULT CURRENT_TIMESTAMP
    );
  `);
}


interface PublishedRow {
  item_id: string;
  title: string | null;
  published_date: string;
  post_id: number | null;
}


function fromRow(row: PublishedRow): PublishedItem {
  return {
    itemId: row.item_id,
    publishedDate: row.published_date,
    title: row.title ?? undefined,
    postId: row.post_id ?? undefined,
  };
}


/** 把 better-sqlite3 的异常统一包成 StoreUnavailableError */
function guard<T>(action: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof DuplicateItemError || err instanceof StoreUnavailableError) throw err;
    throw new StoreUnavailableError(`${action}失败: ${errMessage(err)}`, { cause: err });
  }
}


export class PublishedItemStore implements ItemStore {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    guard("初始化表结构", () => initSchema(db));
  }

  isPublished(itemId: string): boolean {
    return guard("查询", () =>
      this.db.prepare("SELECT 1 FROM published_items WHERE item_id = ?").get(itemId) !== undefined
    );
  }

  markPublished(item: PublishedItem): void {
    const info = guard("写入", () =>
      this.db.prepare(`
        INSERT OR IGNORE INTO published_items (item_id, title, published_date, post_id)
        VALUES (@itemId, @title, @publishedDate, @postId)
      `).run({
        itemId: item.itemId,
        title: item.title ?? null,
        publishedDate: item.publishedDate,
        postId: item.postId ?? null,
      })
    );
    if (info.changes === 0) throw new DuplicateItemError(item.itemId);
  }

  /** 运维操作：删除一条记录以便下次运行重发；返回是否删到了 */
  forget(itemId: string): boolean {
    return guard("删除", () =>
      this.db.prepare("DELETE FROM published_items WHERE item_id = ?").run(itemId).changes > 0
    );
  }

  /** 按写入时间倒序列出记录，供 `pinpress list` 使用 */
  list(limit = 50): PublishedItem[] {
    const rows = guard("查询", () =>
      this.db.prepare(`
        SELECT item_id, title, published_date, post_id FROM published_items
        ORDER BY published_date DESC, rowid DESC
        LIMIT ?
      `).all(limit) as PublishedRow[]
    );
    return rows.map(fromRow);
  }

  close(): void {
    this.db.close();
  }
}


/** 打开（必要时创建）数据库文件；WAL 模式保证进程被杀时不损坏 */
export async function openStore(dbPath: string): Promise<PublishedItemStore> {
  try {
    await ensureDbDir(dbPath);
  } catch (err) {
    throw new StoreUnavailableError(`无法创建数据库目录: ${errMessage(err)}`, { cause: err });
  }
  const db = guard("打开数据库", () => {
    const conn = new Database(dbPath);
    conn.pragma("journal_mode = WAL");
    conn.pragma("synchronous = NORMAL");
    return conn;
  });
  return new PublishedItemStore(db);
}
