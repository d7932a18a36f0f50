// 路径配置：集中管理运行时路径，用户数据放在 .pinpress/ 下

import { mkdir } from "node:fs/promises";
import { dirname, isAbsolute, join } from "node:path";


/** 用户数据根目录：.pinpress/（不纳入版本管理） */
export const USER_DIR = join(process.cwd(), ".pinpress");


/** SQLite 数据库目录：.pinpress/data/ */
export const DATA_DIR = join(USER_DIR, "data");


/** 默认数据库文件，DB_PATH 未设置时使用 */
export const DEFAULT_DB_PATH = join(DATA_DIR, "pinpress.db");


/** 相对路径按 cwd 解析，与 cron 的工作目录一致 */
export function resolveDbPath(p: string): string {
  if (p === ":memory:") return p;
  return isAbsolute(p) ? p : join(process.cwd(), p);
}


/** 确保数据库所在目录存在 */
export async function ensureDbDir(dbPath: string): Promise<void> {
  if (dbPath === ":memory:") return;
  await mkdir(dirname(dbPath), { recursive: true });
}
