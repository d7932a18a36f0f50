// 命令行命令：run（默认）/ forget / list；返回进程退出码，由入口设置 process.exitCode

import { loadConfig } from "../config/index.js";
import { openStore } from "../db/index.js";
import { PinboardReader } from "../source/pinboard.js";
import { DryRunPublisher, WordPressPublisher } from "../publisher/wordpress.js";
import type { PublishSink } from "../publisher/types.js";
import { exitCodeFor, formatSummary, runGateway } from "../gateway/index.js";
import { errMessage } from "../errors/index.js";
import { logger } from "../logger/index.js";


export type CliCommand = "run" | "forget" | "list" | "help";


export interface CliArgs {
  command: CliCommand;
  dryRun: boolean;
  /** forget 的目标 */
  itemId?: string;
  /** list 的条数 */
  limit?: number;
}


export const USAGE = `用法:
  pinpress [run] [--dry-run]   拉取 Pinboard 并发布新书签到 WordPress
  pinpress forget <item_id>    删除一条已发布记录，下次运行会重发
  pinpress list [--limit N]    列出已发布记录（新到旧）
  pinpress help`;


type Env = Record<string, string | undefined>;


export function parseArgs(argv: string[]): CliArgs {
  const flags = argv.filter((a) => a.startsWith("--"));
  const positional = argv.filter((a, i) => !a.startsWith("--") && argv[i - 1] !== "--limit");
  const [first = "run", second] = positional;
  if (first !== "run" && first !== "forget" && first !== "list" && first !== "help") {
    throw new Error(`未知命令: ${first}`);
  }
  for (const f of flags) {
    if (f !== "--dry-run" && f !== "--limit" && f !== "--help") throw new Error(`未知参数: ${f}`);
  }
  if (flags.includes("--help")) return { command: "help", dryRun: false };
  const args: CliArgs = { command: first, dryRun: flags.includes("--dry-run") };
  if (first === "forget") {
    if (!second) throw new Error("forget 需要 item_id");
    args.itemId = second;
  }
  const limitIdx = argv.indexOf("--limit");
  if (limitIdx >= 0) {
    const n = Number(argv[limitIdx + 1]);
    if (!Number.isInteger(n) || n <= 0) throw new Error("--limit 需要正整数");
    args.limit = n;
  }
  return args;
}


async function runOnce(env: Env, dryRun: boolean): Promise<number> {
  const config = loadConfig(env);
  const store = await openStore(config.dbPath);
  try {
    let sink: PublishSink;
    if (dryRun) {
      sink = new DryRunPublisher(config.wordpress.postStatus, config.feed.tagPrefix);
    } else {
      const wp = new WordPressPublisher({ ...config.wordpress, tagPrefix: config.feed.tagPrefix });
      await wp.verifyAuth();
      sink = wp;
    }
    const reader = new PinboardReader(config.feed.url, { maxItems: config.feed.maxItems });
    const report = await runGateway({ reader, sink, store, record: !dryRun });
    console.log(formatSummary(report));
    return exitCodeFor(report);
  } finally {
    store.close();
  }
}


async function forget(env: Env, itemId: string): Promise<number> {
  const store = await openStore(loadConfig(env).dbPath);
  try {
    if (!store.forget(itemId)) {
      console.error(`没有该记录: ${itemId}`);
      return 1;
    }
    console.log(`已删除: ${itemId}`);
    return 0;
  } finally {
    store.close();
  }
}


async function list(env: Env, limit?: number): Promise<number> {
  const store = await openStore(loadConfig(env).dbPath);
  try {
    for (const item of store.list(limit)) {
      const post = item.postId != null ? `#${item.postId}` : "-";
      console.log(`${item.publishedDate}\t${post}\t${item.itemId}`);
    }
    return 0;
  } finally {
    store.close();
  }
}


/** 执行命令；所有失败都在这里记日志并转成退出码 1 */
export async function runCli(argv: string[], env: Env = process.env): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    console.error(errMessage(err));
    console.error(USAGE);
    return 1;
  }
  try {
    switch (args.command) {
      case "help":
        console.log(USAGE);
        return 0;
      case "forget":
        return await forget(env, args.itemId ?? "");
      case "list":
        return await list(env, args.limit);
      case "run":
        return await runOnce(env, args.dryRun);
    }
  } catch (err) {
    logger.error("cli", "运行中止", { err: errMessage(err), type: err instanceof Error ? err.name : typeof err });
    return 1;
  }
}
