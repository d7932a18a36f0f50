// 对账循环：拉取候选 → 按存储过滤 → 逐条发布 → 每条成功立即落库；首个发布失败即停止本次运行

import type { Candidate } from "../types/candidate.js";
import type { FeedReader } from "../source/types.js";
import type { PublishSink } from "../publisher/types.js";
import type { ItemStore } from "../db/index.js";
import { DuplicateItemError, FeedUnavailableError, PublishFailedError, errMessage } from "../errors/index.js";
import { logger } from "../logger/index.js";


export interface GatewayDeps {
  reader: FeedReader;
  sink: PublishSink;
  store: ItemStore;
  /** 记录时间来源，测试可注入 */
  now?: () => Date;
  /** false 时只发布不落库（dry-run） */
  record?: boolean;
}


/** 一次运行的结果；failed 存在即表示本次被发布失败中断 */
export interface RunReport {
  /** 本次发布成功的条目，按处理顺序 */
  published: string[];
  /** 运行开始时已在存储中的条目 */
  skipped: string[];
  /** 发布成功但写入时发现已有记录（并发运行抢先写入） */
  duplicates: string[];
  failed?: {
    itemId: string;
    error: PublishFailedError;
  };
  /** 未落库运行（dry-run）：published 只表示已渲染，并未发出 */
  dryRun: boolean;
}


/** 按存储把候选分成待发布与已发布，保持信源顺序；同一 itemId 在本次 Feed 中只处理一次 */
export function partitionCandidates(candidates: Candidate[], store: ItemStore): { eligible: Candidate[]; skipped: string[] } {
  const eligible: Candidate[] = [];
  const skipped: string[] = [];
  const seen = new Set<string>();
  for (const c of candidates) {
    if (seen.has(c.itemId)) {
      logger.debug("gateway", "Feed 内重复条目，忽略", { item_id: c.itemId });
      continue;
    }
    seen.add(c.itemId);
    if (store.isPublished(c.itemId)) {
      skipped.push(c.itemId);
    } else {
      eligible.push(c);
    }
  }
  return { eligible, skipped };
}


async function fetchCandidates(reader: FeedReader): Promise<Candidate[]> {
  try {
    return await reader.fetchCandidates();
  } catch (err) {
    if (err instanceof FeedUnavailableError) throw err;
    throw new FeedUnavailableError(`读取信源失败: ${errMessage(err)}`, { cause: err });
  }
}


/**
 * 执行一次对账运行。
 *
 * 发布成功后立刻写入存储再处理下一条：进程在两步之间被杀，下次运行最多重发该条，不会漏发；
 * 写入之后被杀，该条不会再被处理。FeedUnavailableError 与 StoreUnavailableError 直接抛出。
 */
export async function runGateway(deps: GatewayDeps): Promise<RunReport> {
  const now = deps.now ?? (() => new Date());
  const record = deps.record ?? true;

  const candidates = await fetchCandidates(deps.reader);
  const { eligible, skipped } = partitionCandidates(candidates, deps.store);
  logger.info("gateway", "候选条目已过滤", { total: candidates.length, eligible: eligible.length, skipped: skipped.length });

  const report: RunReport = { published: [], skipped, duplicates: [], dryRun: !record };

  for (const candidate of eligible) {
    let postId: number | undefined;
    try {
      logger.info("gateway", "发布条目", { item_id: candidate.itemId, title: candidate.title });
      ({ postId } = await deps.sink.publish(candidate));
    } catch (err) {
      const error = err instanceof PublishFailedError
        ? err
        : new PublishFailedError(candidate.itemId, errMessage(err), { cause: err });
      logger.error("gateway", "发布失败，停止本次运行", {
        item_id: candidate.itemId,
        err: error.message,
        status: error.status,
        body: error.responseBody,
      });
      report.failed = { itemId: candidate.itemId, error };
      break;
    }

    report.published.push(candidate.itemId);
    if (!record) continue;

    try {
      deps.store.markPublished({
        itemId: candidate.itemId,
        publishedDate: now().toISOString(),
        title: candidate.title,
        postId,
      });
      logger.info("store", "已记录", { item_id: candidate.itemId, post_id: postId });
    } catch (err) {
      if (!(err instanceof DuplicateItemError)) throw err;
      logger.info("store", "记录已存在，继续", { item_id: candidate.itemId });
      report.duplicates.push(candidate.itemId);
    }
  }

  return report;
}


/** 运行摘要，cli 原样打印 */
export function formatSummary(report: RunReport): string {
  const parts = [`published: ${report.published.length}`, `skipped: ${report.skipped.length}`];
  if (report.duplicates.length > 0) parts.push(`duplicates: ${report.duplicates.length}`);
  if (report.failed) parts.push(`failed: ${report.failed.itemId}`);
  const line = parts.join(", ");
  return report.dryRun ? `[dry-run] ${line} (nothing sent)` : line;
}


export function exitCodeFor(report: RunReport): number {
  return report.failed ? 1 : 0;
}
