// FeedReader 抽象接口：对账循环只依赖此契约，不关心信源是 Pinboard 还是别的 Feed

import type { Candidate } from "../types/candidate.js";


/** 信源读取器：按信源约定的顺序产出本次运行的候选条目，失败时抛 FeedUnavailableError */
export interface FeedReader {
  fetchCandidates(): Promise<Candidate[]>;
}


export interface FeedReaderOptions {
  /** 只考虑最新的 N 条 */
  maxItems?: number;
  /** 请求超时，默认 15s */
  timeoutMs?: number;
}
