// PublishSink 抽象接口：一次调用发一篇文章，结果只有成功（返回文章信息）或抛 PublishFailedError

import type { Candidate } from "../types/candidate.js";


export interface PublishResult {
  /** WordPress 文章 ID；dry-run 时为空 */
  postId?: number;
  /** 文章永久链接 */
  link?: string;
}


export interface PublishSink {
  publish(candidate: Candidate): Promise<PublishResult>;
}
