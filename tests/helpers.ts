import Database from "better-sqlite3";
import type { Candidate } from "../src/types/candidate.js";
import type { FeedReader } from "../src/source/types.js";
import type { PublishResult, PublishSink } from "../src/publisher/types.js";
import { PublishedItemStore } from "../src/db/index.js";


export function memoryStore(): PublishedItemStore {
  return new PublishedItemStore(new Database(":memory:"));
}


export function candidate(id: string, extra: Partial<Candidate> = {}): Candidate {
  return {
    itemId: `http://x/${id}`,
    title: `Post ${id.toUpperCase()}`,
    url: `http://x/${id}`,
    tags: [],
    createdAt: new Date("2025-01-01T00:00:00.000Z"),
    description: "",
    ...extra,
  };
}


/** 固定候选列表的信源 */
export class StaticReader implements FeedReader {
  constructor(public items: Candidate[]) {}

  async fetchCandidates(): Promise<Candidate[]> {
    return [...this.items];
  }
}


/** 记录调用顺序的发布端；failOn 中的条目抛错 */
export class RecordingSink implements PublishSink {
  readonly calls: string[] = [];
  readonly failOn = new Set<string>();
  private nextId = 100;

  async publish(c: Candidate): Promise<PublishResult> {
    this.calls.push(c.itemId);
    if (this.failOn.has(c.itemId)) throw new Error(`target down: ${c.itemId}`);
    return { postId: this.nextId++ };
  }
}
