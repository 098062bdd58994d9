/**
 * MemoryStore
 * Append-only, semantically searchable log of an agent run.
 * Every index call is bounded by a timeout.
 */

import { ulid } from "ulid";
import { MemoryError, TimeoutError, toError } from "../errors";
import { MemoryMetadata, MemoryRecord } from "../types";
import { withTimeout } from "../utils/timeout";
import { SimilarityIndex } from "./similarityIndex";

export interface MemoryStoreConfig {
  searchLimit: number;
  timeoutMs: number;
  clock?: () => number;
}

const DEFAULT_MEMORY_CONFIG: MemoryStoreConfig = {
  searchLimit: 5,
  timeoutMs: 10000,
};

export class MemoryStore {
  private readonly config: MemoryStoreConfig;
  private readonly clock: () => number;

  constructor(private readonly index: SimilarityIndex, config: Partial<MemoryStoreConfig> = {}) {
    this.config = { ...DEFAULT_MEMORY_CONFIG, ...config };
    this.clock = config.clock ?? Date.now;
  }

  get indexId(): string {
    return this.index.id;
  }

  /**
   * Store `text`; the caller's metadata object is copied, never mutated.
   */
  async add(text: string, metadata: MemoryMetadata = {}): Promise<MemoryRecord> {
    const now = this.clock();
    const record: MemoryRecord = {
      id: ulid(now),
      text,
      metadata: { ...metadata, timestamp: new Date(now).toISOString() },
    };

    await this.call("add", () => this.index.upsert(record.text, record.metadata, record.id));
    return record;
  }

  /**
   * Up to `limit` distinct texts, most relevant first.
   */
  async search(query: string, limit: number = this.config.searchLimit): Promise<string[]> {
    if (limit <= 0) return [];

    const hits = await this.call("search", () => this.index.query(query, limit));
    const seen = new Set<string>();
    const unique: string[] = [];
    for (const hit of hits) {
      if (seen.has(hit)) continue;
      seen.add(hit);
      unique.push(hit);
      if (unique.length >= limit) break;
    }
    return unique;
  }

  /**
   * Remove everything; safe to call repeatedly.
   */
  async clear(): Promise<void> {
    await this.call("clear", () => this.index.clear());
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(() => fn(), this.config.timeoutMs, `Memory ${operation}`);
    } catch (e) {
      if (e instanceof TimeoutError || e instanceof MemoryError) throw e;
      const error = toError(e);
      throw new MemoryError(error.message, operation, error);
    }
  }
}
