/**
 * In-process similarity index: cosine ranking over embedder vectors.
 * Local/dev stand-in for a real vector store.
 */

import { MemoryMetadata } from "../types";
import { Embedder, HashingEmbedder } from "./embeddings";
import { SimilarityIndex, cosineSimilarity } from "./similarityIndex";

interface IndexedEntry {
  text: string;
  metadata: MemoryMetadata;
  vector: number[];
}

export class InMemorySimilarityIndex implements SimilarityIndex {
  readonly id = "in-memory";
  private entries = new Map<string, IndexedEntry>();

  constructor(private readonly embedder: Embedder = new HashingEmbedder()) {}

  get size(): number {
    return this.entries.size;
  }

  async upsert(text: string, metadata: MemoryMetadata, id: string): Promise<void> {
    const [vector] = await this.embedder.embed([text]);
    this.entries.set(id, { text, metadata: { ...metadata }, vector });
  }

  async query(text: string, k: number): Promise<string[]> {
    if (k <= 0 || this.entries.size === 0) return [];
    const [vector] = await this.embedder.embed([text]);

    // Array.prototype.sort is stable: equal scores keep insertion order
    return Array.from(this.entries.values())
      .map((entry) => ({ text: entry.text, score: cosineSimilarity(vector, entry.vector) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k)
      .map((hit) => hit.text);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }
}
