/**
 * Chroma-backed similarity index (cosine space).
 */

import { ChromaClient, Collection, IEmbeddingFunction } from "chromadb";
import { MemoryMetadata } from "../types";
import { Embedder } from "./embeddings";
import { SimilarityIndex } from "./similarityIndex";

export interface ChromaIndexConfig {
  url: string;
  collection: string;
}

export class ChromaSimilarityIndex implements SimilarityIndex {
  readonly id = "chroma";
  private client: ChromaClient;
  private embeddingFunction: IEmbeddingFunction;
  private collection: Promise<Collection> | null = null;

  constructor(private readonly config: ChromaIndexConfig, embedder: Embedder) {
    this.client = new ChromaClient({ path: config.url });
    this.embeddingFunction = {
      generate: (texts: string[]) => embedder.embed(texts),
    };
  }

  async upsert(text: string, metadata: MemoryMetadata, id: string): Promise<void> {
    const collection = await this.getCollection();
    await collection.upsert({ ids: [id], documents: [text], metadatas: [metadata] });
  }

  async query(text: string, k: number): Promise<string[]> {
    if (k <= 0) return [];
    const collection = await this.getCollection();
    const count = await collection.count();
    if (count === 0) return [];

    const result = await collection.query({ queryTexts: [text], nResults: Math.min(k, count) });
    const documents = result.documents[0] ?? [];
    return documents.filter((d): d is string => typeof d === "string");
  }

  async clear(): Promise<void> {
    // Drop and recreate so the next call starts from an empty collection
    await this.getCollection();
    await this.client.deleteCollection({ name: this.config.collection });
    this.collection = null;
    await this.getCollection();
  }

  private getCollection(): Promise<Collection> {
    if (!this.collection) {
      const pending = this.client.getOrCreateCollection({
        name: this.config.collection,
        metadata: { "hnsw:space": "cosine" },
        embeddingFunction: this.embeddingFunction,
      });
      // A failed lookup is retried on the next call
      pending.catch(() => {
        if (this.collection === pending) this.collection = null;
      });
      this.collection = pending;
    }
    return this.collection;
  }
}
