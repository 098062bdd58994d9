/**
 * Similarity index boundary consumed by MemoryStore.
 */

import { MemoryMetadata } from "../types";

export interface SimilarityIndex {
  readonly id: string;
  upsert(text: string, metadata: MemoryMetadata, id: string): Promise<void>;
  /** Up to `k` stored texts, most similar first */
  query(text: string, k: number): Promise<string[]>;
  clear(): Promise<void>;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  const len = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < len; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
