import OpenAI from "openai";

export interface Embedder {
  readonly id: string;
  embed(texts: string[]): Promise<number[][]>;
}

export interface OpenAIEmbedderConfig {
  apiKey: string;
  baseURL?: string;
  model?: string;
}

/** Inputs beyond this are truncated before embedding */
const MAX_INPUT_CHARS = 8000;

/**
 * OpenAI embeddings with a per-process cache keyed by the input text
 */
export class OpenAIEmbedder implements Embedder {
  readonly id: string;
  private client: OpenAI;
  private model: string;
  private cache = new Map<string, number[]>();

  constructor(config: OpenAIEmbedderConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL });
    this.model = config.model || "text-embedding-3-small";
    this.id = `openai:${this.model}`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    const missing = Array.from(new Set(texts.filter((t) => !this.cache.has(t))));

    if (missing.length > 0) {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: missing.map((t) => t.slice(0, MAX_INPUT_CHARS)),
        encoding_format: "float",
      });
      for (const item of response.data) {
        this.cache.set(missing[item.index], item.embedding);
      }
    }

    return texts.map((t) => {
      const vector = this.cache.get(t);
      if (!vector) {
        throw new Error(`No embedding returned for input of length ${t.length}`);
      }
      return vector;
    });
  }
}

/**
 * Deterministic bag-of-words embedding (token hashes into a fixed number of
 * buckets, L2-normalised). Works offline; similarity is lexical, not semantic.
 */
export class HashingEmbedder implements Embedder {
  readonly id = "hashing";

  constructor(private readonly dimensions = 256) {}

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((t) => this.vectorize(t));
  }

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of text.toLowerCase().split(/[^a-z0-9]+/)) {
      if (!token) continue;
      vector[fnv1a(token) % this.dimensions] += 1;
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}

function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
