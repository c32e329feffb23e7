// Interview Coach Engine - Embedding services
// The relevance scorer treats sentence embeddings as an opaque service. Two
// implementations: the OpenAI embeddings API, and a deterministic offline
// hashed bag-of-words used for local runs and tests.

import { DEFAULT_EMBEDDING_MODEL } from "./config.js";

export interface EmbeddingService {
  /** Fixed-dimension vector for `text`. Deterministic for identical input. */
  embed(text: string): Promise<number[]>;
}

// ─── OpenAI client interface (for testability / dependency injection) ────────────

/**
 * Minimal interface for the OpenAI embeddings API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIEmbeddingsClient {
  embeddings: {
    create(params: { model: string; input: string }): Promise<{
      data: Array<{
        embedding: number[];
      }>;
    }>;
  };
}

export class OpenAIEmbeddingService implements EmbeddingService {
  private readonly client: OpenAIEmbeddingsClient;
  readonly model: string;

  constructor(client: OpenAIEmbeddingsClient, model: string = DEFAULT_EMBEDDING_MODEL) {
    this.client = client;
    this.model = model;
  }

  async embed(text: string): Promise<number[]> {
    const response = await this.client.embeddings.create({
      model: this.model,
      input: text,
    });
    if (response.data.length === 0) {
      throw new Error(`Embedding model ${this.model} returned no vectors`);
    }
    return response.data[0].embedding;
  }
}

// ─── Lexical (offline) embeddings ───────────────────────────────────────────────

export const LEXICAL_EMBEDDING_DIMENSIONS = 256;

/**
 * Signed feature hashing of lowercase word unigrams and bigrams into a fixed
 * number of buckets. Captures vocabulary overlap only, not meaning.
 */
export class LexicalEmbeddingService implements EmbeddingService {
  readonly dimensions: number;

  constructor(dimensions: number = LEXICAL_EMBEDDING_DIMENSIONS) {
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new Error(`Embedding dimensions must be a positive integer, got ${dimensions}`);
    }
    this.dimensions = dimensions;
  }

  async embed(text: string): Promise<number[]> {
    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];

    const features = [...tokens];
    for (let i = 1; i < tokens.length; i++) {
      features.push(`${tokens[i - 1]} ${tokens[i]}`);
    }

    for (const feature of features) {
      const hash = fnv1a(feature);
      const bucket = hash % this.dimensions;
      // Top bit picks the sign so unrelated features tend to cancel out
      vector[bucket] += hash & 0x80000000 ? -1 : 1;
    }
    return vector;
  }
}

/** 32-bit FNV-1a hash, unsigned. */
function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
