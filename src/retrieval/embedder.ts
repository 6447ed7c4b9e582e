import OpenAI from "openai";
import type { EmbeddingFunction } from "./types";

const DEFAULT_DIMENSIONS = 384;
const WORD_PATTERN = /[a-z0-9]+/g;

export const DEFAULT_OPENAI_EMBEDDING_MODEL = "text-embedding-3-small";

/**
 * Scale a vector to unit length; the zero vector stays as is
 */
export function normalizeVector(vector: number[]): number[] {
  let sumSquares = 0;
  for (const value of vector) {
    sumSquares += value * value;
  }
  if (sumSquares === 0) {
    return vector;
  }
  const norm = Math.sqrt(sumSquares);
  return vector.map(value => value / norm);
}

/**
 * FNV-1a over UTF-16 code units
 */
export function stableHash(value: string): number {
  let hash = 2166136261;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

/**
 * Deterministic bag-of-words embedding, works offline.
 * Each lower-cased alphanumeric token increments one hashed bucket.
 */
export class HashedEmbeddingFunction implements EmbeddingFunction {
  readonly model: string;
  private readonly dimensions: number;

  constructor(options?: { dimensions?: number }) {
    this.dimensions = Math.max(32, options?.dimensions ?? DEFAULT_DIMENSIONS);
    this.model = `hashed-${this.dimensions}`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(text => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const vector: number[] = new Array<number>(this.dimensions).fill(0);
    const tokens = text.toLowerCase().match(WORD_PATTERN) ?? [];

    for (const token of tokens) {
      const idx = stableHash(token) % this.dimensions;
      vector[idx] = (vector[idx] ?? 0) + 1;
    }

    return normalizeVector(vector);
  }
}

/**
 * Subset of the OpenAI client used for embeddings (DI seam for tests)
 */
export interface EmbeddingsClientLike {
  embeddings: {
    create(request: { model: string; input: string[] }): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

export interface OpenAIEmbeddingOptions {
  model?: string;
  apiKey?: string;
  client?: EmbeddingsClientLike;
}

/**
 * Remote embeddings through the OpenAI API, pinned to one model
 */
export class OpenAIEmbeddingFunction implements EmbeddingFunction {
  readonly model: string;
  private readonly modelName: string;
  private readonly client: EmbeddingsClientLike;

  constructor(options?: OpenAIEmbeddingOptions) {
    this.modelName = options?.model ?? DEFAULT_OPENAI_EMBEDDING_MODEL;
    this.model = `openai:${this.modelName}`;
    this.client = options?.client ?? new OpenAI({ apiKey: options?.apiKey ?? process.env.OPENAI_API_KEY });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.client.embeddings.create({
      model: this.modelName,
      input: texts,
    });

    const ordered = [...response.data].sort((a, b) => a.index - b.index);
    if (ordered.length !== texts.length) {
      throw new Error(`Expected ${texts.length} embeddings, got ${ordered.length}`);
    }

    return ordered.map(item => normalizeVector(item.embedding));
  }
}

export type EmbeddingProviderName = "hashed" | "openai";

/**
 * Build the embedding function named in the settings
 */
export function createEmbeddingFunction(settings: {
  provider: EmbeddingProviderName;
  model?: string;
  dimensions?: number;
}): EmbeddingFunction {
  if (settings.provider === "openai") {
    return new OpenAIEmbeddingFunction({ model: settings.model });
  }
  return new HashedEmbeddingFunction({ dimensions: settings.dimensions });
}
