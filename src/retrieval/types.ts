import type { ToolDescriptor } from "../catalog/types";

/**
 * Turns text into a unit-length vector.
 * `model` identifies the embedding space; indexes are pinned to it.
 */
export interface EmbeddingFunction {
  readonly model: string;
  embed(texts: string[]): Promise<number[][]>;
}

export interface VectorRecord {
  id: string;
  text: string;
  vector: number[];
}

export interface VectorMatch {
  id: string;
  distance: number;
}

export interface VectorStore {
  /** Embedding model the stored vectors came from, or null while empty and unpinned */
  model(): Promise<string | null>;
  pin(model: string, dimensions: number): Promise<void>;
  count(): Promise<number>;
  get(id: string): Promise<VectorRecord | undefined>;
  upsert(records: VectorRecord[]): Promise<void>;
  /** k nearest records by L2 distance, ascending */
  nearest(vector: number[], k: number): Promise<VectorMatch[]>;
  clear(): Promise<void>;
}

export interface RetrievalHit {
  toolName: string;
  tool: ToolDescriptor;
  similarityScore: number;
  rank: number;
}

export interface BuildResult {
  added: number;
  skipped: number;
}
