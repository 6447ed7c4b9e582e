import { RetrievalUnavailableError, errorMessage } from "../errors";
import type { IndexedEntry } from "../catalog";
import type { BuildResult, EmbeddingFunction, VectorMatch, VectorRecord, VectorStore } from "./types";

export interface EmbeddingIndexOptions {
  embedder: EmbeddingFunction;
  store: VectorStore;
}

/**
 * Embedding function plus persistent vector store, pinned to one embedding model.
 */
export class EmbeddingIndex {
  readonly embedder: EmbeddingFunction;
  private readonly store: VectorStore;

  constructor(options: EmbeddingIndexOptions) {
    this.embedder = options.embedder;
    this.store = options.store;
  }

  /**
   * Embed and persist every entry whose text is not stored yet.
   * Entries already present with identical text are skipped without an embed call.
   */
  async build(entries: IndexedEntry[]): Promise<BuildResult> {
    await this.assertModel();

    const pending: IndexedEntry[] = [];
    let skipped = 0;
    for (const entry of entries) {
      const existing = await this.guard("read vector store", () => this.store.get(entry.id));
      if (existing && existing.text === entry.text) {
        skipped++;
      } else {
        pending.push(entry);
      }
    }

    if (pending.length === 0) {
      return { added: 0, skipped };
    }

    const vectors = await this.guard("embed catalog entries", () =>
      this.embedder.embed(pending.map(entry => entry.text))
    );

    const records: VectorRecord[] = pending.map((entry, i) => ({
      id: entry.id,
      text: entry.text,
      vector: vectors[i] ?? [],
    }));

    const dimensions = records[0]?.vector.length ?? 0;
    await this.guard("pin embedding model", () => this.store.pin(this.embedder.model, dimensions));
    await this.guard("write vector store", () => this.store.upsert(records));

    return { added: records.length, skipped };
  }

  /**
   * k nearest stored entries to `text`, ascending by L2 distance.
   * A query that embeds to the zero vector matches nothing.
   */
  async query(text: string, k: number): Promise<VectorMatch[]> {
    await this.assertModel();
    const vectors = await this.guard("embed query", () => this.embedder.embed([text]));
    const vector = vectors[0];
    if (!vector) {
      throw new RetrievalUnavailableError("Embedding backend returned no vector for the query");
    }
    if (vector.every(value => value === 0)) {
      return [];
    }
    return this.guard("query vector store", () => this.store.nearest(vector, k));
  }

  async size(): Promise<number> {
    return this.guard("read vector store", () => this.store.count());
  }

  private async assertModel(): Promise<void> {
    const stored = await this.guard("read vector store", () => this.store.model());
    if (stored !== null && stored !== this.embedder.model) {
      throw new RetrievalUnavailableError(
        `Index was built with ${stored} but the configured embedding model is ${this.embedder.model}`
      );
    }
  }

  private async guard<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof RetrievalUnavailableError) {
        throw error;
      }
      throw new RetrievalUnavailableError(`Cannot ${action}: ${errorMessage(error)}`, error);
    }
  }
}
