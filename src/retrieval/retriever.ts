import type { ToolCatalog } from "../catalog";
import { globalProfiler } from "../profiler";
import type { EmbeddingIndex } from "./embedding-index";
import type { RetrievalHit } from "./types";

/**
 * Similarity for an L2 distance between unit vectors: 1 at d=0, -1 at d=2
 */
export function distanceToSimilarity(distance: number): number {
  return 1 - (distance * distance) / 2;
}

export interface RetrieverOptions {
  index: EmbeddingIndex;
  catalog: ToolCatalog;
}

export class Retriever {
  private readonly index: EmbeddingIndex;
  private readonly catalog: ToolCatalog;

  constructor(options: RetrieverOptions) {
    this.index = options.index;
    this.catalog = options.catalog;
  }

  /**
   * Rank catalog tools for a free-text query.
   * An empty list means no tool is relevant.
   */
  async retrieve(query: string, topK: number, scoreThreshold = 0): Promise<RetrievalHit[]> {
    if (query.trim().length === 0 || topK <= 0) {
      return [];
    }

    const done = globalProfiler.startTimer("retrieval.query");
    try {
      const matches = await this.index.query(query, topK);
      const hits: RetrievalHit[] = [];

      for (const match of matches) {
        const similarityScore = distanceToSimilarity(match.distance);
        if (similarityScore < scoreThreshold) {
          continue;
        }
        const tool = this.catalog.get(match.id);
        if (!tool) {
          // stale index entry
          continue;
        }
        hits.push({ toolName: tool.name, tool, similarityScore, rank: hits.length + 1 });
      }

      return hits;
    } finally {
      done();
    }
  }
}
