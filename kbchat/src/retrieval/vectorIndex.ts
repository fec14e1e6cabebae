import { DimensionMismatchError } from "../errors.js";
import { dotProduct, normalize } from "./similarity.js";
import type { Chunk, Embedding, IndexEntry, RankedResult } from "./types.js";

/**
 * In-memory exact nearest-neighbour index over chunk embeddings.
 *
 * Vectors are normalized on insert so that search is a dot product. Entries
 * are never updated or removed; a new document means building a new index.
 */
export class VectorIndex {
  private readonly entries: IndexEntry[] = [];
  private establishedDimension: number | undefined;

  get size(): number {
    return this.entries.length;
  }

  /** Dimension fixed by the first insert, or undefined while empty. */
  get dimension(): number | undefined {
    return this.establishedDimension;
  }

  insert(chunk: Chunk, embedding: Embedding): void {
    const expected = this.establishedDimension;
    if (embedding.length === 0 || (expected !== undefined && embedding.length !== expected)) {
      throw new DimensionMismatchError(expected ?? 0, embedding.length);
    }

    const entry: IndexEntry = Object.freeze({
      chunk: Object.freeze({ ...chunk }),
      vector: Object.freeze(normalize(embedding))
    });
    this.entries.push(entry);
    this.establishedDimension = embedding.length;
  }

  /**
   * Top `k` entries by cosine similarity, highest first. Equal scores are
   * ordered by ascending chunk sequence so results are reproducible.
   */
  search(queryEmbedding: Embedding, k: number): RankedResult[] {
    if (this.entries.length === 0 || k < 1) return [];

    const expected = this.establishedDimension ?? 0;
    if (queryEmbedding.length !== expected) {
      throw new DimensionMismatchError(expected, queryEmbedding.length);
    }

    const query = normalize(queryEmbedding);
    return this.entries
      .map((entry) => ({ chunk: entry.chunk, score: dotProduct(query, entry.vector) }))
      .sort((a, b) => b.score - a.score || a.chunk.sequence - b.chunk.sequence)
      .slice(0, k)
      .map((scored, i) => ({ ...scored, rank: i + 1 }));
  }
}
