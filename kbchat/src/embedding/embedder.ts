import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import { EmbeddingError, describeError } from "../errors.js";
import type { Embedding } from "../retrieval/types.js";
import { withTimeout } from "../utils/timeout.js";

/**
 * Text to vector. Chunks and queries must go through the same instance so
 * both land in the same vector space.
 */
export interface Embedder {
  readonly model: string;
  embed(text: string): Promise<Embedding>;
  embedAll(texts: string[]): Promise<Embedding[]>;
}

export class LangChainEmbedder implements Embedder {
  readonly model: string;
  private readonly embeddings: EmbeddingsInterface;
  private readonly timeoutMs: number;
  private observedDimension: number | undefined;

  constructor(params: { embeddings: EmbeddingsInterface; model: string; timeoutMs: number }) {
    this.embeddings = params.embeddings;
    this.model = params.model;
    this.timeoutMs = params.timeoutMs;
  }

  async embed(text: string): Promise<Embedding> {
    assertNonEmpty(text, 0);
    const vector = await this.call("embed query", () => this.embeddings.embedQuery(text));
    return this.check(vector, 0);
  }

  async embedAll(texts: string[]): Promise<Embedding[]> {
    if (texts.length === 0) return [];
    texts.forEach(assertNonEmpty);

    const vectors = await this.call("embed documents", () => this.embeddings.embedDocuments(texts));
    if (vectors.length !== texts.length) {
      throw new EmbeddingError(
        `Embedding count mismatch: texts=${texts.length} embeddings=${vectors.length}`
      );
    }
    return vectors.map((v, i) => this.check(v, i));
  }

  private async call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(`${this.model} ${label}`, this.timeoutMs, fn);
    } catch (err: unknown) {
      if (err instanceof EmbeddingError) throw err;
      throw new EmbeddingError(`Embedding request failed (${this.model}): ${describeError(err)}`, err);
    }
  }

  private check(vector: number[], position: number): Embedding {
    if (!Array.isArray(vector) || vector.length === 0) {
      throw new EmbeddingError(`Empty embedding returned at position ${position} (${this.model})`);
    }
    if (!vector.every((x) => typeof x === "number" && Number.isFinite(x))) {
      throw new EmbeddingError(`Non-finite value in embedding at position ${position} (${this.model})`);
    }

    const expected = this.observedDimension ?? vector.length;
    if (vector.length !== expected) {
      throw new EmbeddingError(
        `Embedding dimension changed at position ${position}: expected=${expected} actual=${vector.length} (${this.model})`
      );
    }
    this.observedDimension = expected;
    return vector;
  }
}

function assertNonEmpty(text: string, position: number): void {
  if (text.length === 0) {
    throw new EmbeddingError(`Cannot embed empty text (position ${position})`);
  }
}
