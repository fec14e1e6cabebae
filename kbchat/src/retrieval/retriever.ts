import type { Embedder } from "../embedding/embedder.js";
import type { RankedResult } from "./types.js";
import type { VectorIndex } from "./vectorIndex.js";

export class Retriever {
  private readonly embedder: Embedder;
  private readonly index: VectorIndex;
  private readonly defaultTopK: number;

  constructor(params: { embedder: Embedder; index: VectorIndex; defaultTopK: number }) {
    this.embedder = params.embedder;
    this.index = params.index;
    this.defaultTopK = params.defaultTopK;
  }

  // Embedder and index errors propagate unchanged.
  async retrieve(query: string, topK: number = this.defaultTopK): Promise<RankedResult[]> {
    const queryEmbedding = await this.embedder.embed(query);
    return this.index.search(queryEmbedding, topK);
  }
}
