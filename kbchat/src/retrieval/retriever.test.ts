import { describe, expect, it } from "vitest";

import { LangChainEmbedder } from "../embedding/embedder.js";
import { DimensionMismatchError, EmbeddingError } from "../errors.js";
import { FunctionEmbeddings } from "../testing/fakes.js";
import { Retriever } from "./retriever.js";
import type { Chunk } from "./types.js";
import { VectorIndex } from "./vectorIndex.js";

const KEYWORDS = ["reset", "firmware", "warranty"];

function keywordVector(text: string): number[] {
  const lower = text.toLowerCase();
  return KEYWORDS.map((k) => (lower.includes(k) ? 1 : 0));
}

function chunk(sequence: number, text: string): Chunk {
  return { sequence, source: "guide.md", start: sequence * 50, end: sequence * 50 + text.length, text };
}

function setup(fn: (text: string) => number[] = keywordVector) {
  const embedder = new LangChainEmbedder({
    embeddings: new FunctionEmbeddings(fn),
    model: "test-embed",
    timeoutMs: 1000
  });
  const index = new VectorIndex();
  const texts = ["Reset the hub.", "Firmware updates at 3 AM.", "Two-year warranty.", "Firmware reset."];
  texts.forEach((t, i) => index.insert(chunk(i, t), keywordVector(t)));
  return { embedder, index };
}

describe("Retriever", () => {
  it("returns the index ranking for the embedded query", async () => {
    const { embedder, index } = setup();
    const retriever = new Retriever({ embedder, index, defaultTopK: 2 });

    const results = await retriever.retrieve("How do I reset it?");

    expect(results.map((r) => [r.rank, r.chunk.sequence])).toEqual([
      [1, 0],
      [2, 3]
    ]);
    expect(results[0]?.score).toBe(1);
    expect(results[1]?.score).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it("honours an explicit topK", async () => {
    const { embedder, index } = setup();
    const retriever = new Retriever({ embedder, index, defaultTopK: 2 });

    await expect(retriever.retrieve("firmware", 10)).resolves.toHaveLength(4);
    await expect(retriever.retrieve("firmware", 1)).resolves.toMatchObject([{ chunk: { sequence: 1 } }]);
  });

  it("returns nothing from an empty index", async () => {
    const { embedder } = setup();
    const retriever = new Retriever({ embedder, index: new VectorIndex(), defaultTopK: 3 });
    await expect(retriever.retrieve("reset")).resolves.toEqual([]);
  });

  it("propagates embedding failures", async () => {
    const { index } = setup();
    const { embedder } = setup(() => {
      throw new Error("service unavailable");
    });
    const retriever = new Retriever({ embedder, index, defaultTopK: 3 });

    await expect(retriever.retrieve("reset")).rejects.toThrow(EmbeddingError);
  });

  it("propagates dimension mismatches between query and index", async () => {
    const { index } = setup();
    const { embedder } = setup(() => [1, 0]);
    const retriever = new Retriever({ embedder, index, defaultTopK: 3 });

    await expect(retriever.retrieve("reset")).rejects.toThrow(DimensionMismatchError);
  });
});
