import type { Embedder } from "../embedding/embedder.js";
import type { Logger } from "../logging/logger.js";
import { VectorIndex } from "../retrieval/vectorIndex.js";
import type { SourceDocument } from "../retrieval/types.js";
import type { SlidingWindowTextSplitter } from "../splitting/slidingWindowSplitter.js";

/**
 * Splits and embeds a whole document into a fresh index. Any embedding or
 * dimension error aborts the build; the caller never sees a partial index.
 */
export async function buildIndex(params: {
  document: SourceDocument;
  splitter: SlidingWindowTextSplitter;
  embedder: Embedder;
  logger: Logger;
}): Promise<VectorIndex> {
  const { document, splitter, embedder, logger } = params;
  const startedAt = Date.now();

  const chunks = splitter.splitDocument(document);
  logger.info("index.build.start", {
    source: document.source,
    characters: document.text.length,
    chunks: chunks.length,
    embeddingModel: embedder.model
  });

  const vectors = await embedder.embedAll(chunks.map((c) => c.text));

  const index = new VectorIndex();
  chunks.forEach((chunk, i) => {
    index.insert(chunk, vectors[i] ?? []);
  });

  logger.info("index.build.done", {
    source: document.source,
    entries: index.size,
    dimension: index.dimension ?? 0,
    ms: Date.now() - startedAt
  });
  return index;
}
