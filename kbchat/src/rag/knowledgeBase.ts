import type { Embedder } from "../embedding/embedder.js";
import type { DocumentLoader } from "../loaders/documentLoader.js";
import type { Logger } from "../logging/logger.js";
import { Retriever } from "../retrieval/retriever.js";
import { VectorIndex } from "../retrieval/vectorIndex.js";
import type { SlidingWindowTextSplitter } from "../splitting/slidingWindowSplitter.js";
import { buildIndex } from "./ingest.js";

/**
 * Owns the live index for one document. Rebuilds populate a new index and
 * swap the reference only once it is complete, so a reader always holds
 * either the old or the new index in full.
 */
export class KnowledgeBase {
  private index = new VectorIndex();
  private inFlight: Promise<VectorIndex> | undefined;
  private queued: Promise<VectorIndex> | undefined;

  constructor(
    private readonly deps: {
      documentPath: string;
      loader: DocumentLoader;
      splitter: SlidingWindowTextSplitter;
      embedder: Embedder;
      logger: Logger;
    }
  ) {}

  current(): VectorIndex {
    return this.index;
  }

  /** Retriever bound to the index that is live right now. */
  retriever(defaultTopK: number): Retriever {
    return new Retriever({ embedder: this.deps.embedder, index: this.index, defaultTopK });
  }

  /**
   * Starts a rebuild, or, while one is running, queues a single follow-up
   * that reads the document again once it settles. Callers arriving while a
   * follow-up is queued share it. On failure the previous index stays live.
   */
  rebuild(): Promise<VectorIndex> {
    if (this.queued) return this.queued;
    if (!this.inFlight) return this.start();

    const settled = this.inFlight.then(
      () => undefined,
      // The running build reports its own failure to its callers.
      () => undefined
    );
    this.queued = settled.then(() => {
      this.queued = undefined;
      return this.start();
    });
    return this.queued;
  }

  private start(): Promise<VectorIndex> {
    const run: Promise<VectorIndex> = this.build().finally(() => {
      if (this.inFlight === run) this.inFlight = undefined;
    });
    this.inFlight = run;
    return run;
  }

  private async build(): Promise<VectorIndex> {
    const { documentPath, loader, splitter, embedder, logger } = this.deps;
    const document = await loader.load(documentPath);
    const next = await buildIndex({ document, splitter, embedder, logger });

    const previousSize = this.index.size;
    this.index = next;
    logger.info("index.swap", { source: documentPath, previousEntries: previousSize, entries: next.size });
    return next;
  }
}
