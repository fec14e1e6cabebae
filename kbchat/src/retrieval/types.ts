export type SourceDocument = {
  readonly source: string;
  readonly text: string;
};

/** A contiguous slice `[start, end)` of a source document. */
export type Chunk = {
  readonly sequence: number;
  readonly source: string;
  readonly start: number;
  readonly end: number;
  readonly text: string;
};

export type Embedding = readonly number[];

export type IndexEntry = {
  readonly chunk: Chunk;
  // unit length, or all zeros when the model returned a zero vector
  readonly vector: Embedding;
};

export type RankedResult = {
  readonly chunk: Chunk;
  readonly score: number;
  /** 1-based position in the result list. */
  readonly rank: number;
};

export type ContextBundle = {
  readonly text: string;
  readonly chunks: readonly Chunk[];
  readonly truncated: boolean;
  readonly empty: boolean;
};
