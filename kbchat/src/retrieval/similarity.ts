import { DimensionMismatchError } from "../errors.js";
import type { Embedding } from "./types.js";

export function dotProduct(a: Embedding, b: Embedding): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }
  let dot = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return dot;
}

/** Scales to unit length. A zero vector stays zero, so it scores 0 against everything. */
export function normalize(v: Embedding): number[] {
  const norm = Math.sqrt(dotProduct(v, v));
  if (norm === 0) return v.map(() => 0);
  return v.map((x) => x / norm);
}
