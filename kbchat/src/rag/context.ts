import path from "node:path";

import { MIN_CONTEXT_SIZE } from "../config/settings.js";
import { ConfigurationError } from "../errors.js";
import type { Chunk, ContextBundle, RankedResult } from "../retrieval/types.js";
import { codePointBoundary } from "../utils/text.js";

export const NO_CONTEXT_MARKER = "[no relevant documentation found]";
export const TRUNCATION_MARKER = "\n[truncated]";
export const BLOCK_SEPARATOR = "\n\n---\n\n";

/** Fewest characters of chunk text a truncated block keeps before the header is shortened. */
export const MIN_TRUNCATED_TEXT = 16;

function chunkHeader(chunk: Chunk, source: string | undefined): string {
  const label = source === undefined ? "" : ` | ${source}`;
  return `[chunk ${chunk.sequence}${label} | chars ${chunk.start}-${chunk.end}]\n`;
}

export function formatChunk(chunk: Chunk): string {
  return chunkHeader(chunk, chunk.source) + chunk.text;
}

/**
 * The top chunk cut to fit `maxContextSize`. The header falls back to the
 * file name, then to no source at all, until at least `MIN_TRUNCATED_TEXT`
 * characters of text fit beside it.
 */
function truncateChunk(chunk: Chunk, maxContextSize: number): { text: string; truncated: boolean } {
  const headers = [
    chunkHeader(chunk, chunk.source),
    chunkHeader(chunk, path.basename(chunk.source)),
    chunkHeader(chunk, undefined)
  ];
  const room = maxContextSize - TRUNCATION_MARKER.length;
  const header = headers.find((h) => h.length + MIN_TRUNCATED_TEXT <= room) ?? "";

  if (header.length + chunk.text.length <= maxContextSize) {
    return { text: header + chunk.text, truncated: false };
  }
  const keep = codePointBoundary(chunk.text, room - header.length);
  return { text: header + chunk.text.slice(0, keep) + TRUNCATION_MARKER, truncated: true };
}

/**
 * Joins ranked chunks, best first, until the next whole chunk would not fit
 * in `maxContextSize` characters. Only when the top chunk alone is too large
 * is anything cut: its header may lose the source path and its text ends
 * with the truncation marker.
 */
export function assembleContext(
  results: readonly RankedResult[],
  maxContextSize: number
): ContextBundle {
  if (!Number.isInteger(maxContextSize) || maxContextSize < MIN_CONTEXT_SIZE) {
    throw new ConfigurationError(
      `max context size must be an integer >= ${MIN_CONTEXT_SIZE} (got ${maxContextSize})`
    );
  }

  const [top] = results;
  if (!top) {
    return { text: NO_CONTEXT_MARKER, chunks: [], truncated: false, empty: true };
  }

  const topBlock = formatChunk(top.chunk);
  if (topBlock.length > maxContextSize) {
    return { ...truncateChunk(top.chunk, maxContextSize), chunks: [top.chunk], empty: false };
  }

  let text = topBlock;
  const chunks: Chunk[] = [top.chunk];
  for (const result of results.slice(1)) {
    const next = BLOCK_SEPARATOR + formatChunk(result.chunk);
    if (text.length + next.length > maxContextSize) break;
    text += next;
    chunks.push(result.chunk);
  }

  return { text, chunks, truncated: false, empty: false };
}
