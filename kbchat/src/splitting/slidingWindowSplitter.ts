import { TextSplitter } from "@langchain/textsplitters";

import { validateChunking } from "../config/settings.js";
import type { Chunk, SourceDocument } from "../retrieval/types.js";
import { codePointBoundary } from "../utils/text.js";

export type SlidingWindowSplitterParams = {
  chunkSize: number;
  chunkOverlap: number;
};

/**
 * Fixed-width character windows. Each window starts `chunkSize - chunkOverlap`
 * characters after the previous one and the last window ends at the end of
 * the text. Lengths are measured in UTF-16 code units; `lengthFunction` is
 * not consulted. A boundary that would split a surrogate pair moves back one
 * unit, except where that would leave a window empty (`chunkSize` 1), in which
 * case the window takes the whole pair.
 */
export class SlidingWindowTextSplitter extends TextSplitter {
  constructor(fields: SlidingWindowSplitterParams) {
    validateChunking(fields.chunkSize, fields.chunkOverlap);
    super({ chunkSize: fields.chunkSize, chunkOverlap: fields.chunkOverlap });
  }

  async splitText(text: string): Promise<string[]> {
    return this.windows(text).map(([start, end]) => text.slice(start, end));
  }

  splitDocument(document: SourceDocument): Chunk[] {
    return this.windows(document.text).map(([start, end], sequence) => ({
      sequence,
      source: document.source,
      start,
      end,
      text: document.text.slice(start, end)
    }));
  }

  private windows(text: string): Array<[number, number]> {
    const step = this.chunkSize - this.chunkOverlap;
    const out: Array<[number, number]> = [];
    let start = 0;
    while (start < text.length) {
      let end = codePointBoundary(text, Math.min(text.length, start + this.chunkSize));
      if (end <= start) end = start + 2;
      out.push([start, end]);
      if (end === text.length) break;

      const next = codePointBoundary(text, start + step);
      start = next > start ? next : end;
    }
    return out;
  }
}
