import type { Settings } from "../../config/settings.js";
import { FileDocumentLoader } from "../../loaders/documentLoader.js";
import { SlidingWindowTextSplitter } from "../../splitting/slidingWindowSplitter.js";

const PREVIEW_LENGTH = 60;

export function previewText(text: string): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > PREVIEW_LENGTH ? `${flat.slice(0, PREVIEW_LENGTH - 3)}...` : flat;
}

/** Prints how the document would be chunked, without calling any model. */
export async function runChunksCommand(args: string[], settings: Settings): Promise<void> {
  const documentPath = args[0] ?? settings.documentPath;
  const document = await new FileDocumentLoader().load(documentPath);
  const splitter = new SlidingWindowTextSplitter({
    chunkSize: settings.chunkSize,
    chunkOverlap: settings.chunkOverlap
  });

  const chunks = splitter.splitDocument(document);
  for (const chunk of chunks) {
    process.stdout.write(`${chunk.sequence}\t${chunk.start}-${chunk.end}\t${previewText(chunk.text)}\n`);
  }
  process.stdout.write(
    `${chunks.length} chunk(s) from ${document.text.length} characters (size=${settings.chunkSize} overlap=${settings.chunkOverlap})\n`
  );
}
