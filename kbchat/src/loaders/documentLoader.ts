import { promises as fs } from "node:fs";
import path from "node:path";

import { TextLoader } from "@langchain/classic/document_loaders/fs/text";
import { PDFLoader } from "@langchain/community/document_loaders/fs/pdf";
import type { Document } from "@langchain/core/documents";
import type { BaseDocumentLoader } from "@langchain/core/document_loaders/base";

import { LoaderError, describeError } from "../errors.js";
import type { SourceDocument } from "../retrieval/types.js";

export interface DocumentLoader {
  load(source: string): Promise<SourceDocument>;
}

type LoaderFactory = (filePath: string) => BaseDocumentLoader;

const LOADERS: Record<string, LoaderFactory> = {
  ".txt": (p) => new TextLoader(p),
  ".md": (p) => new TextLoader(p),
  ".markdown": (p) => new TextLoader(p),
  ".pdf": (p) => new PDFLoader(p, { splitPages: false })
};

export const SUPPORTED_EXTENSIONS = Object.keys(LOADERS);

/** Reads a local text, Markdown or PDF file into a single document. */
export class FileDocumentLoader implements DocumentLoader {
  async load(source: string): Promise<SourceDocument> {
    const ext = path.extname(source).toLowerCase();
    const factory = LOADERS[ext];
    if (!factory) {
      throw new LoaderError(
        `Unsupported document type "${ext || source}". Supported: ${SUPPORTED_EXTENSIONS.join(", ")}`
      );
    }

    try {
      await fs.access(source);
    } catch (err: unknown) {
      throw new LoaderError(`Document not found: ${source}`, err);
    }

    let docs: Document[];
    try {
      docs = await factory(source).load();
    } catch (err: unknown) {
      throw new LoaderError(`Failed to read ${source}: ${describeError(err)}`, err);
    }

    return {
      source,
      text: docs.map((d) => d.pageContent).join("\n")
    };
  }
}
