import { Embeddings } from "@langchain/core/embeddings";
import { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { AIMessage, type BaseMessage } from "@langchain/core/messages";
import type { ChatResult } from "@langchain/core/outputs";

import type { DocumentLoader } from "../loaders/documentLoader.js";
import type { SourceDocument } from "../retrieval/types.js";

/** Embeddings computed by a plain function, counting every text embedded. */
export class FunctionEmbeddings extends Embeddings {
  embedded = 0;

  constructor(private readonly fn: (text: string) => number[] | Promise<number[]>) {
    super({});
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    this.embedded += texts.length;
    return Promise.all(texts.map((t) => this.fn(t)));
  }

  async embedQuery(text: string): Promise<number[]> {
    this.embedded += 1;
    return this.fn(text);
  }
}

/** Chat model that records the messages it receives. */
export class RecordingChatModel extends BaseChatModel {
  readonly calls: BaseMessage[][] = [];

  constructor(private readonly reply: (messages: BaseMessage[]) => string | Promise<string>) {
    super({});
  }

  _llmType(): string {
    return "recording";
  }

  async _generate(messages: BaseMessage[]): Promise<ChatResult> {
    this.calls.push(messages);
    const text = await this.reply(messages);
    return { generations: [{ text, message: new AIMessage(text) }] };
  }
}

export class InMemoryLoader implements DocumentLoader {
  loads = 0;

  constructor(private readonly documents: Record<string, string>) {}

  set(source: string, text: string): void {
    this.documents[source] = text;
  }

  async load(source: string): Promise<SourceDocument> {
    this.loads += 1;
    const text = this.documents[source];
    if (text === undefined) {
      throw new Error(`no document ${source}`);
    }
    return { source, text };
  }
}

/** Deferred promise for holding a fake backend mid-call. */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
