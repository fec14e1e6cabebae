import type { Settings } from "../config/settings.js";
import type { Embedder } from "../embedding/embedder.js";
import { createChatModel } from "../integrations/gemini/chat.js";
import { createEmbedder } from "../integrations/gemini/embeddings.js";
import { FileDocumentLoader, type DocumentLoader } from "../loaders/documentLoader.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { SlidingWindowTextSplitter } from "../splitting/slidingWindowSplitter.js";
import type { AnswerDependencies } from "./answer.js";
import { ChatModelAnswerGenerator, type AnswerGenerator } from "./answerGenerator.js";
import { KnowledgeBase } from "./knowledgeBase.js";

export type Runtime = {
  settings: Settings;
  logger: Logger;
  knowledgeBase: KnowledgeBase;
  answerDeps: AnswerDependencies;
};

export type Backends = {
  logger?: Logger;
  loader?: DocumentLoader;
  embedder?: Embedder;
  generator?: AnswerGenerator;
};

/**
 * Wires the pipeline from settings. Backends not supplied default to the
 * local file loader and the Gemini models. The index starts empty; call
 * `knowledgeBase.rebuild()` before serving.
 */
export function createRuntime(settings: Settings, backends: Backends = {}): Runtime {
  const logger = backends.logger ?? createLogger({ level: settings.logLevel });
  const embedder = backends.embedder ?? createEmbedder(settings);
  const generator =
    backends.generator ??
    new ChatModelAnswerGenerator({
      model: createChatModel(settings),
      systemPrompt: settings.systemPrompt,
      timeoutMs: settings.generationTimeoutMs
    });

  const knowledgeBase = new KnowledgeBase({
    documentPath: settings.documentPath,
    loader: backends.loader ?? new FileDocumentLoader(),
    splitter: new SlidingWindowTextSplitter({
      chunkSize: settings.chunkSize,
      chunkOverlap: settings.chunkOverlap
    }),
    embedder,
    logger
  });

  return {
    settings,
    logger,
    knowledgeBase,
    answerDeps: {
      knowledgeBase,
      generator,
      logger,
      topK: settings.topK,
      maxContextSize: settings.maxContextSize,
      noContextAnswer: settings.noContextAnswer
    }
  };
}
