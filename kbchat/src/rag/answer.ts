import type { Logger } from "../logging/logger.js";
import type { ChatTurn } from "../memory/chatHistoryStore.js";
import type { RankedResult } from "../retrieval/types.js";
import type { AnswerGenerator } from "./answerGenerator.js";
import { assembleContext } from "./context.js";
import type { KnowledgeBase } from "./knowledgeBase.js";

export type AnswerResult = {
  answer: string;
  /** False when retrieval found nothing and the generator was not called. */
  contextFound: boolean;
  /** The ranked chunks that made it into the context. */
  sources: RankedResult[];
  truncated: boolean;
};

export type AnswerDependencies = {
  knowledgeBase: KnowledgeBase;
  generator: AnswerGenerator;
  logger: Logger;
  topK: number;
  maxContextSize: number;
  noContextAnswer: string;
};

export async function answerQuestion(params: {
  question: string;
  history?: readonly ChatTurn[];
  deps: AnswerDependencies;
}): Promise<AnswerResult> {
  const { question, deps } = params;
  const startedAt = Date.now();

  const results = await deps.knowledgeBase.retriever(deps.topK).retrieve(question);
  deps.logger.debug("retrieval.done", {
    results: results.length,
    topScore: results[0]?.score ?? null,
    sequences: results.map((r) => r.chunk.sequence)
  });

  const context = assembleContext(results, deps.maxContextSize);
  if (context.empty) {
    deps.logger.info("answer.no_context", { ms: Date.now() - startedAt });
    return { answer: deps.noContextAnswer, contextFound: false, sources: [], truncated: false };
  }

  const answer = await deps.generator.generate({
    question,
    context,
    history: params.history ?? []
  });

  const sources = results.slice(0, context.chunks.length);
  deps.logger.info("answer.done", {
    sources: sources.length,
    truncated: context.truncated,
    contextChars: context.text.length,
    ms: Date.now() - startedAt
  });
  return { answer, contextFound: true, sources, truncated: context.truncated };
}
