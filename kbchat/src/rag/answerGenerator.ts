import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { AIMessage, HumanMessage, SystemMessage, type BaseMessage } from "@langchain/core/messages";

import { GenerationError, describeError } from "../errors.js";
import type { ChatTurn } from "../memory/chatHistoryStore.js";
import type { ContextBundle } from "../retrieval/types.js";
import { withTimeout } from "../utils/timeout.js";

export type GenerateInput = {
  question: string;
  context: ContextBundle;
  history: readonly ChatTurn[];
};

export interface AnswerGenerator {
  generate(input: GenerateInput): Promise<string>;
}

export function buildMessages(systemPrompt: string, input: GenerateInput): BaseMessage[] {
  return [
    new SystemMessage(systemPrompt),
    ...input.history.map((turn) =>
      turn.role === "assistant" ? new AIMessage(turn.content) : new HumanMessage(turn.content)
    ),
    new HumanMessage(`Question:\n${input.question}\n\nContext:\n${input.context.text}`)
  ];
}

export class ChatModelAnswerGenerator implements AnswerGenerator {
  private readonly model: BaseChatModel;
  private readonly systemPrompt: string;
  private readonly timeoutMs: number;

  constructor(params: { model: BaseChatModel; systemPrompt: string; timeoutMs: number }) {
    this.model = params.model;
    this.systemPrompt = params.systemPrompt;
    this.timeoutMs = params.timeoutMs;
  }

  async generate(input: GenerateInput): Promise<string> {
    const messages = buildMessages(this.systemPrompt, input);

    let answer: string;
    try {
      const result = await withTimeout("answer generation", this.timeoutMs, (signal) =>
        this.model.invoke(messages, { signal })
      );
      answer = result.text;
    } catch (err: unknown) {
      throw new GenerationError(`Failed to generate an answer: ${describeError(err)}`, err);
    }

    if (answer.trim().length === 0) {
      throw new GenerationError("The model returned an empty answer");
    }
    return answer;
  }
}
