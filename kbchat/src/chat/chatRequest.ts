import { z } from "zod";

import { ErrorCode, describeError, getErrorCode, getErrorMessage } from "../errors.js";
import type { ChatTurn } from "../memory/chatHistoryStore.js";
import { answerQuestion, type AnswerDependencies } from "../rag/answer.js";

const chatRequestSchema = z.object(
  {
    message: z
      .string({
        required_error: "No message provided",
        invalid_type_error: "message must be a string"
      })
      .trim()
      .min(1, "No message provided")
  },
  {
    required_error: "Request body must be a JSON object",
    invalid_type_error: "Request body must be a JSON object"
  }
);

export type ChatRequest = z.infer<typeof chatRequestSchema>;

export type ChatSuccess = {
  answer: string;
  contextFound: boolean;
};

export type ChatFailure = {
  error: string;
  code: ErrorCode;
};

export type ChatResponse = ChatSuccess | ChatFailure;

export function isChatFailure(response: ChatResponse): response is ChatFailure {
  return "error" in response;
}

/**
 * Request boundary for `{ message }`. Resolves to exactly one of an answer or
 * a typed error and never rejects. "Nothing relevant found" is an answer with
 * `contextFound: false`, not an error.
 */
export async function handleChatRequest(params: {
  body: unknown;
  history?: readonly ChatTurn[];
  deps: AnswerDependencies;
}): Promise<ChatResponse> {
  const parsed = chatRequestSchema.safeParse(params.body);
  if (!parsed.success) {
    return {
      error: parsed.error.issues[0]?.message ?? "Invalid request",
      code: ErrorCode.INVALID_REQUEST
    };
  }

  try {
    const result = await answerQuestion({
      question: parsed.data.message,
      history: params.history,
      deps: params.deps
    });
    return { answer: result.answer, contextFound: result.contextFound };
  } catch (err: unknown) {
    const code = getErrorCode(err);
    params.deps.logger.error("chat.error", { code, message: describeError(err) });
    return { error: getErrorMessage(err), code };
  }
}
