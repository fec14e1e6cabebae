import { handleChatRequest, isChatFailure } from "../../chat/chatRequest.js";
import type { Settings } from "../../config/settings.js";
import { createRuntime, type Backends } from "../../rag/runtime.js";

export async function runAskCommand(
  args: string[],
  settings: Settings,
  options: { json: boolean },
  backends: Backends = {}
): Promise<void> {
  const question = args.join(" ").trim();
  if (!question) {
    throw new Error("Usage: kbchat ask [--json] <question>");
  }

  const runtime = createRuntime(settings, backends);
  await runtime.knowledgeBase.rebuild();

  const response = await handleChatRequest({ body: { message: question }, deps: runtime.answerDeps });
  if (options.json) {
    process.stdout.write(`${JSON.stringify(response)}\n`);
  } else if (isChatFailure(response)) {
    process.stderr.write(`${response.error}\n`);
  } else {
    process.stdout.write(`${response.answer}\n`);
  }

  if (isChatFailure(response)) {
    process.exitCode = 1;
  }
}
