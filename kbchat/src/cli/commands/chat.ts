import { createInterface } from "node:readline";

import { handleChatRequest, isChatFailure } from "../../chat/chatRequest.js";
import type { Settings } from "../../config/settings.js";
import { getErrorMessage } from "../../errors.js";
import { appendChatHistory, loadChatHistory } from "../../memory/chatHistoryStore.js";
import { createRuntime, type Backends } from "../../rag/runtime.js";

const EXIT_WORDS = new Set(["exit", "quit"]);

export type ChatIo = {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
};

/**
 * Interactive session over one index. `/reload` rebuilds the index from the
 * document while the previous one keeps answering.
 */
export async function runChatCommand(
  args: string[],
  settings: Settings,
  backends: Backends = {},
  io: ChatIo = { input: process.stdin, output: process.stdout }
): Promise<void> {
  const sessionId = args[0] ?? process.env.KBCHAT_SESSION_ID ?? "cli";
  const historyOn = settings.historyEnabled && settings.historyMaxMessages > 0;
  const historyParams = {
    historyDir: settings.historyDir,
    sessionId,
    maxTurns: settings.historyMaxMessages
  };
  const print = (line: string) => io.output.write(`${line}\n`);

  const runtime = createRuntime(settings, backends);
  await runtime.knowledgeBase.rebuild();

  const rl = createInterface({ input: io.input, output: io.output });
  print("Ask about the product. Type /reload to re-index, exit to quit.");
  rl.setPrompt("You: ");
  rl.prompt();

  // Ends when the input closes; leaving the loop closes the interface.
  for await (const raw of rl) {
    const line = raw.trim();
    if (EXIT_WORDS.has(line.toLowerCase())) break;

    if (line === "/reload") {
      try {
        const index = await runtime.knowledgeBase.rebuild();
        print(`Reloaded: ${index.size} chunk(s)`);
      } catch (err: unknown) {
        print(`Reload failed, keeping the previous index: ${getErrorMessage(err)}`);
      }
    } else if (line) {
      const history = historyOn ? await loadChatHistory(historyParams) : [];
      const response = await handleChatRequest({
        body: { message: line },
        history,
        deps: runtime.answerDeps
      });

      if (isChatFailure(response)) {
        print(`Error: ${response.error}`);
      } else {
        print(`Assistant: ${response.answer}`);
        if (historyOn) {
          await appendChatHistory({
            ...historyParams,
            turns: [
              { role: "user", content: line, at: Date.now() },
              { role: "assistant", content: response.answer, at: Date.now() }
            ]
          });
        }
      }
    }
    rl.prompt();
  }
}
