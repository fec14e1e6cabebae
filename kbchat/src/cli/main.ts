import { loadSettings, type Env } from "../config/settings.js";
import { describeError } from "../errors.js";
import { runAskCommand } from "./commands/ask.js";
import { runChatCommand } from "./commands/chat.js";
import { runChunksCommand } from "./commands/chunks.js";
import { parseCli } from "./parse.js";

export async function main(argv: string[], env: Env = process.env): Promise<void> {
  const parsed = parseCli(argv);
  const settings = loadSettings(env);

  switch (parsed.command) {
    case "ask":
      await runAskCommand(parsed.args, settings, { json: parsed.json });
      return;
    case "chat":
      await runChatCommand(parsed.args, settings);
      return;
    case "chunks":
      await runChunksCommand(parsed.args, settings);
      return;
  }
}

/** Runs `main`, printing any failure to stderr with exit code 1. */
export async function runCli(argv: string[], env: Env = process.env): Promise<void> {
  try {
    await main(argv, env);
  } catch (err: unknown) {
    process.stderr.write(`${describeError(err)}\n`);
    process.exitCode = 1;
  }
}
