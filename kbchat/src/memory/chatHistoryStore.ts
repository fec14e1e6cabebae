import { promises as fs } from "node:fs";
import path from "node:path";

import { z } from "zod";

export type ChatTurn = {
  role: "user" | "assistant";
  content: string;
  at: number;
};

const turnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  at: z.number().finite()
});

const historyFileSchema = z.object({
  version: z.literal(1),
  turns: z.array(z.unknown())
});

type HistoryFile = {
  version: 1;
  turns: ChatTurn[];
};

function safeSessionId(sessionId: string): string {
  const trimmed = sessionId.trim();
  if (!trimmed) return "default";
  return trimmed.replace(/[^a-zA-Z0-9_-]/g, "_").slice(0, 200) || "default";
}

export function historyFilePath(historyDir: string, sessionId: string): string {
  return path.join(historyDir, `${safeSessionId(sessionId)}.json`);
}

/** Most recent `maxTurns` turns. A missing or unrecognised file reads as no history. */
export async function loadChatHistory(params: {
  historyDir: string;
  sessionId: string;
  maxTurns: number;
}): Promise<ChatTurn[]> {
  if (params.maxTurns <= 0) return [];

  const filePath = historyFilePath(params.historyDir, params.sessionId);
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (err && typeof err === "object" && "code" in err && err.code === "ENOENT") {
      return [];
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return [];
  }
  const file = historyFileSchema.safeParse(json);
  if (!file.success) return [];

  const turns = file.data.turns.flatMap((t) => {
    const parsed = turnSchema.safeParse(t);
    return parsed.success && parsed.data.content.trim().length > 0 ? [parsed.data] : [];
  });
  return turns.slice(-params.maxTurns);
}

export async function appendChatHistory(params: {
  historyDir: string;
  sessionId: string;
  maxTurns: number;
  turns: ChatTurn[];
}): Promise<void> {
  if (params.maxTurns <= 0) return;

  const existing = await loadChatHistory(params);
  const kept = [...existing, ...params.turns]
    .filter((t) => t.content.trim().length > 0)
    .slice(-params.maxTurns);

  const file: HistoryFile = { version: 1, turns: kept };
  await fs.mkdir(params.historyDir, { recursive: true });
  await fs.writeFile(historyFilePath(params.historyDir, params.sessionId), JSON.stringify(file), "utf-8");
}
