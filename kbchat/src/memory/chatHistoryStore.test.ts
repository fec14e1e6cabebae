import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { appendChatHistory, historyFilePath, loadChatHistory } from "./chatHistoryStore.js";

let historyDir: string;

beforeEach(async () => {
  historyDir = await fs.mkdtemp(path.join(os.tmpdir(), "kbchat-history-"));
});

afterEach(async () => {
  await fs.rm(historyDir, { recursive: true, force: true });
});

describe("chat history store", () => {
  it("reads a missing session as empty", async () => {
    await expect(loadChatHistory({ historyDir, sessionId: "new", maxTurns: 10 })).resolves.toEqual([]);
  });

  it("appends turns and keeps only the most recent ones", async () => {
    const params = { historyDir, sessionId: "s1", maxTurns: 3 };
    await appendChatHistory({
      ...params,
      turns: [
        { role: "user", content: "q1", at: 1 },
        { role: "assistant", content: "a1", at: 2 }
      ]
    });
    await appendChatHistory({
      ...params,
      turns: [
        { role: "user", content: "q2", at: 3 },
        { role: "assistant", content: "a2", at: 4 }
      ]
    });

    await expect(loadChatHistory(params)).resolves.toEqual([
      { role: "assistant", content: "a1", at: 2 },
      { role: "user", content: "q2", at: 3 },
      { role: "assistant", content: "a2", at: 4 }
    ]);
  });

  it("drops malformed turns", async () => {
    await fs.writeFile(
      historyFilePath(historyDir, "s2"),
      JSON.stringify({
        version: 1,
        turns: [
          { role: "user", content: "kept", at: 1 },
          { role: "bot", content: "bad role", at: 2 },
          { role: "assistant", content: "   ", at: 3 },
          "not a turn"
        ]
      }),
      "utf-8"
    );

    await expect(loadChatHistory({ historyDir, sessionId: "s2", maxTurns: 10 })).resolves.toEqual([
      { role: "user", content: "kept", at: 1 }
    ]);
  });

  it("reads an unparseable file as empty", async () => {
    await fs.writeFile(historyFilePath(historyDir, "s3"), "{not json", "utf-8");
    await expect(loadChatHistory({ historyDir, sessionId: "s3", maxTurns: 10 })).resolves.toEqual([]);
  });

  it("writes nothing when the limit is zero", async () => {
    await appendChatHistory({
      historyDir,
      sessionId: "off",
      maxTurns: 0,
      turns: [{ role: "user", content: "q", at: 1 }]
    });
    await expect(fs.readdir(historyDir)).resolves.toEqual([]);
  });

  it("keeps session ids inside the history directory", () => {
    expect(historyFilePath("/var/kbchat", "../evil id")).toBe(path.join("/var/kbchat", "___evil_id.json"));
    expect(historyFilePath("/var/kbchat", "  ")).toBe(path.join("/var/kbchat", "default.json"));
  });
});
