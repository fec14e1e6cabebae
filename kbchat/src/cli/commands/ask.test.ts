import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { loadSettings } from "../../config/settings.js";
import { LangChainEmbedder } from "../../embedding/embedder.js";
import { ErrorCode, GenerationError } from "../../errors.js";
import { silentLogger } from "../../logging/logger.js";
import type { AnswerGenerator } from "../../rag/answerGenerator.js";
import type { Backends } from "../../rag/runtime.js";
import { FunctionEmbeddings, InMemoryLoader } from "../../testing/fakes.js";
import { runAskCommand } from "./ask.js";

const settings = loadSettings({
  KBCHAT_DOCUMENT_PATH: "guide.md",
  KBCHAT_CHUNK_SIZE: "40",
  KBCHAT_CHUNK_OVERLAP: "0",
  KBCHAT_LOG_LEVEL: "silent"
});

function backends(generator: AnswerGenerator): Backends {
  return {
    logger: silentLogger,
    loader: new InMemoryLoader({ "guide.md": "Reset: hold the back button ten seconds." }),
    embedder: new LangChainEmbedder({
      embeddings: new FunctionEmbeddings(() => [1, 0]),
      model: "test-embed",
      timeoutMs: 1000
    }),
    generator
  };
}

const answering: AnswerGenerator = { generate: async () => "Hold the back button." };
const failing: AnswerGenerator = {
  generate: async () => {
    throw new GenerationError("Failed to generate an answer: model down");
  }
};

let stdout: string[];
let stderr: string[];

beforeEach(() => {
  stdout = [];
  stderr = [];
  vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
    stdout.push(String(chunk));
    return true;
  });
  vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
    stderr.push(String(chunk));
    return true;
  });
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

describe("runAskCommand", () => {
  it("prints the answer", async () => {
    await runAskCommand(["how", "to", "reset"], settings, { json: false }, backends(answering));

    expect(stdout).toEqual(["Hold the back button.\n"]);
    expect(stderr).toEqual([]);
    expect(process.exitCode).toBeUndefined();
  });

  it("prints the response as JSON", async () => {
    await runAskCommand(["how", "to", "reset"], settings, { json: true }, backends(answering));

    expect(stdout).toEqual(['{"answer":"Hold the back button.","contextFound":true}\n']);
  });

  it("prints failures to stderr and exits with 1", async () => {
    await runAskCommand(["how", "to", "reset"], settings, { json: false }, backends(failing));

    expect(stdout).toEqual([]);
    expect(stderr).toEqual(["Failed to generate an answer: model down\n"]);
    expect(process.exitCode).toBe(1);
  });

  it("prints JSON failures to stdout and exits with 1", async () => {
    await runAskCommand(["how", "to", "reset"], settings, { json: true }, backends(failing));

    expect(stdout).toEqual([
      `${JSON.stringify({ error: "Failed to generate an answer: model down", code: ErrorCode.GENERATION_FAILED })}\n`
    ]);
    expect(process.exitCode).toBe(1);
  });

  it("requires a question", async () => {
    await expect(runAskCommand([" "], settings, { json: false }, backends(answering))).rejects.toThrow(
      "Usage: kbchat ask [--json] <question>"
    );
  });
});
