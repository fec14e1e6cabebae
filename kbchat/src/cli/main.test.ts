import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { runCli } from "./main.js";
import { USAGE } from "./parse.js";

let stderr: string[];

beforeEach(() => {
  stderr = [];
  vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
    stderr.push(String(chunk));
    return true;
  });
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

describe("runCli", () => {
  it("prints usage for an unknown command and exits with 1", async () => {
    await runCli(["node", "kbchat", "serve"], {});

    expect(stderr).toEqual([`${USAGE}\n`]);
    expect(process.exitCode).toBe(1);
  });

  it("prints configuration errors and exits with 1", async () => {
    await runCli(["node", "kbchat", "ask", "hello"], { KBCHAT_LOG_LEVEL: "loud" });

    expect(stderr).toEqual(['KBCHAT_LOG_LEVEL is not a known level (got "loud")\n']);
    expect(process.exitCode).toBe(1);
  });

  it("prints loader errors from the chunks command", async () => {
    await runCli(["node", "kbchat", "chunks", "manual.docx"], {});

    expect(stderr).toEqual([
      'Unsupported document type ".docx". Supported: .txt, .md, .markdown, .pdf\n'
    ]);
    expect(process.exitCode).toBe(1);
  });
});
