export type Command = "ask" | "chat" | "chunks";

export const USAGE = "Usage: kbchat <ask [--json] <question>|chat [sessionId]|chunks [documentPath]>";

export type ParsedCli = {
  command: Command;
  args: string[];
  json: boolean;
};

export function parseCli(argv: string[]): ParsedCli {
  const [, , command, ...rest] = argv;
  if (command !== "ask" && command !== "chat" && command !== "chunks") {
    throw new Error(USAGE);
  }
  return {
    command,
    args: rest.filter((a) => a !== "--json"),
    json: rest.includes("--json")
  };
}
