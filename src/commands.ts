/**
 * Interactive shell commands.
 *
 * Parsing is kept apart from the shell so it can be exercised without a
 * terminal or a running server.
 */

export type ShellCommand =
  | { kind: "tools" }
  | { kind: "refresh" }
  | { kind: "call"; tool: string; args: Record<string, unknown> }
  | { kind: "ask"; text: string }
  | { kind: "search"; text: string }
  | { kind: "roots" }
  | { kind: "pending" }
  | { kind: "reply"; text: string }
  | { kind: "cancel" }
  | { kind: "history" }
  | { kind: "help" }
  | { kind: "quit" }
  | { kind: "empty" }
  | { kind: "invalid"; message: string };

/** Commands that are accepted while a call is still in flight */
export const WHILE_BUSY: ReadonlySet<ShellCommand["kind"]> = new Set([
  "pending",
  "reply",
  "cancel",
  "help",
  "quit",
]);

export const HELP_TEXT = [
  "Commands:",
  "  tools                 list the cached tool catalog",
  "  refresh               re-fetch the tool catalog",
  "  call <tool> [json]    call a tool with JSON arguments",
  "  ask <text>            let the model pick and call a tool",
  "  search <text>         search for articles",
  "  roots                 show the declared roots",
  "  pending               show the elicitation awaiting an answer",
  "  reply <text>          answer the pending elicitation",
  "  cancel                decline the pending elicitation",
  "  history               show recent requests",
  "  help, ?               show this list",
  "  quit, exit            exit",
].join("\n");

function splitFirst(line: string): [string, string] {
  const match = /^(\S+)\s*([\s\S]*)$/.exec(line);
  return match ? [match[1] ?? "", (match[2] ?? "").trim()] : ["", ""];
}

function parseCallArgs(raw: string): Record<string, unknown> | string {
  if (!raw) {
    return {};
  }
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    return `Arguments are not valid JSON: ${err instanceof Error ? err.message : String(err)}`;
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return "Arguments must be a JSON object";
  }
  return Object.fromEntries(Object.entries(value));
}

function requireText(kind: "ask" | "search" | "reply", text: string): ShellCommand {
  return text ? { kind, text } : { kind: "invalid", message: `Usage: ${kind} <text>` };
}

export function parseCommand(line: string): ShellCommand {
  const [word, rest] = splitFirst(line.trim());

  switch (word.toLowerCase()) {
    case "":
      return { kind: "empty" };
    case "tools":
      return { kind: "tools" };
    case "refresh":
      return { kind: "refresh" };
    case "call": {
      const [tool, json] = splitFirst(rest);
      if (!tool) {
        return { kind: "invalid", message: "Usage: call <tool> [json]" };
      }
      const args = parseCallArgs(json);
      return typeof args === "string" ? { kind: "invalid", message: args } : { kind: "call", tool, args };
    }
    case "ask":
      return requireText("ask", rest);
    case "search":
      return requireText("search", rest);
    case "roots":
      return { kind: "roots" };
    case "pending":
      return { kind: "pending" };
    case "reply":
      return requireText("reply", rest);
    case "cancel":
      return { kind: "cancel" };
    case "history":
      return { kind: "history" };
    case "help":
    case "?":
      return { kind: "help" };
    case "quit":
    case "exit":
      return { kind: "quit" };
    default:
      return { kind: "invalid", message: `Unknown command '${word}'. Type 'help' for a list.` };
  }
}
