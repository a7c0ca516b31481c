/**
 * Tool result unwrapping
 *
 * Turns the raw tools/call response into a ToolInvocationResult: a failure
 * when the tool flagged isError, otherwise the most useful payload the
 * response carries.
 */

import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { ToolInvocationResult, ToolPayload } from "./types.js";

type ContentBlock = CallToolResult["content"][number];

function parseJsonText(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed.startsWith("{") && !trimmed.startsWith("[")) {
    return undefined;
  }
  try {
    const value: unknown = JSON.parse(trimmed);
    return value;
  } catch {
    return undefined;
  }
}

function blockPayload(block: ContentBlock): ToolPayload {
  switch (block.type) {
    case "text": {
      const data = parseJsonText(block.text);
      return data === undefined ? { kind: "text", text: block.text } : { kind: "structured", data };
    }
    case "image":
    case "audio":
      return {
        kind: "structured",
        data: { type: block.type, mimeType: block.mimeType, data: block.data },
      };
    case "resource":
      return { kind: "structured", data: { type: "resource", resource: block.resource } };
    case "resource_link":
      return {
        kind: "structured",
        data: { type: "resource_link", uri: block.uri, name: block.name },
      };
    default:
      return { kind: "structured", data: block };
  }
}

function textOf(content: CallToolResult["content"]): string {
  return content
    .map((block) => (block.type === "text" ? block.text : ""))
    .filter((text) => text.length > 0)
    .join("\n");
}

/**
 * Classify a tools/call response.
 *
 * Order of preference for successful results:
 * structuredContent, then the first content block (JSON text is parsed),
 * then empty.
 */
export function unwrapToolResult(toolName: string, raw: unknown): ToolInvocationResult {
  // Pre-2024-11-05 servers answer with { toolResult }
  if (typeof raw === "object" && raw !== null && "toolResult" in raw && !("content" in raw)) {
    return { ok: true, toolName, payload: { kind: "structured", data: raw.toolResult } };
  }

  const parsed = CallToolResultSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      toolName,
      error: { source: "protocol", message: "Malformed tool result" },
    };
  }

  const result = parsed.data;

  if (result.isError) {
    return {
      ok: false,
      toolName,
      error: { source: "tool", message: textOf(result.content) || "Tool reported an error" },
    };
  }

  if (result.structuredContent !== undefined) {
    return { ok: true, toolName, payload: { kind: "structured", data: result.structuredContent } };
  }

  const first = result.content[0];
  if (!first) {
    return { ok: true, toolName, payload: { kind: "empty" } };
  }
  return { ok: true, toolName, payload: blockPayload(first) };
}

/**
 * Render a result as plain text, for narration prompts and the CLI.
 */
export function formatToolResult(result: ToolInvocationResult): string {
  if (!result.ok) {
    return `Error (${result.error.source}): ${result.error.message}`;
  }
  switch (result.payload.kind) {
    case "text":
      return result.payload.text;
    case "structured":
      return JSON.stringify(result.payload.data, null, 2);
    case "empty":
      return "(no content returned)";
  }
}
