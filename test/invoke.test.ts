import { describe, expect, it } from "vitest";
import { formatToolResult, unwrapToolResult } from "../src/invoke.js";

describe("unwrapToolResult", () => {
  it("prefers structuredContent over content blocks", () => {
    const result = unwrapToolResult("lookup", {
      content: [{ type: "text", text: "ignored" }],
      structuredContent: { count: 2 },
    });
    expect(result).toEqual({ ok: true, toolName: "lookup", payload: { kind: "structured", data: { count: 2 } } });
  });

  it("keeps plain text as text", () => {
    const result = unwrapToolResult("echo", { content: [{ type: "text", text: "hello" }] });
    expect(result).toEqual({ ok: true, toolName: "echo", payload: { kind: "text", text: "hello" } });
  });

  it("parses JSON text into structured data", () => {
    const result = unwrapToolResult("list", { content: [{ type: "text", text: ' [1, 2, {"a": true}] ' }] });
    expect(result).toEqual({
      ok: true,
      toolName: "list",
      payload: { kind: "structured", data: [1, 2, { a: true }] },
    });
  });

  it("leaves text that only looks like JSON as text", () => {
    const result = unwrapToolResult("echo", { content: [{ type: "text", text: "{not json" }] });
    expect(result).toEqual({ ok: true, toolName: "echo", payload: { kind: "text", text: "{not json" } });
  });

  it("reports an empty payload when there is no content", () => {
    const result = unwrapToolResult("noop", { content: [] });
    expect(result).toEqual({ ok: true, toolName: "noop", payload: { kind: "empty" } });
  });

  it("describes non-text blocks", () => {
    const result = unwrapToolResult("render", {
      content: [{ type: "image", data: "AAAA", mimeType: "image/png" }],
    });
    expect(result).toEqual({
      ok: true,
      toolName: "render",
      payload: { kind: "structured", data: { type: "image", mimeType: "image/png", data: "AAAA" } },
    });
  });

  it("turns isError into a tool failure with the joined text", () => {
    const result = unwrapToolResult("fetch", {
      content: [
        { type: "text", text: "first problem" },
        { type: "text", text: "second problem" },
      ],
      isError: true,
    });
    expect(result).toEqual({
      ok: false,
      toolName: "fetch",
      error: { source: "tool", message: "first problem\nsecond problem" },
    });
  });

  it("uses a generic message for isError without text", () => {
    const result = unwrapToolResult("fetch", { content: [], isError: true });
    expect(result).toEqual({
      ok: false,
      toolName: "fetch",
      error: { source: "tool", message: "Tool reported an error" },
    });
  });

  it("accepts the legacy toolResult shape", () => {
    const result = unwrapToolResult("old", { toolResult: { value: 7 } });
    expect(result).toEqual({ ok: true, toolName: "old", payload: { kind: "structured", data: { value: 7 } } });
  });

  it("reports a malformed response as a protocol failure", () => {
    const result = unwrapToolResult("broken", "not a result");
    expect(result).toEqual({
      ok: false,
      toolName: "broken",
      error: { source: "protocol", message: "Malformed tool result" },
    });
  });
});

describe("formatToolResult", () => {
  it("renders each payload kind", () => {
    expect(formatToolResult({ ok: true, toolName: "t", payload: { kind: "text", text: "hi" } })).toBe("hi");
    expect(formatToolResult({ ok: true, toolName: "t", payload: { kind: "structured", data: { a: 1 } } })).toBe(
      '{\n  "a": 1\n}'
    );
    expect(formatToolResult({ ok: true, toolName: "t", payload: { kind: "empty" } })).toBe("(no content returned)");
  });

  it("renders failures with their source", () => {
    expect(
      formatToolResult({ ok: false, toolName: "t", error: { source: "tool", message: "Article not found" } })
    ).toBe("Error (tool): Article not found");
  });
});
