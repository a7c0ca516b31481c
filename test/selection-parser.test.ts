import { describe, expect, it } from "vitest";
import { extractJsonObject, parseToolDecision } from "../src/dispatch/selection-parser.js";
import { ToolSelectionParseError } from "../src/errors.js";

describe("parseToolDecision", () => {
  it("parses a bare JSON reply", () => {
    expect(parseToolDecision('{"tool_name": "search_arxiv", "arguments": {"title": "parsers"}}')).toEqual({
      toolName: "search_arxiv",
      arguments: { title: "parsers" },
    });
  });

  it("finds the decision inside a fenced block", () => {
    const reply = 'Sure, here it is:\n```json\n{"tool_name": "get_details", "arguments": {"title": "x"}}\n```\nDone.';
    expect(parseToolDecision(reply)).toEqual({ toolName: "get_details", arguments: { title: "x" } });
  });

  it("finds the decision inside prose", () => {
    const reply = 'I will call {"tool": "get_article_url", "arguments": {"title": "A {braced} title"}} now.';
    expect(parseToolDecision(reply)).toEqual({
      toolName: "get_article_url",
      arguments: { title: "A {braced} title" },
    });
  });

  it("defaults missing arguments to an empty object", () => {
    expect(parseToolDecision('{"tool_name": "list"}')).toEqual({ toolName: "list", arguments: {} });
  });

  it("skips objects that are not decisions", () => {
    const reply = 'Context: {"note": "irrelevant"} Answer: {"tool_name": "search_arxiv"}';
    expect(parseToolDecision(reply).toolName).toBe("search_arxiv");
  });

  it("fails when there is no JSON at all", () => {
    expect(() => parseToolDecision("I think you should search for it.")).toThrow(
      "Model reply contained no JSON object"
    );
  });

  it("fails when the JSON does not name a tool", () => {
    try {
      parseToolDecision('{"arguments": {"title": "x"}}');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ToolSelectionParseError);
      expect(err).toMatchObject({
        message: "Model reply contained JSON but no tool decision",
        rawResponse: '{"arguments": {"title": "x"}}',
      });
    }
  });

  it("rejects arguments that are not an object", () => {
    expect(() => parseToolDecision('{"tool_name": "x", "arguments": [1, 2]}')).toThrow(ToolSelectionParseError);
  });
});

describe("extractJsonObject", () => {
  it("returns the first object", () => {
    expect(extractJsonObject('text {"a": 1} more {"b": 2}')).toEqual({ a: 1 });
  });

  it("returns undefined for unbalanced braces", () => {
    expect(extractJsonObject('{"a": 1')).toBeUndefined();
  });
});
