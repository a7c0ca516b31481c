/**
 * Tool decision parsing
 *
 * Models asked for JSON tend to wrap it in prose or code fences. This pulls
 * the first JSON object that is a valid decision out of the reply. All the
 * heuristics live here so the dispatch loop only sees a decision or an error.
 */

import { z } from "zod";
import { ToolSelectionParseError } from "../errors.js";

export interface ToolDecision {
  toolName: string;
  arguments: Record<string, unknown>;
}

const ToolDecisionSchema = z
  .object({
    tool_name: z.string().min(1).optional(),
    tool: z.string().min(1).optional(),
    arguments: z.record(z.unknown()).optional(),
  })
  .refine((value) => value.tool_name !== undefined || value.tool !== undefined, {
    message: "tool_name is required",
  });

const FENCE_PATTERN = /```[a-zA-Z]*\s*\n?([\s\S]*?)```/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Index of the brace closing the object that opens at `start`, or -1.
 * Braces inside string literals are ignored.
 */
function findClosingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

/**
 * Every JSON object embedded in `text`, in order of where it starts.
 */
function* jsonObjectsIn(text: string): Generator<Record<string, unknown>> {
  let index = text.indexOf("{");
  while (index !== -1) {
    const end = findClosingBrace(text, index);
    if (end !== -1) {
      try {
        const value: unknown = JSON.parse(text.slice(index, end + 1));
        if (isPlainObject(value)) {
          yield value;
        }
      } catch {
        // Not JSON at this brace; try the next one
      }
    }
    index = text.indexOf("{", index + 1);
  }
}

/**
 * Candidate objects: fenced blocks first, then the raw text.
 */
function* candidates(text: string): Generator<Record<string, unknown>> {
  for (const match of text.matchAll(FENCE_PATTERN)) {
    yield* jsonObjectsIn(match[1] ?? "");
  }
  yield* jsonObjectsIn(text);
}

/**
 * Extract the first JSON object embedded in a model reply.
 */
export function extractJsonObject(text: string): Record<string, unknown> | undefined {
  const first = candidates(text).next();
  return first.done ? undefined : first.value;
}

/**
 * Parse a tool-selection reply into a decision.
 *
 * @throws ToolSelectionParseError when no embedded object names a tool
 */
export function parseToolDecision(text: string): ToolDecision {
  let sawObject = false;

  for (const candidate of candidates(text)) {
    sawObject = true;
    const parsed = ToolDecisionSchema.safeParse(candidate);
    if (!parsed.success) {
      continue;
    }
    const toolName = parsed.data.tool_name ?? parsed.data.tool;
    if (toolName === undefined) {
      continue;
    }
    return { toolName, arguments: parsed.data.arguments ?? {} };
  }

  throw new ToolSelectionParseError(
    sawObject
      ? "Model reply contained JSON but no tool decision"
      : "Model reply contained no JSON object",
    text
  );
}
