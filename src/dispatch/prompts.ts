/**
 * Prompts for tool selection and result narration.
 */

import { formatToolResult } from "../invoke.js";
import { userPrompt, type CompletionRequest } from "../model/model-backend.js";
import type { ToolDescriptor, ToolInvocationResult } from "../types.js";

const SELECTION_SYSTEM_PROMPT =
  "You route user requests to tools. Pick exactly one tool from the list and " +
  "fill in its arguments from the request. Answer with JSON only.";

const NARRATION_SYSTEM_PROMPT =
  "You explain tool results to an end user. Be concise and accurate; do not " +
  "invent details that are not in the result.";

export function formatCatalog(tools: readonly ToolDescriptor[]): string {
  if (tools.length === 0) {
    return "(no tools available)";
  }
  return tools
    .map(
      (tool) =>
        `- ${tool.name}: ${tool.description || "(no description)"}\n` +
        `  parameters: ${JSON.stringify(tool.inputSchema)}`
    )
    .join("\n");
}

export function buildSelectionPrompt(
  tools: readonly ToolDescriptor[],
  userText: string,
  maxTokens: number
): CompletionRequest {
  const text = [
    "Available tools:",
    formatCatalog(tools),
    "",
    `User request: ${userText}`,
    "",
    "Reply with a single JSON object and nothing else:",
    '{"tool_name": "<one of the tool names above>", "arguments": {<arguments matching the tool parameters>}}',
  ].join("\n");

  return userPrompt(text, { systemPrompt: SELECTION_SYSTEM_PROMPT, maxTokens, temperature: 0 });
}

export function buildNarrationPrompt(
  userText: string,
  toolName: string,
  args: Record<string, unknown>,
  result: ToolInvocationResult,
  maxTokens: number
): CompletionRequest {
  const text = [
    `The user asked: ${userText}`,
    `The tool "${toolName}" was called with arguments: ${JSON.stringify(args)}`,
    "Result:",
    formatToolResult(result),
    "",
    "Explain this result to the user in plain language.",
  ].join("\n");

  return userPrompt(text, { systemPrompt: NARRATION_SYSTEM_PROMPT, maxTokens });
}
