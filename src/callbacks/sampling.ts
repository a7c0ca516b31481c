/**
 * Sampling callback
 *
 * Serves sampling/createMessage by forwarding the server's messages to the
 * configured model backend. A backend failure is returned to the server as an
 * error response; it never escapes into the local session.
 */

import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type {
  CreateMessageRequest,
  CreateMessageResult,
  SamplingMessage,
} from "@modelcontextprotocol/sdk/types.js";
import { UpstreamModelError } from "../errors.js";
import { errorMessage, type StructuredLogger } from "../logging.js";
import type { CompletionMessage, ModelBackend } from "../model/model-backend.js";

export type SamplingParams = CreateMessageRequest["params"];

function isTextBlock(block: unknown): block is { type: "text"; text: string } {
  return (
    typeof block === "object" &&
    block !== null &&
    "type" in block &&
    block.type === "text" &&
    "text" in block &&
    typeof block.text === "string"
  );
}

/**
 * Concatenate the text blocks of a sampling message. Non-text blocks
 * (images, audio) are skipped.
 */
export function samplingMessageText(content: SamplingMessage["content"]): string {
  const blocks: readonly unknown[] = Array.isArray(content) ? content : [content];
  const parts: string[] = [];
  for (const block of blocks) {
    if (isTextBlock(block)) {
      parts.push(block.text);
    }
  }
  return parts.join("\n");
}

export class SamplingHandler {
  public readonly kind = "sampling";
  private readonly backend: ModelBackend;
  private readonly logger?: StructuredLogger;

  constructor(backend: ModelBackend, logger?: StructuredLogger) {
    this.backend = backend;
    this.logger = logger;
  }

  public async handle(params: SamplingParams): Promise<CreateMessageResult> {
    const messages: CompletionMessage[] = params.messages
      .map((message) => ({ role: message.role, text: samplingMessageText(message.content) }))
      .filter((message) => message.text.length > 0);

    if (messages.length === 0) {
      throw new McpError(ErrorCode.InvalidParams, "Sampling request contained no text content");
    }

    try {
      const text = await this.backend.complete({
        messages,
        systemPrompt: params.systemPrompt,
        maxTokens: params.maxTokens,
        temperature: params.temperature,
      });

      return {
        model: this.backend.modelId,
        role: "assistant",
        content: { type: "text", text },
        stopReason: "endTurn",
      };
    } catch (err) {
      const upstream =
        err instanceof UpstreamModelError
          ? err
          : new UpstreamModelError(errorMessage(err), this.backend.modelId, { cause: err });
      this.logger?.warn("sampling_failed", {
        model: upstream.modelId,
        error: upstream.message,
      });
      throw new McpError(ErrorCode.InternalError, `Sampling failed: ${upstream.message}`);
    }
  }
}
