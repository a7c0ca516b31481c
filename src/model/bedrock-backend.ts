/**
 * Bedrock Model Backend
 *
 * Runs Anthropic models on AWS Bedrock. Credentials come from the standard
 * AWS provider chain (env vars, shared config, instance role).
 */

import AnthropicBedrock from "@anthropic-ai/bedrock-sdk";
import { UpstreamModelError } from "../errors.js";
import { errorMessage, type StructuredLogger } from "../logging.js";
import type { CompletionRequest, ModelBackend } from "./model-backend.js";

export interface BedrockBackendOptions {
  /** AWS region hosting the model */
  region: string;
  /** Bedrock model identifier */
  modelId: string;
  /** Default max tokens when the request does not set one */
  maxTokens?: number;
  /** Default temperature when the request does not set one */
  temperature?: number;
  /** Default request timeout in ms */
  timeoutMs?: number;
  logger?: StructuredLogger;
}

const DEFAULT_MAX_TOKENS = 512;
const DEFAULT_TEMPERATURE = 0.1;
const DEFAULT_TIMEOUT_MS = 60000;

export class BedrockModelBackend implements ModelBackend {
  public readonly modelId: string;
  private readonly client: AnthropicBedrock;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly logger?: StructuredLogger;

  constructor(options: BedrockBackendOptions) {
    this.modelId = options.modelId;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger;
    // Retries are left to the caller
    this.client = new AnthropicBedrock({ awsRegion: options.region, maxRetries: 0 });
  }

  public async complete(request: CompletionRequest): Promise<string> {
    const startedAt = Date.now();
    this.logger?.debug("model_request_started", {
      model: this.modelId,
      messages: request.messages.length,
    });

    try {
      const response = await this.client.messages.create(
        {
          model: this.modelId,
          max_tokens: request.maxTokens ?? this.maxTokens,
          temperature: request.temperature ?? this.temperature,
          ...(request.systemPrompt !== undefined ? { system: request.systemPrompt } : {}),
          messages: request.messages.map((message) => ({
            role: message.role,
            content: message.text,
          })),
        },
        { timeout: request.timeoutMs ?? this.timeoutMs }
      );

      const parts: string[] = [];
      for (const block of response.content) {
        if (block.type === "text") {
          parts.push(block.text);
        }
      }
      const text = parts.join("");

      this.logger?.debug("model_request_completed", {
        model: this.modelId,
        durationMs: Date.now() - startedAt,
        stopReason: response.stop_reason,
      });

      if (!text.trim()) {
        throw new UpstreamModelError("Model returned an empty completion", this.modelId);
      }
      return text;
    } catch (err) {
      if (err instanceof UpstreamModelError) {
        throw err;
      }
      this.logger?.warn("model_request_failed", {
        model: this.modelId,
        durationMs: Date.now() - startedAt,
        error: errorMessage(err),
      });
      throw new UpstreamModelError(
        `Bedrock request failed: ${errorMessage(err)}`,
        this.modelId,
        { cause: err }
      );
    }
  }
}
