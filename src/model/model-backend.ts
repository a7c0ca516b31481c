/**
 * Language-model backend contract
 *
 * Both the sampling callback and the dispatch loop talk to the model through
 * this interface, so tests can script responses and the Bedrock client stays
 * in one place.
 */

export type CompletionRole = "user" | "assistant";

export interface CompletionMessage {
  role: CompletionRole;
  text: string;
}

export interface CompletionRequest {
  messages: CompletionMessage[];
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  /** Per-request timeout (ms); falls back to the backend default */
  timeoutMs?: number;
}

export interface ModelBackend {
  /** Identifier reported back to the server in sampling results */
  readonly modelId: string;
  /**
   * Generate a completion. Rejects with UpstreamModelError on failure.
   */
  complete(request: CompletionRequest): Promise<string>;
}

/**
 * Convenience for single-turn prompts.
 */
export function userPrompt(text: string, options: Omit<CompletionRequest, "messages"> = {}): CompletionRequest {
  return { ...options, messages: [{ role: "user", text }] };
}
