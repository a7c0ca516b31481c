/**
 * Shared types for the MCP primitives client
 */

import type { Tool } from "@modelcontextprotocol/sdk/types.js";

/**
 * A filesystem boundary the server may reference
 */
export interface Root {
  /** file:// URI of the directory */
  readonly uri: string;
  /** Human-readable label */
  readonly name: string;
}

/**
 * A tool advertised by the server
 */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: Tool["inputSchema"];
}

/**
 * Session connection status
 */
export type SessionStatus = "connecting" | "connected" | "disconnected" | "closed";

/**
 * How a second elicitation request is handled while one is outstanding
 */
export type ElicitationPolicy = "queue" | "reject";

/**
 * Unwrapped payload of a successful tool call
 */
export type ToolPayload =
  | { kind: "text"; text: string }
  | { kind: "structured"; data: unknown }
  | { kind: "empty" };

/**
 * Why a tool call did not succeed.
 * `tool` - the tool ran and reported an error (isError)
 * `protocol` - the server answered with a JSON-RPC error
 */
export interface ToolFailure {
  source: "tool" | "protocol";
  message: string;
  code?: number;
}

export type ToolInvocationResult =
  | { ok: true; toolName: string; payload: ToolPayload }
  | { ok: false; toolName: string; error: ToolFailure };

/**
 * Options for a single remote call
 */
export interface CallOptions {
  /** Caller-level timeout for this call (ms) */
  timeoutMs?: number;
}

/**
 * Public view of the elicitation currently awaiting an answer
 */
export interface PendingElicitation {
  requestId: string;
  prompt: string;
  requestedSchema: ElicitationSchema;
  receivedAt: Date;
}

/**
 * The subset of an elicitation's requested schema the client relies on
 */
export interface ElicitationSchema {
  type: "object";
  properties: Record<string, { type?: string; title?: string; description?: string }>;
  required?: string[];
}

/**
 * Minimal tool-calling surface shared by the session and its test doubles
 */
export interface ToolInvoker {
  listTools(options?: { forceRefresh?: boolean }): Promise<readonly ToolDescriptor[]>;
  callTool(
    name: string,
    args?: Record<string, unknown>,
    options?: CallOptions
  ): Promise<ToolInvocationResult>;
}
