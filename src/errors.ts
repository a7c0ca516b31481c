/**
 * Error taxonomy
 *
 * Every error the client raises derives from ClientError and carries a
 * `kind` (what layer failed) and `retriable` (whether the caller may simply
 * try again). `describeFailure` turns any of them into a message for the
 * person at the keyboard.
 */

import type { ToolFailure } from "./types.js";

export type ClientErrorKind =
  | "connection"
  | "handshake"
  | "transport"
  | "unknown_tool"
  | "unknown_request"
  | "elicitation_busy"
  | "upstream_model"
  | "tool_selection_parse"
  | "tool_selection_invalid"
  | "tool_execution"
  | "config";

export abstract class ClientError extends Error {
  abstract readonly kind: ClientErrorKind;
  abstract readonly retriable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ============================================================================
// Session / transport
// ============================================================================

/**
 * The tool server could not be started or reached. Fatal to the session.
 */
export class ConnectionError extends ClientError {
  readonly kind = "connection";
  readonly retriable = false;

  constructor(
    message: string,
    public readonly command: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * The tool server started but protocol negotiation did not complete.
 */
export class HandshakeError extends ClientError {
  readonly kind = "handshake";
  readonly retriable = false;

  constructor(
    message: string,
    public readonly timedOut: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type TransportFailureReason = "closed" | "timeout" | "send_failed";

/**
 * The channel failed while a request was outstanding.
 */
export class TransportError extends ClientError {
  readonly kind = "transport";
  readonly retriable = true;

  constructor(
    message: string,
    public readonly reason: TransportFailureReason,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

// ============================================================================
// Local validation
// ============================================================================

export class UnknownToolError extends ClientError {
  readonly kind = "unknown_tool";
  readonly retriable = false;

  constructor(public readonly toolName: string) {
    super(`Unknown tool '${toolName}'`);
  }
}

export class UnknownRequestError extends ClientError {
  readonly kind = "unknown_request";
  readonly retriable = false;

  constructor(public readonly requestId: string | undefined) {
    super(
      requestId === undefined
        ? "No elicitation request is pending"
        : `Elicitation request '${requestId}' is not the pending request`
    );
  }
}

/**
 * A second elicitation arrived while one was outstanding under the
 * reject policy.
 */
export class ElicitationBusyError extends ClientError {
  readonly kind = "elicitation_busy";
  readonly retriable = false;

  constructor(public readonly pendingRequestId: string) {
    super(`Elicitation request '${pendingRequestId}' is still awaiting a response`);
  }
}

// ============================================================================
// Language model
// ============================================================================

export class UpstreamModelError extends ClientError {
  readonly kind = "upstream_model";
  readonly retriable = true;

  constructor(
    message: string,
    public readonly modelId: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

// ============================================================================
// Dispatch loop
// ============================================================================

export class ToolSelectionParseError extends ClientError {
  readonly kind = "tool_selection_parse";
  readonly retriable = true;

  constructor(
    message: string,
    public readonly rawResponse: string
  ) {
    super(message);
  }
}

export class ToolSelectionInvalidError extends ClientError {
  readonly kind = "tool_selection_invalid";
  readonly retriable = true;

  constructor(
    public readonly toolName: string,
    public readonly availableTools: readonly string[]
  ) {
    super(`Model selected '${toolName}', which is not in the tool catalog`);
  }
}

/**
 * The tool ran but reported failure.
 */
export class ToolExecutionError extends ClientError {
  readonly kind = "tool_execution";
  readonly retriable = false;

  constructor(
    public readonly toolName: string,
    public readonly failure: ToolFailure
  ) {
    super(`Tool '${toolName}' failed: ${failure.message}`);
  }
}

// ============================================================================
// Configuration
// ============================================================================

export class ConfigError extends ClientError {
  readonly kind = "config";
  readonly retriable = false;

  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(message);
  }
}

// ============================================================================
// User-facing descriptions
// ============================================================================

export type FailureCategory =
  | "not_understood"
  | "tool_failed"
  | "connection_broken"
  | "model_unavailable"
  | "usage"
  | "unexpected";

export interface FailureDescription {
  category: FailureCategory;
  message: string;
}

/**
 * Classify an error by what the user should do about it.
 */
export function describeFailure(err: unknown): FailureDescription {
  if (!(err instanceof ClientError)) {
    const detail = err instanceof Error ? err.message : String(err);
    return { category: "unexpected", message: `Unexpected error: ${detail}` };
  }

  switch (err.kind) {
    case "tool_selection_parse":
    case "tool_selection_invalid":
      return {
        category: "not_understood",
        message: `Your request could not be understood (${err.message}). Try rephrasing it, or call a tool directly.`,
      };
    case "tool_execution":
      return {
        category: "tool_failed",
        message: `The tool failed: ${err.message}`,
      };
    case "connection":
    case "handshake":
    case "transport":
      return {
        category: "connection_broken",
        message: `The connection to the tool server is broken: ${err.message}. Reconnect and try again.`,
      };
    case "upstream_model":
      return {
        category: "model_unavailable",
        message: `The language model is unavailable: ${err.message}. Try again shortly.`,
      };
    case "unknown_tool":
    case "unknown_request":
    case "elicitation_busy":
    case "config":
      return { category: "usage", message: err.message };
  }
}
