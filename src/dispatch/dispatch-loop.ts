/**
 * Natural-Language Dispatch Loop
 *
 * Turns free text into one tool call:
 *
 *   idle -> selecting_tool -> invoking -> explaining -> idle
 *                  \               \
 *                   `-> failed      `-> failed
 *
 * Selection and invocation failures end the request with the error. Narration
 * is best-effort: if the model cannot explain the result, the raw result is
 * returned instead.
 */

import { ToolExecutionError, ToolSelectionInvalidError } from "../errors.js";
import { formatToolResult } from "../invoke.js";
import { createNullLogger, errorMessage, type StructuredLogger } from "../logging.js";
import type { ModelBackend } from "../model/model-backend.js";
import type { ToolInvocationResult, ToolInvoker, ToolPayload } from "../types.js";
import { buildNarrationPrompt, buildSelectionPrompt } from "./prompts.js";
import { parseToolDecision } from "./selection-parser.js";

export type DispatchState = "idle" | "selecting_tool" | "invoking" | "explaining" | "failed";

export interface DispatchOutcome {
  toolName: string;
  arguments: Record<string, unknown>;
  payload: ToolPayload;
  /** Text for the user: the model's narration, or the raw result as a fallback */
  narration: string;
  /** False when narration failed and `narration` is the raw result */
  narrated: boolean;
}

export interface DispatchLoopOptions {
  invoker: ToolInvoker;
  model: ModelBackend;
  logger?: StructuredLogger;
  /** Timeout passed to the tool call */
  callTimeoutMs?: number;
  /** Token budget for the tool-selection reply (default: 512) */
  selectionMaxTokens?: number;
  /** Token budget for the narration (default: 1024) */
  narrationMaxTokens?: number;
  onStateChange?: (state: DispatchState, previous: DispatchState) => void;
}

export class DispatchLoop {
  private readonly invoker: ToolInvoker;
  private readonly model: ModelBackend;
  private readonly logger: StructuredLogger;
  private readonly options: DispatchLoopOptions;
  private state: DispatchState = "idle";

  constructor(options: DispatchLoopOptions) {
    this.invoker = options.invoker;
    this.model = options.model;
    this.logger = options.logger ?? createNullLogger();
    this.options = options;
  }

  public getState(): DispatchState {
    return this.state;
  }

  /**
   * Dispatch one user request.
   *
   * @throws ToolSelectionParseError / ToolSelectionInvalidError if no usable tool choice came back
   * @throws ToolExecutionError if the tool reported failure
   * @throws whatever the model backend or session threw while selecting or invoking
   */
  public async run(userText: string): Promise<DispatchOutcome> {
    if (this.state !== "idle" && this.state !== "failed") {
      throw new Error(`Dispatch already in progress (state: ${this.state})`);
    }

    this.transition("selecting_tool");
    try {
      const tools = await this.invoker.listTools();
      const reply = await this.model.complete(
        buildSelectionPrompt(tools, userText, this.options.selectionMaxTokens ?? 512)
      );
      const decision = parseToolDecision(reply);

      if (!tools.some((tool) => tool.name === decision.toolName)) {
        throw new ToolSelectionInvalidError(
          decision.toolName,
          tools.map((tool) => tool.name)
        );
      }
      this.logger.info("dispatch_tool_selected", {
        tool: decision.toolName,
        arguments: decision.arguments,
      });

      this.transition("invoking");
      const result = await this.invoker.callTool(
        decision.toolName,
        decision.arguments,
        this.options.callTimeoutMs !== undefined ? { timeoutMs: this.options.callTimeoutMs } : {}
      );
      if (!result.ok) {
        throw new ToolExecutionError(result.toolName, result.error);
      }

      this.transition("explaining");
      const { narration, narrated } = await this.narrate(
        userText,
        decision.toolName,
        decision.arguments,
        result
      );

      this.transition("idle");
      return {
        toolName: decision.toolName,
        arguments: decision.arguments,
        payload: result.payload,
        narration,
        narrated,
      };
    } catch (err) {
      this.logger.warn("dispatch_failed", { state: this.state, error: errorMessage(err) });
      this.transition("failed");
      throw err;
    }
  }

  private async narrate(
    userText: string,
    toolName: string,
    args: Record<string, unknown>,
    result: ToolInvocationResult
  ): Promise<{ narration: string; narrated: boolean }> {
    try {
      const narration = await this.model.complete(
        buildNarrationPrompt(userText, toolName, args, result, this.options.narrationMaxTokens ?? 1024)
      );
      if (narration.trim()) {
        return { narration, narrated: true };
      }
      this.logger.warn("dispatch_narration_empty", { tool: toolName });
    } catch (err) {
      this.logger.warn("dispatch_narration_failed", { tool: toolName, error: errorMessage(err) });
    }
    return { narration: formatToolResult(result), narrated: false };
  }

  private transition(next: DispatchState): void {
    const previous = this.state;
    this.state = next;
    this.options.onStateChange?.(next, previous);
  }
}
