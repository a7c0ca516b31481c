/**
 * Elicitation callback
 *
 * Parks elicitation/create requests in the session's ElicitationSlot until
 * the operator answers locally, then maps the free-text answer onto the
 * schema the server asked for.
 */

import { z } from "zod";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type { ElicitRequest, ElicitResult } from "@modelcontextprotocol/sdk/types.js";
import { ElicitationBusyError } from "../errors.js";
import { errorMessage, type StructuredLogger } from "../logging.js";
import type { ElicitationSlot } from "../state/elicitation-slot.js";
import type { ElicitationSchema } from "../types.js";

export type ElicitationParams = ElicitRequest["params"];

/** Field used when the server's schema declares no properties */
export const DEFAULT_ELICITATION_FIELD = "response";

const RequestedSchemaSchema = z.object({
  type: z.literal("object"),
  properties: z.record(
    z
      .object({
        type: z.string().optional(),
        title: z.string().optional(),
        description: z.string().optional(),
      })
      .passthrough()
  ),
  required: z.array(z.string()).optional(),
});

/**
 * Validate the requested schema of a form-mode elicitation.
 * Returns undefined for anything the client cannot fill from free text.
 */
export function parseRequestedSchema(value: unknown): ElicitationSchema | undefined {
  const parsed = RequestedSchemaSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

const TRUE_WORDS = /^(y|yes|true|1|on)$/i;
const FALSE_WORDS = /^(n|no|false|0|off)$/i;

function coerce(text: string, type: string | undefined): string | number | boolean {
  const trimmed = text.trim();
  switch (type) {
    case "number":
    case "integer": {
      const value = Number(trimmed);
      return trimmed !== "" && Number.isFinite(value) ? value : text;
    }
    case "boolean":
      if (TRUE_WORDS.test(trimmed)) return true;
      if (FALSE_WORDS.test(trimmed)) return false;
      return text;
    default:
      return text;
  }
}

/**
 * Put the operator's answer into the first string field of the schema
 * (or the first field, or `response`), coerced to that field's type.
 */
export function buildElicitationContent(
  schema: ElicitationSchema,
  text: string
): Record<string, string | number | boolean> {
  const entries = Object.entries(schema.properties);
  const target = entries.find(([, property]) => property.type === "string") ?? entries[0];

  if (!target) {
    return { [DEFAULT_ELICITATION_FIELD]: text };
  }

  const [field, property] = target;
  return { [field]: coerce(text, property.type) };
}

export class ElicitationHandler {
  public readonly kind = "elicitation";
  private readonly slot: ElicitationSlot;
  private readonly logger?: StructuredLogger;

  constructor(slot: ElicitationSlot, logger?: StructuredLogger) {
    this.slot = slot;
    this.logger = logger;
  }

  public async handle(params: ElicitationParams, signal?: AbortSignal): Promise<ElicitResult> {
    const schema = parseRequestedSchema(
      "requestedSchema" in params ? params.requestedSchema : undefined
    );

    if (!schema) {
      this.logger?.warn("elicitation_unsupported", { message: params.message });
      return { action: "decline" };
    }

    try {
      const reply = await this.slot.acquire(params.message, schema, signal);
      if (reply.action === "cancel") {
        return { action: "cancel" };
      }
      return { action: "accept", content: buildElicitationContent(schema, reply.text) };
    } catch (err) {
      if (err instanceof ElicitationBusyError) {
        throw new McpError(ErrorCode.InvalidRequest, err.message);
      }
      throw new McpError(ErrorCode.InternalError, `Elicitation failed: ${errorMessage(err)}`);
    }
  }
}
