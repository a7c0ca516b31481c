/**
 * Callback handler table
 *
 * The server may call back into the client for roots, sampling and
 * elicitation, including while one of the client's own calls is in flight.
 * Each kind maps to one handler; registration wires them to the SDK client and
 * records every callback in the request tracker.
 */

import type { Client } from "@modelcontextprotocol/sdk/client/index.js";
import {
  CreateMessageRequestSchema,
  ElicitRequestSchema,
  ListRootsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { errorMessage } from "../logging.js";
import type { RequestTracker, RequestType } from "../request-tracker.js";
import type { ElicitationHandler } from "./elicitation.js";
import type { RootsHandler } from "./roots.js";
import type { SamplingHandler } from "./sampling.js";

export { RootsHandler } from "./roots.js";
export { SamplingHandler, samplingMessageText } from "./sampling.js";
export {
  ElicitationHandler,
  buildElicitationContent,
  parseRequestedSchema,
  DEFAULT_ELICITATION_FIELD,
} from "./elicitation.js";

export type CallbackKind = "roots" | "sampling" | "elicitation";

/**
 * Handlers by kind. Sampling is optional: without a model backend the client
 * does not advertise the capability.
 */
export interface CallbackTable {
  roots: RootsHandler;
  sampling?: SamplingHandler;
  elicitation: ElicitationHandler;
}

/**
 * Client capabilities implied by a handler table.
 */
export function callbackCapabilities(table: CallbackTable): {
  roots: { listChanged: boolean };
  sampling?: Record<string, never>;
  elicitation: { form: Record<string, never> };
} {
  return {
    roots: { listChanged: false },
    ...(table.sampling ? { sampling: {} } : {}),
    elicitation: { form: {} },
  };
}

async function tracked<T>(
  tracker: RequestTracker | undefined,
  type: RequestType,
  name: string,
  run: () => Promise<T>
): Promise<T> {
  const requestId = tracker?.startRequest(type, name);
  try {
    const result = await run();
    if (requestId) tracker?.completeRequest(requestId);
    return result;
  } catch (err) {
    if (requestId) tracker?.failRequest(requestId, errorMessage(err));
    throw err;
  }
}

/**
 * Register every handler in the table on the SDK client.
 * Must be called before the client connects.
 */
export function registerCallbacks(
  client: Client,
  table: CallbackTable,
  tracker?: RequestTracker
): void {
  client.setRequestHandler(ListRootsRequestSchema, () =>
    tracked(tracker, "roots", "roots/list", () => table.roots.handle())
  );

  const sampling = table.sampling;
  if (sampling) {
    client.setRequestHandler(CreateMessageRequestSchema, (request) =>
      tracked(tracker, "sampling", "sampling/createMessage", () => sampling.handle(request.params))
    );
  }

  client.setRequestHandler(ElicitRequestSchema, (request, extra) =>
    tracked(tracker, "elicitation", "elicitation/create", () =>
      table.elicitation.handle(request.params, extra.signal)
    )
  );
}
