/**
 * MCP primitives client
 *
 * Public API: connect a ToolSession to a stdio MCP server, call its tools,
 * answer its roots/sampling/elicitation callbacks, and dispatch free-text
 * requests through a language model.
 */

export { connect, ToolSession } from "./session.js";
export type { SessionLaunch, SessionOptions, TransportFactory } from "./session.js";

export * from "./errors.js";
export * from "./types.js";

export { formatToolResult, unwrapToolResult } from "./invoke.js";
export { assertCommandExists, assertPathsExist, resolveCommand } from "./launch.js";

export {
  ElicitationHandler,
  RootsHandler,
  SamplingHandler,
  buildElicitationContent,
  callbackCapabilities,
  parseRequestedSchema,
  registerCallbacks,
  samplingMessageText,
} from "./callbacks/index.js";
export type { CallbackKind, CallbackTable } from "./callbacks/index.js";

export { ElicitationSlot } from "./state/elicitation-slot.js";
export type { ElicitationReply, ElicitationSlotConfig } from "./state/elicitation-slot.js";
export { ToolCatalog } from "./state/tool-catalog.js";
export type { CatalogSnapshot, ToolFetcher } from "./state/tool-catalog.js";

export * from "./dispatch/index.js";

export { BedrockModelBackend } from "./model/bedrock-backend.js";
export type { BedrockBackendOptions } from "./model/bedrock-backend.js";
export { userPrompt } from "./model/model-backend.js";
export type {
  CompletionMessage,
  CompletionRequest,
  CompletionRole,
  ModelBackend,
} from "./model/model-backend.js";

export { ArticleAgent, ARTICLE_TOOLS, normalizeSearchResults } from "./article-agent.js";
export type { ArticleSearchHit, ArticleSearchQuery } from "./article-agent.js";

export { buildLaunchOptions, defaultRoots, loadConfig } from "./config.js";
export type { ClientConfig, ModelConfig, ServerConfig } from "./config.js";

export { RequestTracker } from "./request-tracker.js";
export type { RequestStatus, RequestType, TrackedRequest } from "./request-tracker.js";

export {
  createConsoleLogger,
  createFileLogger,
  createNullLogger,
} from "./logging.js";
export type { LogContext, LogLevel, StructuredLogger } from "./logging.js";
