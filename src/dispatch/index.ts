export { DispatchLoop } from "./dispatch-loop.js";
export type { DispatchLoopOptions, DispatchOutcome, DispatchState } from "./dispatch-loop.js";
export { buildNarrationPrompt, buildSelectionPrompt, formatCatalog } from "./prompts.js";
export { extractJsonObject, parseToolDecision } from "./selection-parser.js";
export type { ToolDecision } from "./selection-parser.js";
