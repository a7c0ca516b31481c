/**
 * Article Agent
 *
 * Typed wrappers over the article-repository tool server's tools. Search
 * results come back in a few shapes depending on the server version; they
 * are normalized into a flat list of hits here.
 */

import { formatToolResult } from "./invoke.js";
import type { CallOptions, ToolInvocationResult, ToolInvoker, ToolPayload } from "./types.js";

export const ARTICLE_TOOLS = {
  search: "search_arxiv",
  details: "get_details",
  url: "get_article_url",
  download: "download_article",
  loadToContext: "load_article_to_context",
} as const;

export interface ArticleSearchQuery {
  /** Match any field */
  allFields?: string;
  title?: string;
  author?: string;
  abstract?: string;
  /** Result offset for paging */
  start?: number;
}

/**
 * One search hit: usually `title` plus whatever details the server returns,
 * or `{ error }` when the search failed.
 */
export type ArticleSearchHit = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toHit(value: unknown): ArticleSearchHit {
  return isRecord(value) ? value : { result: value };
}

/**
 * Flatten a search payload into hits.
 *
 * - `{ "<title>": { ...details } }` becomes `[{ title, ...details }]`
 * - arrays pass through
 * - text that is not JSON becomes a single `{ error }` hit, since the
 *   server only answers in prose when a search fails
 */
export function normalizeSearchResults(payload: ToolPayload): ArticleSearchHit[] {
  switch (payload.kind) {
    case "empty":
      return [];
    case "text": {
      const text = payload.text.trim();
      if (!text) return [];
      return [{ error: text }];
    }
    case "structured": {
      const data = payload.data;
      if (Array.isArray(data)) {
        return data.map(toHit);
      }
      if (!isRecord(data)) {
        return [toHit(data)];
      }
      if (typeof data["error"] === "string") {
        return [{ error: data["error"] }];
      }
      const entries = Object.entries(data);
      if (entries.length > 0 && entries.every(([, details]) => isRecord(details))) {
        return entries.map(([title, details]) => ({ title, ...(isRecord(details) ? details : {}) }));
      }
      return [data];
    }
  }
}

export class ArticleAgent {
  private readonly invoker: ToolInvoker;

  constructor(invoker: ToolInvoker) {
    this.invoker = invoker;
  }

  /**
   * Names of the tools the server advertises.
   */
  public async listAvailableTools(): Promise<string[]> {
    const tools = await this.invoker.listTools();
    return tools.map((tool) => tool.name).filter((name) => name.length > 0);
  }

  public async searchArticles(
    query: ArticleSearchQuery,
    options?: CallOptions
  ): Promise<ArticleSearchHit[]> {
    const args: Record<string, unknown> = {};
    if (query.allFields) args["all_fields"] = query.allFields;
    if (query.title) args["title"] = query.title;
    if (query.author) args["author"] = query.author;
    if (query.abstract) args["abstract"] = query.abstract;
    if (query.start) args["start"] = query.start;

    const result = await this.invoker.callTool(ARTICLE_TOOLS.search, args, options);
    if (!result.ok) {
      return [{ error: formatToolResult(result) }];
    }
    return normalizeSearchResults(result.payload);
  }

  public getDetails(title: string, options?: CallOptions): Promise<ToolInvocationResult> {
    return this.invoker.callTool(ARTICLE_TOOLS.details, { title }, options);
  }

  public getArticleUrl(title: string, options?: CallOptions): Promise<ToolInvocationResult> {
    return this.invoker.callTool(ARTICLE_TOOLS.url, { title }, options);
  }

  public downloadArticle(title: string, options?: CallOptions): Promise<ToolInvocationResult> {
    return this.invoker.callTool(ARTICLE_TOOLS.download, { title }, options);
  }

  public loadArticleToContext(title: string, options?: CallOptions): Promise<ToolInvocationResult> {
    return this.invoker.callTool(ARTICLE_TOOLS.loadToContext, { title }, options);
  }
}
