/**
 * Request Tracker
 *
 * Tracks every request the session sends or services (tool calls, catalog
 * listings, server callbacks) for the CLI's history view. Each request has a
 * lifecycle: started -> completed/failed/timeout
 */

import { ulid } from "ulid";
import type { StructuredLogger } from "./logging.js";

/**
 * Request status
 */
export type RequestStatus = "pending" | "completed" | "failed" | "timeout";

/**
 * Request type - what kind of operation.
 * The first four are sent by the client; the rest are callbacks
 * initiated by the server.
 */
export type RequestType =
  | "tool_list"
  | "tool_call"
  | "resource_list"
  | "resource_read"
  | "roots"
  | "sampling"
  | "elicitation";

/**
 * A tracked request
 */
export interface TrackedRequest {
  /** Unique request ID */
  requestId: string;
  /** Type of request */
  type: RequestType;
  /** Name of the operation (tool name, resource URI, etc.) */
  name: string;
  /** When the request started */
  startedAt: Date;
  /** When the request completed/failed */
  endedAt?: Date;
  /** Duration in milliseconds */
  durationMs?: number;
  /** Current status */
  status: RequestStatus;
  /** Error message if failed */
  error?: string;
  /** Result summary (truncated for large results) */
  resultSummary?: string;
}

/**
 * Configuration for RequestTracker
 */
export interface RequestTrackerConfig {
  /** Maximum requests to keep (default: 200) */
  maxRequests: number;
  /** Maximum length of a result summary (default: 200) */
  maxSummaryLength: number;
  /** Logger for debug output */
  logger?: StructuredLogger;
}

const DEFAULT_CONFIG: RequestTrackerConfig = {
  maxRequests: 200,
  maxSummaryLength: 200,
};

export class RequestTracker {
  // Map preserves insertion order, which is start order
  private readonly requests = new Map<string, TrackedRequest>();
  private readonly config: RequestTrackerConfig;
  private readonly logger?: StructuredLogger;

  constructor(config: Partial<RequestTrackerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = config.logger;
  }

  /**
   * Start tracking a new request.
   */
  public startRequest(type: RequestType, name: string): string {
    const requestId = ulid();
    this.requests.set(requestId, {
      requestId,
      type,
      name,
      startedAt: new Date(),
      status: "pending",
    });

    this.logger?.debug("request_started", { requestId, type, name });

    this.enforceLimit();
    return requestId;
  }

  /**
   * Mark a request as completed.
   */
  public completeRequest(requestId: string, resultSummary?: string): void {
    const request = this.finish(requestId, "completed");
    if (!request) return;

    if (resultSummary !== undefined) {
      request.resultSummary = this.truncate(resultSummary);
    }

    this.logger?.debug("request_completed", {
      requestId,
      type: request.type,
      name: request.name,
      durationMs: request.durationMs,
    });
  }

  /**
   * Mark a request as failed.
   */
  public failRequest(requestId: string, error: string): void {
    const request = this.finish(requestId, "failed");
    if (!request) return;

    request.error = error;

    this.logger?.debug("request_failed", {
      requestId,
      type: request.type,
      name: request.name,
      durationMs: request.durationMs,
      error,
    });
  }

  /**
   * Mark a request as timed out.
   */
  public timeoutRequest(requestId: string): void {
    const request = this.finish(requestId, "timeout");
    if (!request) return;

    this.logger?.debug("request_timeout", {
      requestId,
      type: request.type,
      name: request.name,
      durationMs: request.durationMs,
    });
  }

  /**
   * Get a single request by ID.
   */
  public getRequest(requestId: string): TrackedRequest | undefined {
    return this.requests.get(requestId);
  }

  /**
   * Get all tracked requests, oldest first.
   */
  public getAllRequests(): TrackedRequest[] {
    return Array.from(this.requests.values());
  }

  /**
   * Get summary statistics.
   */
  public getStats(): {
    totalRequests: number;
    byStatus: Record<RequestStatus, number>;
    byType: Partial<Record<RequestType, number>>;
  } {
    const byStatus: Record<RequestStatus, number> = {
      pending: 0,
      completed: 0,
      failed: 0,
      timeout: 0,
    };
    const byType: Partial<Record<RequestType, number>> = {};

    for (const request of this.requests.values()) {
      byStatus[request.status]++;
      byType[request.type] = (byType[request.type] ?? 0) + 1;
    }

    return {
      totalRequests: this.requests.size,
      byStatus,
      byType,
    };
  }

  public clear(): void {
    this.requests.clear();
  }

  private finish(requestId: string, status: Exclude<RequestStatus, "pending">): TrackedRequest | undefined {
    const request = this.requests.get(requestId);
    if (!request) return undefined;

    request.status = status;
    request.endedAt = new Date();
    request.durationMs = request.endedAt.getTime() - request.startedAt.getTime();
    return request;
  }

  private truncate(summary: string): string {
    const max = this.config.maxSummaryLength;
    return summary.length > max ? `${summary.slice(0, max)}…` : summary;
  }

  private enforceLimit(): void {
    // Remove oldest requests
    while (this.requests.size > this.config.maxRequests) {
      const oldest = this.requests.keys().next();
      if (oldest.done) return;
      this.requests.delete(oldest.value);
    }
  }
}
