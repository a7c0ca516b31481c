/**
 * Elicitation Slot
 *
 * One-slot exclusive lease over "the elicitation the operator is being asked
 * to answer". A request acquires the slot, and releases it when it is
 * answered, cancelled, timed out, abandoned by the server or shut down.
 *
 * A request arriving while the slot is held is handled per policy:
 * - "queue": it waits and is activated strictly in arrival order
 * - "reject": it fails immediately with ElicitationBusyError
 */

import { ulid } from "ulid";
import { ElicitationBusyError, UnknownRequestError } from "../errors.js";
import type { StructuredLogger } from "../logging.js";
import type { ElicitationPolicy, ElicitationSchema, PendingElicitation } from "../types.js";

/**
 * How the operator settled an elicitation
 */
export type ElicitationReply = { action: "accept"; text: string } | { action: "cancel" };

interface Lease {
  info: PendingElicitation;
  resolve: (reply: ElicitationReply) => void;
  reject: (error: Error) => void;
  /** Set while the lease holds the slot - MUST be cleared on release */
  timeoutHandle: NodeJS.Timeout | null;
}

export interface ElicitationSlotConfig {
  policy: ElicitationPolicy;
  /** How long the operator has to answer once a request is active (default: 10 minutes) */
  timeoutMs: number;
  /** Called whenever a request becomes the active one */
  onActivate?: (pending: PendingElicitation) => void;
  logger?: StructuredLogger;
}

const DEFAULT_CONFIG: ElicitationSlotConfig = {
  policy: "queue",
  timeoutMs: 10 * 60 * 1000,
};

export class ElicitationSlot {
  private readonly config: ElicitationSlotConfig;
  private readonly logger?: StructuredLogger;
  private active: Lease | null = null;
  private readonly waiting: Lease[] = [];

  constructor(config: Partial<ElicitationSlotConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = config.logger;
  }

  public get policy(): ElicitationPolicy {
    return this.config.policy;
  }

  /**
   * Acquire the slot for a new request and wait for the operator's reply.
   * Aborting `signal` withdraws the request, whether it is active or queued.
   *
   * @throws ElicitationBusyError under the reject policy when the slot is held
   */
  public acquire(
    prompt: string,
    requestedSchema: ElicitationSchema,
    signal?: AbortSignal
  ): Promise<ElicitationReply> {
    if (signal?.aborted) {
      return Promise.reject(new Error("Elicitation request was abandoned by the server"));
    }

    if (this.active && this.config.policy === "reject") {
      this.logger?.warn("elicitation_rejected_busy", {
        pendingRequestId: this.active.info.requestId,
      });
      return Promise.reject(new ElicitationBusyError(this.active.info.requestId));
    }

    return new Promise<ElicitationReply>((resolve, reject) => {
      const onAbort = (): void => {
        this.withdraw(lease);
      };
      const lease: Lease = {
        info: {
          requestId: ulid(),
          prompt,
          requestedSchema,
          receivedAt: new Date(),
        },
        resolve: (reply) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(reply);
        },
        reject: (error) => {
          signal?.removeEventListener("abort", onAbort);
          reject(error);
        },
        timeoutHandle: null,
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      if (this.active) {
        this.waiting.push(lease);
        this.logger?.info("elicitation_queued", {
          requestId: lease.info.requestId,
          position: this.waiting.length,
        });
        return;
      }

      this.activate(lease);
    });
  }

  /**
   * The request currently awaiting an answer, if any.
   */
  public current(): PendingElicitation | null {
    return this.active ? { ...this.active.info } : null;
  }

  /**
   * Number of requests waiting behind the active one.
   */
  public queuedCount(): number {
    return this.waiting.length;
  }

  /**
   * Answer the active request. Omitting the ID answers whichever is active.
   *
   * @throws UnknownRequestError if nothing is active or the ID does not match
   */
  public respond(text: string, requestId?: string): PendingElicitation {
    const lease = this.takeActive(requestId);
    lease.resolve({ action: "accept", text });
    this.logger?.info("elicitation_answered", { requestId: lease.info.requestId });
    return lease.info;
  }

  /**
   * Cancel the active request; the server is told the operator declined to answer.
   *
   * @throws UnknownRequestError if nothing is active or the ID does not match
   */
  public cancel(requestId?: string): PendingElicitation {
    const lease = this.takeActive(requestId);
    lease.resolve({ action: "cancel" });
    this.logger?.info("elicitation_cancelled", { requestId: lease.info.requestId });
    return lease.info;
  }

  /**
   * Reject the active and all waiting requests (session teardown).
   */
  public shutdown(reason: string): void {
    const leases = this.active ? [this.active, ...this.waiting] : [...this.waiting];
    this.active = null;
    this.waiting.length = 0;

    for (const lease of leases) {
      if (lease.timeoutHandle) {
        clearTimeout(lease.timeoutHandle);
      }
      lease.reject(new Error(reason));
    }
  }

  /**
   * Drop a request the server no longer waits for, wherever it sits.
   */
  private withdraw(lease: Lease): void {
    if (this.active === lease) {
      this.release(lease);
    } else {
      const index = this.waiting.indexOf(lease);
      if (index === -1) return;
      this.waiting.splice(index, 1);
    }
    this.logger?.warn("elicitation_abandoned", { requestId: lease.info.requestId });
    lease.reject(new Error("Elicitation request was abandoned by the server"));
  }

  private takeActive(requestId: string | undefined): Lease {
    const lease = this.active;
    if (!lease) {
      throw new UnknownRequestError(requestId);
    }
    if (requestId !== undefined && requestId !== lease.info.requestId) {
      throw new UnknownRequestError(requestId);
    }
    this.release(lease);
    return lease;
  }

  private activate(lease: Lease): void {
    this.active = lease;

    lease.timeoutHandle = setTimeout(() => {
      if (this.active !== lease) return;
      this.release(lease);
      this.logger?.warn("elicitation_expired", { requestId: lease.info.requestId });
      lease.reject(
        new Error(`Elicitation request timed out after ${String(this.config.timeoutMs)}ms`)
      );
    }, this.config.timeoutMs);

    this.logger?.info("elicitation_pending", {
      requestId: lease.info.requestId,
      prompt: lease.info.prompt,
    });
    this.config.onActivate?.({ ...lease.info });
  }

  /**
   * Release the slot and hand it to the next waiter.
   */
  private release(lease: Lease): void {
    if (lease.timeoutHandle) {
      clearTimeout(lease.timeoutHandle);
      lease.timeoutHandle = null;
    }
    if (this.active === lease) {
      this.active = null;
    }

    const next = this.waiting.shift();
    if (next) {
      this.activate(next);
    }
  }
}
