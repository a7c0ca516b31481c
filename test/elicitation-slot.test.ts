import { afterEach, describe, expect, it, vi } from "vitest";
import { ElicitationSlot } from "../src/state/elicitation-slot.js";
import { ElicitationBusyError, UnknownRequestError } from "../src/errors.js";
import type { ElicitationSchema } from "../src/types.js";

const SCHEMA: ElicitationSchema = {
  type: "object",
  properties: { answer: { type: "string" } },
};

describe("ElicitationSlot", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("activates the first request immediately", async () => {
    const onActivate = vi.fn();
    const slot = new ElicitationSlot({ onActivate });

    const reply = slot.acquire("Name?", SCHEMA);
    const pending = slot.current();

    expect(pending?.prompt).toBe("Name?");
    expect(pending?.requestedSchema).toEqual(SCHEMA);
    expect(onActivate).toHaveBeenCalledTimes(1);

    expect(slot.respond("Ada")).toEqual(pending);
    await expect(reply).resolves.toEqual({ action: "accept", text: "Ada" });
    expect(slot.current()).toBeNull();
  });

  it("serves queued requests in arrival order", async () => {
    const slot = new ElicitationSlot({ policy: "queue" });

    const first = slot.acquire("First?", SCHEMA);
    const second = slot.acquire("Second?", SCHEMA);
    const third = slot.acquire("Third?", SCHEMA);
    expect(slot.queuedCount()).toBe(2);

    slot.respond("1");
    expect(slot.current()?.prompt).toBe("Second?");
    slot.cancel();
    expect(slot.current()?.prompt).toBe("Third?");
    slot.respond("3");

    await expect(first).resolves.toEqual({ action: "accept", text: "1" });
    await expect(second).resolves.toEqual({ action: "cancel" });
    await expect(third).resolves.toEqual({ action: "accept", text: "3" });
    expect(slot.queuedCount()).toBe(0);
  });

  it("rejects a request that arrives while busy under the reject policy", async () => {
    const slot = new ElicitationSlot({ policy: "reject" });

    const first = slot.acquire("First?", SCHEMA);
    const activeId = slot.current()?.requestId;
    const second = slot.acquire("Second?", SCHEMA);

    await expect(second).rejects.toBeInstanceOf(ElicitationBusyError);
    await expect(second).rejects.toMatchObject({ pendingRequestId: activeId });
    expect(slot.current()?.prompt).toBe("First?");
    expect(slot.queuedCount()).toBe(0);

    slot.respond("ok");
    await expect(first).resolves.toEqual({ action: "accept", text: "ok" });
  });

  it("requires the ID of the active request when one is given", async () => {
    const slot = new ElicitationSlot();
    const reply = slot.acquire("Name?", SCHEMA);

    expect(() => slot.respond("x", "other")).toThrow(UnknownRequestError);
    expect(slot.current()).not.toBeNull();

    const id = slot.current()?.requestId;
    slot.respond("Ada", id);
    await expect(reply).resolves.toEqual({ action: "accept", text: "Ada" });
  });

  it("throws when nothing is pending", () => {
    const slot = new ElicitationSlot();
    expect(() => slot.cancel()).toThrow("No elicitation request is pending");
  });

  it("expires the active request and moves on to the next", async () => {
    vi.useFakeTimers();
    const slot = new ElicitationSlot({ timeoutMs: 1000 });

    const first = slot.acquire("First?", SCHEMA);
    const second = slot.acquire("Second?", SCHEMA);
    const firstFailed = expect(first).rejects.toThrow("Elicitation request timed out after 1000ms");

    vi.advanceTimersByTime(1000);
    await firstFailed;

    expect(slot.current()?.prompt).toBe("Second?");
    slot.respond("late but fine");
    await expect(second).resolves.toEqual({ action: "accept", text: "late but fine" });
  });

  it("does not time out a request that was answered", async () => {
    vi.useFakeTimers();
    const slot = new ElicitationSlot({ timeoutMs: 1000 });

    const reply = slot.acquire("Name?", SCHEMA);
    slot.respond("Ada");
    vi.advanceTimersByTime(5000);

    await expect(reply).resolves.toEqual({ action: "accept", text: "Ada" });
  });

  it("withdraws the active request when its signal aborts and activates the next", async () => {
    const slot = new ElicitationSlot({ policy: "queue" });
    const abandoned = new AbortController();

    const first = slot.acquire("First?", SCHEMA, abandoned.signal);
    const second = slot.acquire("Second?", SCHEMA);
    const firstFailed = expect(first).rejects.toThrow("Elicitation request was abandoned by the server");

    abandoned.abort();
    await firstFailed;

    expect(slot.current()?.prompt).toBe("Second?");
    expect(slot.queuedCount()).toBe(0);
    slot.respond("still here");
    await expect(second).resolves.toEqual({ action: "accept", text: "still here" });
  });

  it("drops a queued request when its signal aborts", async () => {
    const slot = new ElicitationSlot({ policy: "queue" });
    const abandoned = new AbortController();

    const first = slot.acquire("First?", SCHEMA);
    const second = slot.acquire("Second?", SCHEMA, abandoned.signal);
    const third = slot.acquire("Third?", SCHEMA);

    abandoned.abort();
    await expect(second).rejects.toThrow("Elicitation request was abandoned by the server");
    expect(slot.current()?.prompt).toBe("First?");
    expect(slot.queuedCount()).toBe(1);

    slot.respond("1");
    expect(slot.current()?.prompt).toBe("Third?");
    slot.respond("3");
    await expect(first).resolves.toEqual({ action: "accept", text: "1" });
    await expect(third).resolves.toEqual({ action: "accept", text: "3" });
  });

  it("refuses a request whose signal has already aborted", async () => {
    const slot = new ElicitationSlot({ policy: "reject" });
    const abandoned = new AbortController();
    abandoned.abort();

    await expect(slot.acquire("Name?", SCHEMA, abandoned.signal)).rejects.toThrow(
      "Elicitation request was abandoned by the server"
    );
    expect(slot.current()).toBeNull();
  });

  it("ignores an abort after the request was answered", async () => {
    const slot = new ElicitationSlot();
    const controller = new AbortController();

    const first = slot.acquire("First?", SCHEMA, controller.signal);
    slot.respond("done");
    const second = slot.acquire("Second?", SCHEMA);
    controller.abort();

    await expect(first).resolves.toEqual({ action: "accept", text: "done" });
    expect(slot.current()?.prompt).toBe("Second?");
    slot.cancel();
    await expect(second).resolves.toEqual({ action: "cancel" });
  });

  it("rejects everything on shutdown", async () => {
    const slot = new ElicitationSlot();
    const first = slot.acquire("First?", SCHEMA);
    const second = slot.acquire("Second?", SCHEMA);
    const settled = Promise.all([
      expect(first).rejects.toThrow("Session closed"),
      expect(second).rejects.toThrow("Session closed"),
    ]);

    slot.shutdown("Session closed");

    await settled;
    expect(slot.current()).toBeNull();
    expect(slot.queuedCount()).toBe(0);
  });
});
