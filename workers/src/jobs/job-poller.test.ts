/**
 * Validation Suite: job-poller
 * Resolution order, resumption, idempotence and the retry budget.
 */
import { describe, it, expect, vi } from "vitest";
import { ExternalJobPoller } from "./job-poller.js";
import type { ExternalJobSource, PollOutcome } from "./job-poller.js";
import { InMemoryJobStore } from "./job-store.js";
import { ExternalJobError, ExternalJobTimeout } from "../errors.js";
import { silentLogger } from "../logger.js";

function scriptedSource(outcomes: PollOutcome[], handle = "handle-1") {
  const submit = vi.fn(async () => handle);
  const poll = vi.fn(async (): Promise<PollOutcome> => {
    return outcomes.shift() ?? { status: "pending" };
  });
  const source: ExternalJobSource = { submit, poll };
  return { source, submit, poll };
}

function createPoller(store: InMemoryJobStore, maxAttempts = 5) {
  const sleep = vi.fn(async () => undefined);
  const poller = new ExternalJobPoller(store, {
    maxAttempts,
    intervalMs: 2000,
    sleep,
    logger: silentLogger,
  });
  return { poller, sleep };
}

describe("ExternalJobPoller", () => {
  it("should submit, persist the handle, and cache the payload", async () => {
    const store = new InMemoryJobStore();
    const persistHandle = vi.spyOn(store, "persistResumptionHandle");
    const { poller, sleep } = createPoller(store);
    const { source, submit, poll } = scriptedSource([
      { status: "pending" },
      { status: "complete", payload: { text: "done" } },
    ]);

    const result = await poller.resolve("doc-1", source);

    expect(result).toEqual({
      payload: { text: "done" },
      resolution: "submitted",
    });
    expect(submit).toHaveBeenCalledTimes(1);
    expect(persistHandle).toHaveBeenCalledWith("doc-1", "handle-1");
    expect(persistHandle.mock.invocationCallOrder[0]).toBeLessThan(
      poll.mock.invocationCallOrder[0],
    );
    expect(poll).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(2000);
    expect(await store.loadResumptionHandle("doc-1")).toBeNull();
  });

  it("should do no network work for a completed key", async () => {
    const store = new InMemoryJobStore();
    await store.persistComplete("doc-1", { text: "cached" });
    const { poller } = createPoller(store);
    const { source, submit, poll } = scriptedSource([]);

    const first = await poller.resolve("doc-1", source);
    const second = await poller.resolve("doc-1", source);

    expect(submit).not.toHaveBeenCalled();
    expect(poll).not.toHaveBeenCalled();
    expect(first.resolution).toBe("cached");
    expect(JSON.stringify(second.payload)).toBe(JSON.stringify(first.payload));
  });

  it("should not resubmit on the second run after completion", async () => {
    const store = new InMemoryJobStore();
    const { poller } = createPoller(store);
    const { source, submit, poll } = scriptedSource([
      { status: "complete", payload: { n: 1 } },
    ]);

    await poller.resolve("doc-1", source);
    const again = await poller.resolve("doc-1", source);

    expect(again).toEqual({ payload: { n: 1 }, resolution: "cached" });
    expect(submit).toHaveBeenCalledTimes(1);
    expect(poll).toHaveBeenCalledTimes(1);
  });

  it("should resume from a stored handle without submitting", async () => {
    const store = new InMemoryJobStore();
    await store.persistResumptionHandle("doc-1", "saved-handle");
    const { poller } = createPoller(store);
    const { source, submit, poll } = scriptedSource([
      { status: "complete", payload: "resumed" },
    ]);

    const result = await poller.resolve("doc-1", source);

    expect(result).toEqual({ payload: "resumed", resolution: "resumed" });
    expect(submit).not.toHaveBeenCalled();
    expect(poll).toHaveBeenCalledWith("saved-handle");
  });

  it("should keep the handle and raise on a terminal error", async () => {
    const store = new InMemoryJobStore();
    const { poller } = createPoller(store);
    const { source } = scriptedSource([
      { status: "pending" },
      { status: "error", error: "conversion failed" },
    ]);

    const failure = poller.resolve("doc-1", source);

    await expect(failure).rejects.toBeInstanceOf(ExternalJobError);
    await expect(failure).rejects.toThrow(
      "External job for doc-1 failed: conversion failed",
    );
    expect(await store.loadResumptionHandle("doc-1")).toBe("handle-1");
    expect(await store.loadComplete("doc-1")).toBeNull();
  });

  it("should time out after the attempt budget without a final sleep", async () => {
    const store = new InMemoryJobStore();
    const { poller, sleep } = createPoller(store, 3);
    const { source, poll } = scriptedSource([]);

    const failure = poller.resolve("doc-1", source);

    await expect(failure).rejects.toBeInstanceOf(ExternalJobTimeout);
    await expect(failure).rejects.toThrow(
      "Polling timeout for doc-1 after 3 attempts",
    );
    expect(poll).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(await store.loadResumptionHandle("doc-1")).toBe("handle-1");
  });

  it("should propagate a failed submission without storing a handle", async () => {
    const store = new InMemoryJobStore();
    const { poller } = createPoller(store);
    const source: ExternalJobSource = {
      submit: async () => {
        throw new ExternalJobError("Datalab error: 500 busy");
      },
      poll: vi.fn(),
    };

    await expect(poller.resolve("doc-1", source)).rejects.toThrow(
      "Datalab error: 500 busy",
    );
    expect(await store.loadResumptionHandle("doc-1")).toBeNull();
  });

  it("should reject a non-positive attempt budget", () => {
    expect(
      () => new ExternalJobPoller(new InMemoryJobStore(), { maxAttempts: 0 }),
    ).toThrow(RangeError);
  });
});
