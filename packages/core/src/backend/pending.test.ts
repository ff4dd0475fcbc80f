import { afterEach, describe, expect, it, vi } from "vitest";
import { BackendDisconnectedError, ReplyTimeoutError } from "./errors.js";
import { PendingRequests, ReplyFuture } from "./pending.js";

const bytes = (...values: number[]) => Uint8Array.from(values);

describe("ReplyFuture", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns a reply that arrived before anyone waited", async () => {
    const future = new ReplyFuture("a");
    expect(future.resolve(bytes(1, 2))).toBe(true);
    await expect(future.result(1000)).resolves.toEqual(bytes(1, 2));
  });

  it("returns a reply that arrives while waiting", async () => {
    const future = new ReplyFuture("a");
    const waiting = future.result(1000);
    future.resolve(bytes(7));
    await expect(waiting).resolves.toEqual(bytes(7));
  });

  it("settles only once", async () => {
    const future = new ReplyFuture("a");
    expect(future.resolve(bytes(1))).toBe(true);
    expect(future.resolve(bytes(2))).toBe(false);
    expect(future.fail(new Error("late"))).toBe(false);
    await expect(future.result(1000)).resolves.toEqual(bytes(1));
  });

  it("rejects with the failure it was settled with", async () => {
    const future = new ReplyFuture("a");
    future.fail(new BackendDisconnectedError());
    await expect(future.result(1000)).rejects.toBeInstanceOf(BackendDisconnectedError);
  });

  it("times out when nothing settles it", async () => {
    vi.useFakeTimers();
    const future = new ReplyFuture("slow");
    const waiting = future.result(250);
    const assertion = expect(waiting).rejects.toThrow("No reply for slow within 250ms");
    await vi.advanceTimersByTimeAsync(250);
    await assertion;
    await expect(waiting).rejects.toBeInstanceOf(ReplyTimeoutError);
  });

  it("keeps waiting when the timeout is longer than a timer can hold", async () => {
    const future = new ReplyFuture("patient");
    const outcome = future.result(30 * 24 * 60 * 60 * 1000).then(
      () => "replied",
      () => "failed",
    );
    await new Promise((resolve) => setTimeout(resolve, 50));
    future.resolve(bytes(3));
    await expect(outcome).resolves.toBe("replied");
  });

  it("releases itself when the wait ends", async () => {
    const release = vi.fn();
    const future = new ReplyFuture("a", release);
    future.resolve(bytes(0));
    await future.result(1000);
    expect(release).toHaveBeenCalledWith(future);
  });
});

describe("PendingRequests", () => {
  it("delivers each reply to the slot with the matching id", async () => {
    const pending = new PendingRequests();
    const first = pending.create("first");
    const second = pending.create("second");

    expect(pending.fulfill("second", bytes(2))).toBe(true);
    expect(pending.fulfill("first", bytes(1))).toBe(true);

    await expect(first.result(1000)).resolves.toEqual(bytes(1));
    await expect(second.result(1000)).resolves.toEqual(bytes(2));
    expect(pending.size).toBe(0);
  });

  it("refuses a second slot for an outstanding id", () => {
    const pending = new PendingRequests();
    pending.create("dup");
    expect(() => pending.create("dup")).toThrow("Correlation id already outstanding: dup");
  });

  it("drops replies for unknown or already answered ids", () => {
    const pending = new PendingRequests();
    pending.create("once");
    expect(pending.fulfill("never-issued", bytes(0))).toBe(false);
    expect(pending.fulfill("once", bytes(0))).toBe(true);
    expect(pending.fulfill("once", bytes(0))).toBe(false);
  });

  it("removes a slot whose waiter gave up", async () => {
    vi.useFakeTimers();
    try {
      const pending = new PendingRequests();
      const future = pending.create("abandoned");
      const waiting = future.result(10);
      const assertion = expect(waiting).rejects.toBeInstanceOf(ReplyTimeoutError);
      await vi.advanceTimersByTimeAsync(10);
      await assertion;

      expect(pending.has("abandoned")).toBe(false);
      expect(pending.fulfill("abandoned", bytes(1))).toBe(false);
    } finally {
      vi.useRealTimers();
    }
  });

  it("fails a single slot and leaves the others waiting", async () => {
    const pending = new PendingRequests();
    const lost = pending.create("lost");
    pending.create("kept");

    expect(pending.fail("lost", new BackendDisconnectedError("write failed"))).toBe(true);
    expect(pending.fail("lost", new BackendDisconnectedError())).toBe(false);
    expect(pending.has("kept")).toBe(true);
    await expect(lost.result(1000)).rejects.toThrow("write failed");
  });

  it("fails every outstanding slot at once", async () => {
    const pending = new PendingRequests();
    const futures = [pending.create("a"), pending.create("b"), pending.create("c")];
    futures[1]?.resolve(bytes(9));

    expect(pending.failAll(new BackendDisconnectedError())).toBe(2);
    expect(pending.size).toBe(0);

    const [a, b, c] = futures;
    await expect(a?.result(1000)).rejects.toBeInstanceOf(BackendDisconnectedError);
    await expect(b?.result(1000)).resolves.toEqual(bytes(9));
    await expect(c?.result(1000)).rejects.toBeInstanceOf(BackendDisconnectedError);
  });

  it("lets the same id be reused once the first slot is gone", () => {
    const pending = new PendingRequests();
    pending.create("x");
    pending.fulfill("x", bytes(0));
    expect(() => pending.create("x")).not.toThrow();
  });
});
