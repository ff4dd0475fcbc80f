import { describe, expect, it } from "vitest";
import { FakeValidator, fakeRouteContext } from "../../testing/fake-validator.js";
import { fakeRequest } from "../../testing/requests.js";
import { filterIds, queryValue, replyList, replyStatuses, resolveWait } from "./context.js";

const context = fakeRouteContext(new FakeValidator(), { timeoutMs: 300_000 });
const at = (query: string) => fakeRequest(`http://localhost:8008/batches${query}`);

describe("resolveWait", () => {
  it("does not wait without the parameter", () => {
    expect(resolveWait(at(""), context)).toEqual({});
  });

  it("does not wait for false in any case", () => {
    expect(resolveWait(at("?wait=false"), context)).toEqual({});
    expect(resolveWait(at("?wait=FaLsE"), context)).toEqual({});
  });

  it("uses an integer as seconds", () => {
    expect(resolveWait(at("?wait=10"), context)).toEqual({ wait_for_commit: true, timeout: 10 });
    expect(resolveWait(at("?wait=%2010%20"), context)).toEqual({
      wait_for_commit: true,
      timeout: 10,
    });
  });

  it("falls back to a share of the gateway timeout", () => {
    expect(resolveWait(at("?wait"), context)).toEqual({ wait_for_commit: true, timeout: 285 });
    expect(resolveWait(at("?wait=true"), context)).toEqual({ wait_for_commit: true, timeout: 285 });
    expect(resolveWait(at("?wait=1.5"), context)).toEqual({ wait_for_commit: true, timeout: 285 });
  });

  it("falls back when the integer does not fit the wire field", () => {
    expect(resolveWait(at("?wait=4294967301"), context)).toEqual({
      wait_for_commit: true,
      timeout: 285,
    });
    expect(resolveWait(at("?wait=2147483647"), context)).toEqual({
      wait_for_commit: true,
      timeout: 2147483647,
    });
  });

  it("floors the fallback", () => {
    const short = fakeRouteContext(new FakeValidator(), { timeoutMs: 10_000, waitTimeoutFraction: 0.95 });
    expect(resolveWait(at("?wait=yes"), short)).toEqual({ wait_for_commit: true, timeout: 9 });
  });
});

describe("filterIds", () => {
  it("splits the id parameter on commas", () => {
    expect(filterIds(at("?id=c1,c2"))).toEqual(["c1", "c2"]);
  });

  it("treats absent or empty as no filter", () => {
    expect(filterIds(at(""))).toBeUndefined();
    expect(filterIds(at("?id="))).toBeUndefined();
  });
});

describe("queryValue", () => {
  it("returns a parameter or undefined", () => {
    expect(queryValue(at("?head=h1"), "head")).toBe("h1");
    expect(queryValue(at(""), "head")).toBeUndefined();
  });
});

describe("reply readers", () => {
  it("reads a list, defaulting to empty", () => {
    expect(replyList({ blocks: [{ a: 1 }] }, "blocks")).toEqual([{ a: 1 }]);
    expect(replyList({}, "blocks")).toEqual([]);
  });

  it("rejects a list field that is not a list", () => {
    expect(() => replyList({ blocks: "x" }, "blocks")).toThrow();
  });

  it("reads the status map", () => {
    expect(replyStatuses({ batch_statuses: { c1: "PENDING" } })).toEqual({ c1: "PENDING" });
    expect(replyStatuses({})).toEqual({});
  });
});
