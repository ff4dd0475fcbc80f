import { z } from "zod";
import type { BackendClient } from "../../backend/client.js";
import type { HeaderExpander } from "../headers.js";
import type { ApiRequest } from "../request.js";

/** Everything the route handlers share. */
export interface RouteContext {
  backend: BackendClient;
  expander: HeaderExpander;
  /**
   * Share of the request timeout a commit wait may use when `wait` is
   * present but not an integer. Default: 0.95
   */
  waitTimeoutFraction: number;
}

export interface WaitParams {
  wait_for_commit?: boolean;
  timeout?: number;
}

const INTEGER_RE = /^\s*[+-]?\d+\s*$/;
/** `timeout` is an int32 on the wire. */
const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

/**
 * Read `wait`: absent or "false" means don't wait; an integer is the
 * number of seconds the validator may wait for commit; anything else
 * waits for the configured share of this gateway's own timeout.
 */
export function resolveWait(request: ApiRequest, context: RouteContext): WaitParams {
  const wait = request.url.searchParams.get("wait") ?? "false";
  if (wait.toLowerCase() === "false") return {};

  if (INTEGER_RE.test(wait)) {
    const seconds = Number.parseInt(wait, 10);
    if (seconds >= INT32_MIN && seconds <= INT32_MAX) {
      return { wait_for_commit: true, timeout: seconds };
    }
  }

  const timeoutSeconds = context.backend.timeoutMs / 1000;
  return {
    wait_for_commit: true,
    timeout: Math.floor(timeoutSeconds * context.waitTimeoutFraction),
  };
}

/** `head` and similar pass-through filters; absent stays absent. */
export function queryValue(request: ApiRequest, name: string): string | undefined {
  return request.url.searchParams.get(name) ?? undefined;
}

/** Comma separated `id` filter. Absent or empty means no filtering. */
export function filterIds(request: ApiRequest): string[] | undefined {
  const ids = request.url.searchParams.get("id");
  return ids ? ids.split(",") : undefined;
}

const RecordListSchema = z.array(z.unknown());
const BatchStatusMapSchema = z.record(z.string());

export function replyList(reply: Record<string, unknown>, key: string): unknown[] {
  return RecordListSchema.parse(reply[key] ?? []);
}

export function replyStatuses(reply: Record<string, unknown>): Record<string, string> {
  return BatchStatusMapSchema.parse(reply.batch_statuses ?? {});
}
