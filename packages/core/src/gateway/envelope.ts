import type { ApiRequest, ApiResponse } from "./request.js";

/**
 * Response envelope: `{data?, head?, link}`. `data` is left out entirely
 * when there is none, and keys are sorted so output is reproducible.
 */

export interface Metadata {
  head?: string;
  link: string;
}

export interface WrapOptions {
  data?: unknown;
  metadata?: Metadata;
  status?: number;
}

export function wrapResponse(options: WrapOptions = {}): ApiResponse {
  const envelope: Record<string, unknown> = { ...options.metadata };
  if (options.data !== undefined) {
    envelope.data = options.data;
  }

  return {
    status: options.status ?? 200,
    contentType: "application/json",
    body: serializeSorted(envelope),
  };
}

/**
 * Derive `head` and `link` from the request and the validator's reply.
 * When the validator reported the head it answered from, the link is
 * rebuilt to pin that head while keeping every other query parameter.
 */
export function computeMetadata(
  request: ApiRequest,
  reply: Record<string, unknown>,
): Metadata {
  const head = reply.head_id;
  if (typeof head !== "string" || head === "") {
    return { link: request.href };
  }

  const { protocol, host, pathname, search } = request.url;
  const headless = search
    .replace(/^\?/, "")
    .split("&")
    .filter((part) => part !== "" && queryKey(part) !== "head");

  const query = [`head=${head}`, ...headless].join("&");
  return { head, link: `${protocol}//${host}${pathname}?${query}` };
}

/** JSON with recursively sorted object keys and 2-space indentation. */
export function serializeSorted(value: unknown): string {
  return JSON.stringify(value, sortKeys, 2);
}

function sortKeys(_key: string, value: unknown): unknown {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}

function queryKey(part: string): string {
  const raw = part.split("=")[0] ?? "";
  try {
    return decodeURIComponent(raw.replace(/\+/g, " "));
  } catch {
    return raw;
  }
}
