import type { IncomingMessage } from "node:http";
import { InvalidRequestUrl, PayloadTooLarge } from "./api-errors.js";

/**
 * What a route handler sees of an HTTP request. Handlers never touch
 * `IncomingMessage` directly, which keeps them testable without a server.
 */
export interface ApiRequest {
  method: string;
  /** The request URL exactly as the client addressed it. */
  href: string;
  url: URL;
  /** Media type without parameters, lowercased. */
  contentType: string | undefined;
  /** Values captured by `{name}` segments of the matched route. */
  params: Record<string, string>;
  body(): Promise<Buffer>;
}

export interface ApiResponse {
  status: number;
  contentType: string;
  body: string;
}

export interface RequestOrigin {
  scheme: "http" | "https";
  host: string;
}

/**
 * Build an ApiRequest from a raw Node request. The body is read lazily,
 * once, and rejected as soon as it grows past `maxBodyBytes`.
 */
export function toApiRequest(
  req: IncomingMessage,
  origin: RequestOrigin,
  maxBodyBytes: number,
): ApiRequest {
  const href = `${origin.scheme}://${origin.host}${req.url ?? "/"}`;
  let body: Promise<Buffer> | undefined;

  return {
    method: req.method ?? "GET",
    href,
    url: parseUrl(href),
    contentType: parseContentType(req.headers["content-type"]),
    params: {},
    body: () => (body ??= readBody(req, maxBodyBytes)),
  };
}

function parseUrl(href: string): URL {
  try {
    return new URL(href);
  } catch (err) {
    throw new InvalidRequestUrl(err);
  }
}

export function parseContentType(header: string | undefined): string | undefined {
  const mediaType = header?.split(";")[0]?.trim().toLowerCase();
  return mediaType || undefined;
}

function readBody(req: IncomingMessage, maxBodyBytes: number): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    const onData = (chunk: Buffer): void => {
      size += chunk.length;
      if (size > maxBodyBytes) {
        // Drain the rest so the 413 can still be written back.
        req.off("data", onData);
        req.resume();
        chunks.length = 0;
        reject(new PayloadTooLarge());
        return;
      }
      chunks.push(chunk);
    };

    req.on("data", onData);
    req.on("end", () => resolve(Buffer.concat(chunks)));
    req.on("error", reject);
  });
}
