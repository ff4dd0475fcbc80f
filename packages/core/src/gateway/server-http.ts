import {
  createServer as createHttpServer,
  type Server as HttpServer,
  type IncomingMessage,
  type ServerResponse,
} from "node:http";
import { createServer as createHttpsServer } from "node:https";
import type { TlsOptions } from "node:tls";
import type { Logger } from "tslog";
import type { ConnectionState } from "../backend/connection.js";
import { ApiError, InternalError } from "./api-errors.js";
import { serializeSorted } from "./envelope.js";
import { resolveClientIp, resolveRequestOrigin } from "./net.js";
import { toApiRequest, type ApiResponse } from "./request.js";
import type { Route, Router } from "./router.js";

/**
 * Express-free HTTP server: every request goes through the router, and
 * every failure becomes a JSON error body with the right status.
 */

export interface HttpServerOptions {
  router: Router;
  logger: Logger<unknown>;
  tls?: TlsOptions;
  trustedProxies?: readonly string[];
  /** Default: 10 MiB */
  maxBodyBytes?: number;
}

const DEFAULT_MAX_BODY_BYTES = 10 * 1024 * 1024;

/**
 * Create an HTTP(S) server with security headers applied to every response.
 */
export function createGatewayHttpServer(options: HttpServerOptions): HttpServer {
  const { router, logger } = options;
  const trustedProxies = options.trustedProxies ?? [];
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;

  async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    applySecurityHeaders(res);
    const started = Date.now();

    let response: ApiResponse;
    try {
      const origin = resolveRequestOrigin({
        remoteAddr: req.socket.remoteAddress,
        encrypted: isEncrypted(req),
        host: req.headers.host,
        forwardedProto: headerValue(req.headers["x-forwarded-proto"]),
        forwardedHost: headerValue(req.headers["x-forwarded-host"]),
        trustedProxies,
        fallbackHost: `${req.socket.localAddress ?? "127.0.0.1"}:${req.socket.localPort ?? 0}`,
      });
      const request = toApiRequest(req, origin, maxBodyBytes);
      const { handler, params } = router.match(request.method, request.url.pathname);
      response = await handler({ ...request, params });
    } catch (err) {
      response = renderError(err, logger, req);
    }

    res.writeHead(response.status, { "Content-Type": response.contentType });
    res.end(response.body);

    const clientIp = resolveClientIp({
      remoteAddr: req.socket.remoteAddress,
      forwardedFor: headerValue(req.headers["x-forwarded-for"]),
      realIp: headerValue(req.headers["x-real-ip"]),
      trustedProxies,
    });
    logger.debug(
      `${req.method ?? "GET"} ${req.url ?? "/"} ${response.status} ` +
        `${Date.now() - started}ms from ${clientIp ?? "unknown"}`,
    );
  }

  const handler = (req: IncomingMessage, res: ServerResponse): void => {
    handle(req, res).catch((err: unknown) => {
      logger.error("Failed to write HTTP response:", err);
      if (!res.headersSent) res.writeHead(500);
      res.end();
    });
  };

  if (options.tls) {
    return createHttpsServer(options.tls, handler);
  }
  return createHttpServer(handler);
}

/** `GET /health`: liveness plus the state of the validator connection. */
export function createHealthRoute(state: () => ConnectionState): Route {
  return {
    method: "GET",
    path: "/health",
    handler: async () => ({
      status: 200,
      contentType: "application/json",
      body: serializeSorted({ status: "ok", backend: state() }),
    }),
  };
}

export function renderError(
  err: unknown,
  logger: Logger<unknown>,
  req?: IncomingMessage,
): ApiResponse {
  let apiError: ApiError;
  if (err instanceof ApiError) {
    apiError = err;
    if (apiError.statusCode >= 500) {
      logger.warn(`${req?.method ?? ""} ${req?.url ?? ""} failed: ${apiError.message}`);
    }
  } else {
    logger.error(`Unhandled error for ${req?.method ?? ""} ${req?.url ?? ""}:`, err);
    apiError = new InternalError();
  }

  return {
    status: apiError.statusCode,
    contentType: "application/json",
    body: serializeSorted(apiError.toJSON()),
  };
}

function isEncrypted(req: IncomingMessage): boolean {
  const socket = req.socket;
  return "encrypted" in socket && socket.encrypted === true;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value.join(",") : value;
}

function applySecurityHeaders(res: ServerResponse): void {
  res.setHeader("Content-Security-Policy", "default-src 'none'; frame-ancestors 'none'");
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("X-XSS-Protection", "0");
  res.setHeader("Referrer-Policy", "strict-origin-when-cross-origin");
  res.setHeader("Cache-Control", "no-store");
  res.setHeader(
    "Strict-Transport-Security",
    "max-age=31536000; includeSubDomains",
  );
}
