import type { Server as HttpServer } from "node:http";
import type { AddressInfo } from "node:net";
import type { Logger } from "tslog";
import { BackendClient } from "../backend/client.js";
import {
  BackendConnection,
  type BackendSender,
  type ConnectionState,
} from "../backend/connection.js";
import { loadProtocolSchema } from "../backend/schema.js";
import type { GatewayConfig } from "../config/types.js";
import { createLogger, redactUrlCredentials } from "../infra/logger.js";
import { HeaderExpander } from "./headers.js";
import { resolveBindHost } from "./net.js";
import { createRouter } from "./router.js";
import { createRoutes } from "./routes/index.js";
import { createGatewayHttpServer, createHealthRoute } from "./server-http.js";
import { buildTlsOptions } from "./tls.js";

/**
 * Gateway bootstrap: ties together the validator connection, the route
 * table and the HTTP(S) server.
 */

export interface GatewayInstance {
  httpServer: HttpServer;
  /** Undefined when a sender was injected. */
  connection: BackendConnection | undefined;
  logger: Logger<unknown>;
  listen(): Promise<AddressInfo>;
  close(): Promise<void>;
}

export interface GatewayOptions {
  config: GatewayConfig;
  /** Replaces the validator connection, e.g. with an in-process fake. */
  sender?: BackendSender;
  logger?: Logger<unknown>;
}

export function createGateway(options: GatewayOptions): GatewayInstance {
  const { config } = options;
  const gwConfig = config.gateway;

  const logger =
    options.logger ??
    createLogger("gateway", {
      level: config.logging.level,
      redact: config.logging.redactSecrets,
    });

  const schema = loadProtocolSchema();
  let connection: BackendConnection | undefined;
  let sender: BackendSender;
  if (options.sender) {
    sender = options.sender;
  } else {
    connection = new BackendConnection({
      url: config.backend.url,
      schema,
      logger: logger.getSubLogger({ name: "backend" }),
      reconnectDelayMs: config.backend.reconnectDelayMs,
      onStateChange: (state) => logger.debug(`Validator connection ${state}`),
    });
    sender = connection;
  }

  const backend = new BackendClient({
    sender,
    schema,
    logger: logger.getSubLogger({ name: "client" }),
    timeoutMs: config.backend.timeout * 1000,
  });

  const backendState = (): ConnectionState => connection?.state ?? "connected";
  const router = createRouter([
    createHealthRoute(backendState),
    ...createRoutes({
      backend,
      expander: new HeaderExpander(schema),
      waitTimeoutFraction: config.backend.waitTimeoutFraction,
    }),
  ]);

  const tlsOptions =
    gwConfig.tls?.enabled && gwConfig.tls.certPath && gwConfig.tls.keyPath
      ? buildTlsOptions({
          certPath: gwConfig.tls.certPath,
          keyPath: gwConfig.tls.keyPath,
        })
      : undefined;

  const httpServer = createGatewayHttpServer({
    router,
    logger,
    tls: tlsOptions,
    trustedProxies: gwConfig.trustedProxies,
    maxBodyBytes: gwConfig.maxBodyBytes,
  });

  const host = resolveBindHost(gwConfig.bind, gwConfig.host);

  async function listen(): Promise<AddressInfo> {
    connection?.open();
    return new Promise<AddressInfo>((resolve, reject) => {
      httpServer.once("error", reject);
      httpServer.listen(gwConfig.port, host, () => {
        httpServer.off("error", reject);
        const address = httpServer.address();
        if (!address || typeof address === "string") {
          reject(new Error("Gateway is not listening on a TCP address"));
          return;
        }
        const protocol = tlsOptions ? "https" : "http";
        logger.info(
          `Gateway listening on ${protocol}://${host}:${address.port}, ` +
            `validator at ${redactUrlCredentials(config.backend.url)}`,
        );
        resolve(address);
      });
    });
  }

  async function close(): Promise<void> {
    await connection?.close();
    if (!httpServer.listening) return;
    await new Promise<void>((resolve, reject) => {
      httpServer.close((err) => {
        if (err) reject(err);
        else resolve();
      });
      httpServer.closeAllConnections();
    });
    logger.info("Gateway closed");
  }

  return { httpServer, connection, logger, listen, close };
}
