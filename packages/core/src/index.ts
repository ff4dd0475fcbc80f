// Config
export {
  BackendSchema,
  GatewayConfigSchema,
  GatewaySchema,
  GatewayTlsSchema,
  LoggingSchema,
} from "./config/schema.js";
export type {
  BackendConfig,
  GatewayConfig,
  GatewaySettings,
  GatewayTls,
  LoggingConfig,
} from "./config/types.js";
export { defaultConfig } from "./config/defaults.js";
export { validateConfig, ConfigValidationError } from "./config/validation.js";
export { applyEnvOverrides } from "./config/env.js";
export {
  DEFAULT_CONFIG_PATH,
  initializeConfig,
  loadConfig,
  loadConfigOrDefaults,
  parseConfig,
  saveConfig,
} from "./config/loader.js";

// Infrastructure
export { createLogger, redactSensitive, redactUrlCredentials } from "./infra/logger.js";
export type { LogLevel } from "./infra/logger.js";
export { AppError, ConfigError } from "./infra/errors.js";

// Backend
export { loadProtocolSchema, ProtocolSchema, REPLY_TYPES } from "./backend/schema.js";
export type { MessageTypeName, ReplyTypeName, StatusTable } from "./backend/schema.js";
export { PendingRequests, ReplyFuture } from "./backend/pending.js";
export { BackendConnection } from "./backend/connection.js";
export type {
  BackendConnectionOptions,
  BackendSender,
  ConnectionState,
} from "./backend/connection.js";
export { BackendClient } from "./backend/client.js";
export type { BackendClientOptions, BackendQuery } from "./backend/client.js";
export { BackendDisconnectedError, ReplyTimeoutError } from "./backend/errors.js";
export { BASELINE_TRAPS, buildTrapChain, checkStatus } from "./backend/traps.js";
export type { StatusTrap, TrapSpec } from "./backend/traps.js";

// Gateway
export { createGateway } from "./gateway/server.js";
export type { GatewayInstance, GatewayOptions } from "./gateway/server.js";
export { createGatewayHttpServer, createHealthRoute } from "./gateway/server-http.js";
export type { HttpServerOptions } from "./gateway/server-http.js";
export { createRouter } from "./gateway/router.js";
export type { Route, RouteHandler, Router } from "./gateway/router.js";
export { createRoutes } from "./gateway/routes/index.js";
export type { RouteContext } from "./gateway/routes/index.js";
export { HeaderExpander, MalformedHeaderError } from "./gateway/headers.js";
export { computeMetadata, serializeSorted, wrapResponse } from "./gateway/envelope.js";
export type { Metadata } from "./gateway/envelope.js";
export type { ApiRequest, ApiResponse } from "./gateway/request.js";
export * from "./gateway/api-errors.js";
export {
  isTrustedProxy,
  resolveBindHost,
  resolveClientIp,
  resolveRequestOrigin,
} from "./gateway/net.js";
