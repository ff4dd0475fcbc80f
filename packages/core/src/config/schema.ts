import { z } from "zod";

export const GatewayTlsSchema = z.object({
  enabled: z.boolean().default(false),
  certPath: z.string().optional(),
  keyPath: z.string().optional(),
});

export const GatewaySchema = z.object({
  port: z.number().int().min(0).max(65535).default(8008),
  bind: z.enum(["loopback", "lan", "custom"]).default("loopback"),
  host: z.string().optional(),
  tls: GatewayTlsSchema.optional(),
  trustedProxies: z.array(z.string()).default([]),
  maxBodyBytes: z
    .number()
    .int()
    .min(1)
    .default(10 * 1024 * 1024),
});

/** Longest reply timeout, in seconds, that a Node timer can hold. */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

export const BackendSchema = z.object({
  url: z.string().url().default("ws://127.0.0.1:4004"),
  /** Seconds to wait for any single validator reply. */
  timeout: z.number().int().min(1).max(MAX_TIMEOUT_SECONDS).default(300),
  waitTimeoutFraction: z.number().gt(0).max(1).default(0.95),
  reconnectDelayMs: z.number().int().min(0).default(1000),
});

export const LoggingSchema = z.object({
  level: z
    .enum(["silly", "trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
  redactSecrets: z.boolean().default(true),
});

export const GatewayConfigSchema = z.object({
  gateway: GatewaySchema.default({}),
  backend: BackendSchema.default({}),
  logging: LoggingSchema.default({}),
});
