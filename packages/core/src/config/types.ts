import type { z } from "zod";
import type {
  BackendSchema,
  GatewayConfigSchema,
  GatewaySchema,
  GatewayTlsSchema,
  LoggingSchema,
} from "./schema.js";

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type GatewaySettings = z.infer<typeof GatewaySchema>;
export type GatewayTls = z.infer<typeof GatewayTlsSchema>;
export type BackendConfig = z.infer<typeof BackendSchema>;
export type LoggingConfig = z.infer<typeof LoggingSchema>;
export type LogLevel = LoggingConfig["level"];
