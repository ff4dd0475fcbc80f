import { GatewayConfigSchema } from "./schema.js";
import type { GatewayConfig } from "./types.js";

/** Every setting at its default; what `init` writes and what runs without a file. */
export function defaultConfig(): GatewayConfig {
  return GatewayConfigSchema.parse({});
}
