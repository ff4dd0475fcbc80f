import { ConfigError } from "../infra/errors.js";
import type { GatewayConfig } from "./types.js";

export class ConfigValidationError extends ConfigError {
  constructor(public readonly errors: string[]) {
    super(`Config validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
    this.name = "ConfigValidationError";
  }
}

/**
 * Cross-field validation that goes beyond what the Zod schema handles.
 */
export function validateConfig(config: GatewayConfig): void {
  const errors: string[] = [];
  const { gateway } = config;

  if (gateway.tls?.enabled) {
    if (!gateway.tls.certPath) {
      errors.push("gateway.tls.certPath is required when TLS is enabled.");
    }
    if (!gateway.tls.keyPath) {
      errors.push("gateway.tls.keyPath is required when TLS is enabled.");
    }
  }

  if (gateway.bind === "custom" && !gateway.host) {
    errors.push('gateway.host is required when bind = "custom".');
  }

  for (const proxy of gateway.trustedProxies) {
    if (!isValidProxyAddress(proxy)) {
      errors.push(
        `Invalid trustedProxy address: "${proxy}". Must be an IP address or CIDR.`,
      );
    }
  }

  if (!/^wss?:\/\//.test(config.backend.url)) {
    errors.push(`backend.url must be a ws:// or wss:// URL, got "${config.backend.url}".`);
  }

  if (errors.length > 0) {
    throw new ConfigValidationError(errors);
  }
}

const IP_OR_CIDR_RE =
  /^(\d{1,3}\.){3}\d{1,3}(\/\d{1,2})?$|^([0-9a-fA-F:]+)(\/\d{1,3})?$/;

function isValidProxyAddress(address: string): boolean {
  return IP_OR_CIDR_RE.test(address);
}
