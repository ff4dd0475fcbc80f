import { parseInteger } from "../config/env.js";
import { MAX_TIMEOUT_SECONDS } from "../config/schema.js";
import type { GatewayConfig } from "../config/types.js";
import { validateConfig } from "../config/validation.js";
import { ConfigError } from "../infra/errors.js";

export interface StartOptions {
  config?: string;
  bind?: string;
  connect?: string;
  timeout?: string;
}

export interface BindAddress {
  host: string;
  port: number;
}

/**
 * Parse `host:port`, `host` or `:port`. IPv6 hosts go in brackets:
 * `[::1]:8008`.
 */
export function parseBindAddress(raw: string): Partial<BindAddress> {
  const value = raw.trim();
  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(value);
  if (bracketed) {
    const [, host, port] = bracketed;
    return withPort({ host }, port);
  }

  const colon = value.lastIndexOf(":");
  if (colon === -1) {
    if (!value) throw new ConfigError("--bind needs a host, a port or both");
    return { host: value };
  }

  const host = value.slice(0, colon);
  return withPort(host ? { host } : {}, value.slice(colon + 1));
}

function withPort(address: Partial<BindAddress>, port: string | undefined): Partial<BindAddress> {
  if (port === undefined || port === "") return address;
  return { ...address, port: parseInteger("--bind port", port, 0, 65535) };
}

/**
 * Command-line flags win over the config file and the environment.
 */
export function applyCliOverrides(config: GatewayConfig, options: StartOptions): GatewayConfig {
  const next: GatewayConfig = {
    gateway: { ...config.gateway },
    backend: { ...config.backend },
    logging: { ...config.logging },
  };

  if (options.bind !== undefined) {
    const { host, port } = parseBindAddress(options.bind);
    if (host !== undefined) {
      next.gateway.bind = "custom";
      next.gateway.host = host;
    }
    if (port !== undefined) next.gateway.port = port;
  }

  if (options.connect !== undefined) {
    next.backend.url = options.connect;
  }

  if (options.timeout !== undefined) {
    next.backend.timeout = parseInteger("--timeout", options.timeout, 1, MAX_TIMEOUT_SECONDS);
  }

  validateConfig(next);
  return next;
}
