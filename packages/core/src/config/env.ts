import { ConfigError } from "../infra/errors.js";
import { LoggingSchema, MAX_TIMEOUT_SECONDS } from "./schema.js";
import type { GatewayConfig } from "./types.js";
import { validateConfig } from "./validation.js";

export const ENV_PREFIX = "LEDGER_REST_";

/**
 * Overlay `LEDGER_REST_*` variables on a loaded config. Returns a new
 * config; the input is left untouched.
 */
export function applyEnvOverrides(
  config: GatewayConfig,
  env: NodeJS.ProcessEnv = process.env,
): GatewayConfig {
  const next: GatewayConfig = {
    gateway: { ...config.gateway },
    backend: { ...config.backend },
    logging: { ...config.logging },
  };

  const port = env[`${ENV_PREFIX}PORT`];
  if (port !== undefined && port !== "") {
    next.gateway.port = parseInteger(`${ENV_PREFIX}PORT`, port, 0, 65535);
  }

  const url = env[`${ENV_PREFIX}BACKEND_URL`];
  if (url !== undefined && url !== "") {
    next.backend.url = url;
  }

  const timeout = env[`${ENV_PREFIX}TIMEOUT`];
  if (timeout !== undefined && timeout !== "") {
    next.backend.timeout = parseInteger(
      `${ENV_PREFIX}TIMEOUT`,
      timeout,
      1,
      MAX_TIMEOUT_SECONDS,
    );
  }

  const level = env[`${ENV_PREFIX}LOG_LEVEL`];
  if (level !== undefined && level !== "") {
    const parsed = LoggingSchema.shape.level.safeParse(level);
    if (!parsed.success) {
      throw new ConfigError(`${ENV_PREFIX}LOG_LEVEL is not a log level: "${level}"`);
    }
    next.logging.level = parsed.data;
  }

  validateConfig(next);
  return next;
}

export function parseInteger(
  name: string,
  raw: string,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  const value = Number.parseInt(raw, 10);
  if (value < min || value > max) {
    throw new ConfigError(`${name} must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}
