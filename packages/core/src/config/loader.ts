import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import JSON5 from "json5";
import { ConfigError } from "../infra/errors.js";
import { defaultConfig } from "./defaults.js";
import { GatewayConfigSchema } from "./schema.js";
import type { GatewayConfig } from "./types.js";
import { validateConfig } from "./validation.js";

/**
 * Load and validate config from a JSON or JSON5 file.
 */
export function loadConfig(filePath: string): GatewayConfig {
  if (!existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  const raw = readFileSync(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file is not valid JSON or JSON5: ${filePath}`, err);
  }

  return parseConfig(parsed);
}

/**
 * Load the file when it exists, otherwise run on defaults.
 */
export function loadConfigOrDefaults(filePath: string | undefined): GatewayConfig {
  if (filePath && existsSync(filePath)) return loadConfig(filePath);
  if (filePath && filePath !== DEFAULT_CONFIG_PATH) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }
  return defaultConfig();
}

export const DEFAULT_CONFIG_PATH = "ledger-rest.json5";

/** Validate an already parsed value: schema first, then cross-field rules. */
export function parseConfig(value: unknown): GatewayConfig {
  const result = GatewayConfigSchema.safeParse(value);
  if (!result.success) {
    const messages = result.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`,
    );
    throw new ConfigError(
      `Config validation failed:\n${messages.map((m) => `  - ${m}`).join("\n")}`,
      result.error,
    );
  }

  validateConfig(result.data);
  return result.data;
}

export function saveConfig(filePath: string, config: GatewayConfig): void {
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(filePath, JSON.stringify(config, null, 2) + "\n");
}

/**
 * Write a config file holding every default, for first-run setup.
 * Refuses to overwrite an existing file.
 */
export function initializeConfig(filePath: string): GatewayConfig {
  if (existsSync(filePath)) {
    throw new ConfigError(`Config file already exists: ${filePath}`);
  }
  const config = defaultConfig();
  saveConfig(filePath, config);
  return config;
}
