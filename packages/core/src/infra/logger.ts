import { Logger } from "tslog";
import type { LogLevel } from "../config/types.js";

export type { LogLevel } from "../config/types.js";

const SENSITIVE_KEY_PATTERNS = [
  /token/i,
  /password/i,
  /secret/i,
  /api[_-]?key/i,
  /authorization/i,
  /credential/i,
  /private[_-]?key/i,
];

const URL_CREDENTIALS_RE = /^([a-z][a-z0-9+.-]*:\/\/)[^/@\s]+@/i;

/**
 * Recursively redact sensitive values before logging: strings under a
 * sensitive key, and the user-info part of any URL-shaped string.
 */
export function redactSensitive(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;
  if (typeof obj === "string") return redactUrlCredentials(obj);
  if (typeof obj !== "object") return obj;

  if (Array.isArray(obj)) {
    return obj.map(redactSensitive);
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveKey(key) && typeof value === "string") {
      result[key] = "[REDACTED]";
    } else {
      result[key] = redactSensitive(value);
    }
  }
  return result;
}

/** `ws://user:pass@host:4004` → `ws://[REDACTED]@host:4004` */
export function redactUrlCredentials(value: string): string {
  return value.replace(URL_CREDENTIALS_RE, "$1[REDACTED]@");
}

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
}

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export function createLogger(
  name: string,
  options?: { level?: LogLevel; redact?: boolean },
): Logger<unknown> {
  const level = options?.level ?? "info";
  const shouldRedact = options?.redact !== false;

  return new Logger({
    name,
    minLevel: LOG_LEVEL_MAP[level],
    type: "pretty",
    ...(shouldRedact && {
      maskValuesOfKeys: ["token", "password", "secret", "authorization", "privateKey"],
      maskPlaceholder: "[REDACTED]",
    }),
  });
}
