import { isIP } from "node:net";
import type { RequestOrigin } from "./request.js";

/**
 * Proxy trust. Forwarding headers (X-Forwarded-For, -Proto, -Host) are
 * only honored when the socket's remote address matches a configured
 * trusted proxy.
 */

export function normalizeIPv4Mapped(ip: string): string {
  if (ip.startsWith("::ffff:")) {
    return ip.slice("::ffff:".length);
  }
  return ip;
}

function normalizeIp(ip: string | undefined): string | undefined {
  const trimmed = ip?.trim();
  if (!trimmed) return undefined;
  return normalizeIPv4Mapped(trimmed.toLowerCase());
}

/**
 * First entry of a comma-separated forwarding header, trimmed.
 */
function firstForwarded(value: string | undefined): string | undefined {
  const first = value?.split(",")[0]?.trim();
  return first || undefined;
}

export function parseForwardedForClientIp(
  forwardedFor: string | undefined,
): string | undefined {
  const raw = firstForwarded(forwardedFor);
  if (!raw) return undefined;
  return normalizeIp(stripPort(raw));
}

/**
 * Check if an IPv4 address matches a CIDR block or exact IP.
 */
export function ipMatchesCIDR(ip: string, cidr: string): boolean {
  if (!cidr.includes("/")) {
    return ip === cidr;
  }

  const [subnet, prefixLenStr] = cidr.split("/");
  if (!subnet || !prefixLenStr) return false;
  const prefixLen = parseInt(prefixLenStr, 10);

  if (Number.isNaN(prefixLen) || prefixLen < 0 || prefixLen > 32) {
    return false;
  }

  const ipNum = ipv4ToInt(ip);
  const subnetNum = ipv4ToInt(subnet);
  if (ipNum === null || subnetNum === null) return false;

  const mask = prefixLen === 0 ? 0 : (-1 >>> (32 - prefixLen)) << (32 - prefixLen);
  return (ipNum & mask) === (subnetNum & mask);
}

function ipv4ToInt(ip: string): number | null {
  if (isIP(ip) !== 4) return null;
  return ip.split(".").reduce((acc, part) => ((acc << 8) | parseInt(part, 10)) >>> 0, 0);
}

export function isTrustedProxy(
  ip: string | undefined,
  trustedProxies: readonly string[],
): boolean {
  const normalized = normalizeIp(ip);
  if (!normalized || trustedProxies.length === 0) return false;

  return trustedProxies.some((proxy) => {
    const candidate = proxy.trim();
    if (!candidate) return false;
    if (candidate.includes("/")) {
      return ipMatchesCIDR(normalized, candidate);
    }
    return normalizeIp(candidate) === normalized;
  });
}

/**
 * Resolve the true client IP, for request logging.
 */
export function resolveClientIp(params: {
  remoteAddr: string | undefined;
  forwardedFor?: string;
  realIp?: string;
  trustedProxies: readonly string[];
}): string | undefined {
  const remote = normalizeIp(params.remoteAddr);
  if (!remote) return undefined;

  if (!isTrustedProxy(remote, params.trustedProxies)) {
    return remote;
  }

  return (
    parseForwardedForClientIp(params.forwardedFor) ??
    normalizeIp(params.realIp) ??
    remote
  );
}

/**
 * Resolve the scheme and host a client used to reach the gateway. These
 * feed every `link` in a response, so a proxy in front of the gateway
 * must be trusted before its forwarding headers replace what the socket
 * and Host header say.
 */
export function resolveRequestOrigin(params: {
  remoteAddr: string | undefined;
  encrypted: boolean;
  host: string | undefined;
  forwardedProto?: string;
  forwardedHost?: string;
  trustedProxies: readonly string[];
  /** Used when the request carries no Host header at all. */
  fallbackHost: string;
}): RequestOrigin {
  let scheme: RequestOrigin["scheme"] = params.encrypted ? "https" : "http";
  let host = params.host?.trim() || params.fallbackHost;

  if (isTrustedProxy(params.remoteAddr, params.trustedProxies)) {
    const proto = firstForwarded(params.forwardedProto)?.toLowerCase();
    if (proto === "http" || proto === "https") scheme = proto;
    host = firstForwarded(params.forwardedHost) ?? host;
  }

  return { scheme, host };
}

export type BindMode = "loopback" | "lan" | "custom";

export function resolveBindHost(bind: BindMode, customHost?: string): string {
  switch (bind) {
    case "loopback":
      return "127.0.0.1";
    case "lan":
      return "0.0.0.0";
    case "custom":
      return customHost?.trim() || "0.0.0.0";
  }
}

function stripPort(raw: string): string {
  if (raw.startsWith("[")) {
    const end = raw.indexOf("]");
    if (end !== -1) return raw.slice(1, end);
  }
  if (isIP(raw)) return raw;
  const lastColon = raw.lastIndexOf(":");
  if (lastColon > -1 && raw.includes(".") && raw.indexOf(":") === lastColon) {
    const candidate = raw.slice(0, lastColon);
    if (isIP(candidate) === 4) return candidate;
  }
  return raw;
}
