import { existsSync, readFileSync } from "node:fs";
import type { TlsOptions } from "node:tls";
import { ConfigError } from "../infra/errors.js";

export interface TlsCertPaths {
  certPath: string;
  keyPath: string;
}

/**
 * Read the certificate and key for the HTTPS server. TLSv1.2 is the
 * floor; operators front the gateway with whatever clients they have.
 */
export function buildTlsOptions(paths: TlsCertPaths): TlsOptions {
  if (!existsSync(paths.certPath)) {
    throw new ConfigError(`TLS cert file not found: ${paths.certPath}`);
  }
  if (!existsSync(paths.keyPath)) {
    throw new ConfigError(`TLS key file not found: ${paths.keyPath}`);
  }

  return {
    cert: readFileSync(paths.certPath),
    key: readFileSync(paths.keyPath),
    minVersion: "TLSv1.2",
  };
}
