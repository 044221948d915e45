import { readFileSync } from "node:fs";

/**
 * Trust material handed to the healthchecker. `ca` replaces Node's bundled
 * roots when present.
 */
export interface TlsConfig {
  ca?: Buffer[];
}

export function loadTlsConfig(caCertPath: string): TlsConfig {
  if (!caCertPath) {
    return {};
  }
  return { ca: [readFileSync(caCertPath)] };
}
