import https from "node:https";
import net from "node:net";
import type { Readable } from "node:stream";
import axios from "axios";

/**
 * A probe. Resolves when the dependency is healthy, rejects with the failure
 * detail otherwise.
 */
export type Check = () => Promise<void>;

/**
 * Anything that can run a query, e.g. a pg `Pool`.
 */
export interface Pingable {
  query(text: string): Promise<unknown>;
}

export interface HttpsGetCheckOptions {
  /** Trusted roots. Node's bundled roots are used when omitted. */
  ca?: Buffer[];
  timeoutMs?: number;
}

export function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new Error(`timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function httpsGetCheck(url: string, { ca, timeoutMs = 5000 }: HttpsGetCheckOptions = {}): Check {
  const client = axios.create({
    httpsAgent: new https.Agent({ ca, minVersion: "TLSv1.2" }),
    timeout: timeoutMs,
    // never follow redirects
    maxRedirects: 0,
    validateStatus: () => true,
    proxy: false,
    responseType: "stream"
  });

  return async () => {
    const res = await client.get<Readable>(url);
    res.data.destroy();
    if (res.status !== 200) {
      throw new Error(`returned status ${res.status}`);
    }
  };
}

export function splitHostPort(address: string): { host: string; port: number } {
  const idx = address.lastIndexOf(":");
  if (idx <= 0) {
    throw new Error(`invalid address "${address}"`);
  }
  let host = address.slice(0, idx);
  const portText = address.slice(idx + 1);
  if (host.startsWith("[") && host.endsWith("]")) {
    host = host.slice(1, -1);
  }
  const port = Number(portText);
  if (!/^\d+$/.test(portText) || port > 65535) {
    throw new Error(`invalid address "${address}"`);
  }
  return { host, port };
}

export function tcpDialCheck(address: string, timeoutMs = 5000): Check {
  return async () => {
    const { host, port } = splitHostPort(address);
    await new Promise<void>((resolve, reject) => {
      const socket = net.connect({ host, port });
      const timer = setTimeout(() => {
        socket.destroy();
        reject(new Error(`dial tcp ${address}: i/o timeout`));
      }, timeoutMs);

      socket.once("connect", () => {
        clearTimeout(timer);
        socket.destroy();
        resolve();
      });
      socket.once("error", (err) => {
        clearTimeout(timer);
        socket.destroy();
        reject(err);
      });
    });
  };
}

export function databasePingCheck(db: Pingable | undefined, timeoutMs = 1000, query = "SELECT 1"): Check {
  return async () => {
    if (!db) {
      throw new Error("database is not configured");
    }
    await withTimeout(db.query(query), timeoutMs);
  };
}

/**
 * Number of live handles and requests keeping the event loop busy: timers,
 * sockets, servers, pending fs and dns requests.
 */
export function activeResourceCount(): number {
  return process.getActiveResourcesInfo().length;
}

export function activeResourceCountCheck(threshold = 100, count: () => number = activeResourceCount): Check {
  return async () => {
    const n = count();
    if (n > threshold) {
      throw new Error(`too many active resources (${n} > ${threshold})`);
    }
  };
}
