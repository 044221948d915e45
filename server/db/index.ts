import { Pool } from "pg";
import type { Logger } from "pino";

export interface DbPoolOptions {
  /** Bounds both opening a connection and waiting in the pool's queue. */
  connectionTimeoutMillis?: number;
  queryTimeoutMillis?: number;
}

/**
 * The pool only serves health pings, so its waits share the ping budget: a
 * ping abandoned by its caller leaves the queue once this timeout passes.
 */
export function createDbPool(
  connectionString: string,
  logger: Logger,
  { connectionTimeoutMillis = 1000, queryTimeoutMillis = 1000 }: DbPoolOptions = {}
): Pool {
  const pool = new Pool({
    connectionString,
    connectionTimeoutMillis,
    query_timeout: queryTimeoutMillis
  });
  // idle clients can error when the server goes away; the health ping reports it
  pool.on("error", (err) => {
    logger.error({ err }, "idle database client error");
  });
  return pool;
}
