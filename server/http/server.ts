import express, { type Express } from "express";
import http from "node:http";
import https from "node:https";
import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { withCorrelation } from "../bootstrap/logger";
import type { HealthRegistry } from "../health/registry";
import { healthRoutes } from "./routes/health";

export const SERVER_TIMEOUTS = {
  readMs: 5000,
  writeMs: 5000,
  idleMs: 30000,
  readHeaderMs: 3000
} as const;

export interface HttpServerOptions {
  port: number;
  registry: HealthRegistry;
  logger: Logger;
  tls?: { cert: Buffer; key: Buffer };
}

export function createApp(registry: HealthRegistry, logger: Logger): Express {
  const app = express();
  app.disable("x-powered-by");

  app.use((req, res, next) => {
    const cid = req.header("x-correlation-id") || randomUUID();
    res.setHeader("x-correlation-id", cid);
    withCorrelation(cid, () => next());
  });

  // "/" (HEAD only), "/health" and "/live"
  app.use(healthRoutes(registry, logger));

  return app;
}

export function startHttpServer({ port, registry, logger, tls }: HttpServerOptions) {
  const app = createApp(registry, logger);
  const srv: http.Server = tls ? https.createServer({ cert: tls.cert, key: tls.key }, app) : http.createServer(app);

  srv.requestTimeout = SERVER_TIMEOUTS.readMs;
  srv.headersTimeout = SERVER_TIMEOUTS.readHeaderMs;
  srv.keepAliveTimeout = SERVER_TIMEOUTS.idleMs;
  srv.setTimeout(SERVER_TIMEOUTS.writeMs);

  srv.listen(port, () => {
    logger.info({ port, tls: Boolean(tls) }, "HTTP server started");
  });

  return { app, srv };
}
