import { Router, type RequestHandler, type Response } from "express";
import type { Logger } from "pino";
import type { EvaluationResult, HealthRegistry } from "../../health/registry";

function respond(res: Response, result: EvaluationResult, passing: string, failing: string) {
  res.status(result.ok ? 200 : 503).json({ status: result.ok ? passing : failing, checks: result.checks });
}

function failures(result: EvaluationResult): Record<string, string | undefined> {
  return Object.fromEntries(
    Object.entries(result.checks)
      .filter(([, c]) => !c.ok)
      .map(([name, c]) => [name, c.detail])
  );
}

export function healthRoutes(registry: HealthRegistry, logger: Logger) {
  const r = Router();

  const readyEndpoint: RequestHandler = async (req, res, next) => {
    if (req.method !== "GET") {
      res.set("Allow", "GET").sendStatus(405);
      return;
    }
    try {
      const result = await registry.ready();
      if (!result.ok) {
        logger.warn({ failures: failures(result) }, "readiness check failed");
      }
      respond(res, result, "ready", "not_ready");
    } catch (e) {
      next(e);
    }
  };

  r.all("/health", readyEndpoint);

  r.all("/", (req, res, next) => {
    if (req.method !== "HEAD") {
      res.sendStatus(404);
      return;
    }
    // the ready endpoint only answers GET
    req.method = "GET";
    readyEndpoint(req, res, next);
  });

  r.get("/live", async (_req, res, next) => {
    try {
      const result = await registry.live();
      if (!result.ok) {
        logger.warn({ failures: failures(result) }, "liveness check failed");
      }
      respond(res, result, "live", "not_live");
    } catch (e) {
      next(e);
    }
  });

  return r;
}
